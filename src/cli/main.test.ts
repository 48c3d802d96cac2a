import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { main, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './main';

describe('main', () => {
  let tmpDir: string;
  let originalCwd: string;
  let logSpy: MockInstance<typeof console.log>;
  let errSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lgrep-cli-test-'));
    originalCwd = process.cwd();
    process.chdir(tmpDir);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.chdir(originalCwd);
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  const stdout = () => logSpy.mock.calls.map((c) => String(c[0]));
  const stderr = () => errSpy.mock.calls.map((c) => String(c[0]));

  it('prints numbered case-insensitive matches and exits 0', async () => {
    await createFiles({ 'grep.md': 'Utility tool\nother text\nUTILITY again\n' });

    const code = await main(['Utility', 'grep.md', '-n', '-i']);

    expect(code).toBe(EXIT_OK);
    expect(stdout()).toEqual(['1:Utility tool', '3:UTILITY again']);
    expect(stderr()).toEqual([]);
  });

  it('produces identical output whatever the flag position', async () => {
    await createFiles({ 'file.txt': 'a PATTERN here\nnothing\nPATTERN again\n' });

    const outputs: string[][] = [];
    for (const argv of [
      ['PATTERN', 'file.txt', '-n'],
      ['-n', 'PATTERN', 'file.txt'],
      ['PATTERN', '-n', 'file.txt'],
    ]) {
      logSpy.mockClear();
      expect(await main(argv)).toBe(EXIT_OK);
      outputs.push(stdout());
    }

    expect(outputs[0]).toEqual(['1:a PATTERN here', '3:PATTERN again']);
    expect(outputs[1]).toEqual(outputs[0]);
    expect(outputs[2]).toEqual(outputs[0]);
  });

  it('searches literally for a flag-like pattern after --', async () => {
    await createFiles({ 'file.txt': 'use -i to ignore case\nUSE -I LOUDLY\n' });

    expect(await main(['--', '-i', 'file.txt'])).toBe(EXIT_OK);
    expect(stdout()).toEqual(['use -i to ignore case']);
  });

  it('still scans valid paths after a missing one and exits nonzero', async () => {
    await createFiles({ 'a.txt': 'needle a\n', 'b.txt': 'needle b\n' });

    const code = await main(['needle', 'a.txt', 'missing.txt', 'b.txt', '-f']);

    expect(code).toBe(EXIT_FAILURE);
    expect(stdout()).toEqual(['a.txt:needle a', 'b.txt:needle b']);
    expect(stderr()).toEqual(['lgrep: missing.txt: No such file or directory']);
  });

  it('finds nested matches with -r that a plain search reports as a directory', async () => {
    await createFiles({ 'tree/top.txt': 'needle\n', 'tree/deep/er.txt': 'x\nneedle\n' });

    expect(await main(['needle', 'tree'])).toBe(EXIT_FAILURE);
    expect(stdout()).toEqual([]);
    expect(stderr()).toEqual(['lgrep: tree: Is a directory']);

    logSpy.mockClear();
    errSpy.mockClear();

    expect(await main(['needle', 'tree', '-r', '-f', '-n'])).toBe(EXIT_OK);
    expect(stdout()).toEqual([
      `${path.join('tree', 'deep', 'er.txt')}:2:needle`,
      `${path.join('tree', 'top.txt')}:1:needle`,
    ]);
    expect(stderr()).toEqual([]);
  });

  it('highlights matches with -c', async () => {
    await createFiles({ 'words.txt': 'concatenate\n' });

    expect(await main(['cat', 'words.txt', '-c'])).toBe(EXIT_OK);
    expect(stdout()).toEqual(['con\x1b[31mcat\x1b[0menate']);
  });

  it('prints help to stdout and exits 0', async () => {
    const code = await main(['Utility', '-h', 'missing.txt']);

    expect(code).toBe(EXIT_OK);
    expect(stdout()).toHaveLength(1);
    expect(stdout()[0]).toContain('Usage: lgrep [options] <pattern> <files...>');
    expect(stderr()).toEqual([]);
  });

  it('prints a usage error with the usage text to stderr and exits 2', async () => {
    const code = await main([]);

    expect(code).toBe(EXIT_USAGE);
    expect(stdout()).toEqual([]);
    expect(stderr()[0]).toBe('lgrep: Missing arguments. Use -h for help.');
    expect(stderr()[1]).toContain('Usage: lgrep [options] <pattern> <files...>');
  });

  it('rejects unknown flags before searching', async () => {
    await createFiles({ 'a.txt': 'needle\n' });

    expect(await main(['needle', 'a.txt', '-z'])).toBe(EXIT_USAGE);
    expect(stdout()).toEqual([]);
    expect(stderr()[0]).toBe("lgrep: unknown option '-z'");
  });

  it('logs debug lines with --verbose', async () => {
    await createFiles({ 'a.txt': 'needle\n' });

    expect(await main(['needle', 'a.txt', '--verbose'])).toBe(EXIT_OK);
    expect(stdout()).toEqual(['needle']);
    expect(stderr()).toEqual([
      'lgrep: debug: pattern="needle" paths=1',
      'lgrep: debug: searched 1 file(s), reported 1 line(s), 0 error(s)',
    ]);
  });

  it('adds stack traces to path errors with --verbose', async () => {
    expect(await main(['needle', 'missing.txt', '--verbose'])).toBe(EXIT_FAILURE);

    expect(stderr()).toHaveLength(4);
    expect(stderr()[0]).toBe('lgrep: debug: pattern="needle" paths=1');
    expect(stderr()[1]).toBe('lgrep: missing.txt: No such file or directory');
    expect(stderr()[2]).toContain('    at ');
    expect(stderr()[3]).toBe('lgrep: debug: searched 0 file(s), reported 0 line(s), 1 error(s)');
  });

  it('reports usage errors without stack traces even with --verbose', async () => {
    expect(await main(['--verbose'])).toBe(EXIT_USAGE);

    expect(stderr()).toHaveLength(2);
    expect(stderr()[0]).toBe('lgrep: Missing search pattern.');
    expect(stderr()[1]).toContain('Usage: lgrep [options] <pattern> <files...>');
  });

  it('sends output through an injected writer', async () => {
    await createFiles({ 'a.txt': 'needle\nhay\n' });
    const lines: string[] = [];

    expect(await main(['-v', 'needle', 'a.txt'], { write: (line) => lines.push(line) })).toBe(
      EXIT_OK,
    );
    expect(lines).toEqual(['hay']);
    expect(stdout()).toEqual([]);
  });
});
