import nodeFs, { type FileHandle } from 'node:fs/promises';
import {
  ConsoleLogger,
  OpenError,
  PathError,
  ReadError,
  type Logger,
  type SearchOptions,
  type SearchRequest,
} from '../shared';
import { splitLines } from './lines';
import { createLineMatcher, evaluateLine, formatLine, type LineMatcher } from './matcher';
import { PathResolver, type Fs } from './resolver';
import type { SearchSummary } from './types';

export interface SearchRunnerOptions {
  fs?: Fs;
  logger?: Logger;
  /** Receives every reported line, already formatted. Defaults to `console.log`. */
  write?: (line: string) => void;
}

export class SearchRunner {
  private readonly fs: Fs;
  private readonly logger: Logger;
  private readonly write: (line: string) => void;
  private readonly resolver: PathResolver;

  constructor(options: SearchRunnerOptions = {}) {
    this.fs = options.fs ?? nodeFs;
    this.logger = options.logger ?? new ConsoleLogger();
    this.write = options.write ?? ((line) => console.log(line));
    this.resolver = new PathResolver({ fs: this.fs, logger: this.logger });
  }

  async run(request: SearchRequest): Promise<SearchSummary> {
    const { pattern, paths, options } = request;
    const matcher = createLineMatcher(pattern, options);
    const summary: SearchSummary = { filesSearched: 0, linesReported: 0, errors: [] };

    for await (const entry of this.resolver.resolve(paths, options.recursive)) {
      if (entry.kind === 'error') {
        this.fail(summary, entry.error);
        continue;
      }

      try {
        summary.linesReported += await this.searchFile(entry.path, matcher, options);
        summary.filesSearched++;
      } catch (error) {
        if (!(error instanceof PathError)) throw error;
        this.fail(summary, error);
      }
    }

    this.logger.debug(
      `searched ${summary.filesSearched} file(s), reported ${summary.linesReported} line(s), ${summary.errors.length} error(s)`,
    );
    return summary;
  }

  /**
   * Prints the reported lines of one file as they are read.
   * @returns the number of lines printed
   */
  private async searchFile(
    filePath: string,
    matcher: LineMatcher,
    options: SearchOptions,
  ): Promise<number> {
    let handle: FileHandle;
    try {
      handle = await this.fs.open(filePath, 'r');
    } catch (error) {
      throw new OpenError(filePath, { cause: error });
    }

    let lineNumber = 0;
    let reported = 0;
    try {
      for await (const line of this.readLines(handle, filePath)) {
        lineNumber++;
        const result = evaluateLine(line, lineNumber, matcher, options);
        if (result.reported) {
          this.write(formatLine(result, filePath, options));
          reported++;
        }
      }
    } finally {
      await handle.close();
    }
    return reported;
  }

  /**
   * Only failures of the read itself become a `ReadError`; errors thrown by
   * the loop consuming these lines pass through unchanged.
   */
  private async *readLines(handle: FileHandle, filePath: string): AsyncGenerator<string> {
    const stream = handle.createReadStream({ encoding: 'utf8', autoClose: false });
    try {
      yield* splitLines(stream);
    } catch (error) {
      throw new ReadError(filePath, { cause: error });
    }
  }

  private fail(summary: SearchSummary, error: PathError): void {
    summary.errors.push(error);
    this.logger.error(error);
  }
}
