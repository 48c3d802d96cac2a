import { Command, CommanderError } from 'commander';
import { version } from '../../package.json';
import { UsageError, validateSearchRequest, type SearchRequest } from '../shared';

export const PROGRAM_NAME = 'lgrep';
export const MISSING_ARGUMENTS_MESSAGE = 'Missing arguments. Use -h for help.';

type CliFlags = {
  ignoreCase?: boolean;
  lineNumber?: boolean;
  invertMatch?: boolean;
  recursive?: boolean;
  withFilename?: boolean;
  color?: boolean;
  verbose?: boolean;
};

export type ParseOutcome =
  | { kind: 'run'; request: SearchRequest; verbose: boolean }
  | { kind: 'help'; text: string }
  | { kind: 'version'; text: string };

/**
 * Options are recognised anywhere before `--`; everything else is a
 * positional, the first being the pattern.
 */
export function createProgram(output: string[]): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .usage('[options] <pattern> <files...>')
    .description('Print the lines of files that contain a literal pattern')
    .argument('[pattern]', 'Literal text to search for')
    .argument('[paths...]', 'Files to search, or directories with -r')
    .option('-i, --ignore-case', 'Case-insensitive search')
    .option('-n, --line-number', 'Print line numbers')
    .option('-v, --invert-match', 'Invert match (print lines that do not contain the pattern)')
    .option('-r, --recursive', 'Recursive directory search')
    .option('-f, --with-filename', 'Print filenames')
    .option('-c, --color', 'Highlight matches in red')
    .option('--verbose', 'Log debug information to stderr')
    .helpOption('-h, --help', 'Show help information')
    .version(version, '-V, --version', 'Show version information')
    .addHelpText(
      'after',
      `
Examples:
  $ ${PROGRAM_NAME} Utility notes.md -n -i
  $ ${PROGRAM_NAME} -r -f TODO src
  $ ${PROGRAM_NAME} -- -i flags.txt
`,
    );

  program.exitOverride();
  program.configureOutput({
    writeOut(text: string): void {
      output.push(text);
    },
    writeErr(text: string): void {
      output.push(text);
    },
    outputError(): void {
      // Reported by the caller as a UsageError.
    },
  });

  return program;
}

/**
 * Classifies command-line tokens (without the node binary and script) into
 * a SearchRequest, or a request for help or the version.
 *
 * @throws UsageError with the usage text in `details`
 */
export function parseArgs(argv: readonly string[]): ParseOutcome {
  const output: string[] = [];
  const program = createProgram(output);
  const usage = program.helpInformation();

  if (argv.length === 0) {
    throw new UsageError(MISSING_ARGUMENTS_MESSAGE, { details: usage });
  }

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    if (error.code === 'commander.helpDisplayed') {
      return { kind: 'help', text: output.join('') };
    }
    if (error.code === 'commander.version') {
      return { kind: 'version', text: output.join('') };
    }
    throw new UsageError(error.message.replace(/^error: /, ''), { cause: error, details: usage });
  }

  const processed: unknown[] = program.processedArgs;
  const [pattern, paths] = processed;
  const flags = program.opts<CliFlags>();

  const request = validateSearchRequest(
    {
      pattern,
      paths,
      options: {
        caseInsensitive: flags.ignoreCase === true,
        invertMatch: flags.invertMatch === true,
        showLineNumbers: flags.lineNumber === true,
        recursive: flags.recursive === true,
        showFilename: flags.withFilename === true,
        colorize: flags.color === true,
      },
    },
    usage,
  );

  return { kind: 'run', request, verbose: flags.verbose === true };
}
