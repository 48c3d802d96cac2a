import { parseArgs, PROGRAM_NAME, type ParseOutcome } from './args';
import { SearchRunner, type SearchRunnerOptions } from '../search';
import { ConsoleLogger, UsageError } from '../shared';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Runs one invocation and resolves to its exit code.
 * Matched lines go to stdout; usage errors and per-path errors to stderr.
 */
export async function main(
  argv: readonly string[],
  runnerOptions: Omit<SearchRunnerOptions, 'logger'> = {},
): Promise<number> {
  const logger = new ConsoleLogger({ name: PROGRAM_NAME });

  let outcome: ParseOutcome;
  try {
    outcome = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    logger.error(e);
    if (typeof e.details === 'string') {
      console.error(e.details.trimEnd());
    }
    return EXIT_USAGE;
  }

  if (outcome.kind !== 'run') {
    console.log(outcome.text.trimEnd());
    return EXIT_OK;
  }

  if (outcome.verbose) {
    logger.setLevel('debug');
  }
  logger.debug(
    `pattern=${JSON.stringify(outcome.request.pattern)} paths=${outcome.request.paths.length}`,
  );

  const runner = new SearchRunner({ ...runnerOptions, logger });
  const summary = await runner.run(outcome.request);
  return summary.errors.length > 0 ? EXIT_FAILURE : EXIT_OK;
}
