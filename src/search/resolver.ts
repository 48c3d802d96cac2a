import nodeFs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import {
  ConsoleLogger,
  NotAFileError,
  NotFoundError,
  OpenError,
  isNodeError,
  type Logger,
  type PathError,
} from '../shared';
import type { ResolvedEntry } from './types';

export type Fs = typeof nodeFs;

export interface PathResolverOptions {
  fs?: Fs;
  logger?: Logger;
}

function statError(target: string, error: unknown): PathError {
  if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
    return new NotFoundError(target, { cause: error });
  }
  return new OpenError(target, { cause: error });
}

/**
 * Expands command-line paths into the files to search, in order.
 * Failures are yielded in place so the caller can report them between
 * the output of the files around them.
 */
export class PathResolver {
  private readonly fs: Fs;
  private readonly logger: Logger;

  constructor(options: PathResolverOptions = {}) {
    this.fs = options.fs ?? nodeFs;
    this.logger = options.logger ?? new ConsoleLogger();
  }

  async *resolve(paths: readonly string[], recursive: boolean): AsyncGenerator<ResolvedEntry> {
    for (const input of paths) {
      let stats: Stats;
      try {
        stats = await this.fs.stat(input);
      } catch (error) {
        yield { kind: 'error', error: statError(input, error) };
        continue;
      }

      if (stats.isFile()) {
        yield { kind: 'file', path: input };
      } else if (!stats.isDirectory()) {
        yield { kind: 'error', error: new NotAFileError(input, 'Not a regular file') };
      } else if (recursive) {
        yield* this.walk(input, new Set(), this.logger.child({ root: input }));
      } else {
        yield { kind: 'error', error: new NotAFileError(input) };
      }
    }
  }

  /**
   * Depth-first walk in code-unit order of entry names. `active` holds the
   * real paths of the directories currently being walked, so a symbolic link
   * back to one of them is skipped instead of looping.
   */
  private async *walk(
    dir: string,
    active: Set<string>,
    logger: Logger,
  ): AsyncGenerator<ResolvedEntry> {
    let realDir: string;
    let names: string[];
    try {
      realDir = await this.fs.realpath(dir);
      names = await this.fs.readdir(dir);
    } catch (error) {
      yield { kind: 'error', error: new OpenError(dir, { cause: error }) };
      return;
    }

    if (active.has(realDir)) {
      logger.debug(`skipping ${dir}: symbolic link cycle`);
      return;
    }

    names.sort();
    active.add(realDir);
    try {
      for (const name of names) {
        const child = path.join(dir, name);
        let stats: Stats;
        try {
          stats = await this.fs.stat(child);
        } catch (error) {
          yield { kind: 'error', error: statError(child, error) };
          continue;
        }

        if (stats.isDirectory()) {
          yield* this.walk(child, active, logger);
        } else if (stats.isFile()) {
          yield { kind: 'file', path: child };
        } else {
          logger.debug(`skipping ${child}: not a regular file`);
        }
      }
    } finally {
      active.delete(realDir);
    }
  }
}
