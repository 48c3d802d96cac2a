import { UsageError } from '../errors';
import { SearchRequestSchema, type SearchRequest } from './schema';

/**
 * Validates raw parser output and freezes it into a SearchRequest.
 *
 * @param input - Pattern, paths and options as collected from the command line
 * @param usage - Usage text attached to the error so the caller can print it
 * @throws UsageError carrying the first validation message
 */
export function validateSearchRequest(input: unknown, usage?: string): SearchRequest {
  const result = SearchRequestSchema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new UsageError(issue?.message ?? 'Invalid arguments.', {
      cause: result.error,
      details: usage,
    });
  }

  const { pattern, paths, options } = result.data;
  return Object.freeze({
    pattern,
    paths: Object.freeze([...paths]),
    options: Object.freeze({ ...options }),
  });
}
