import { z } from 'zod';

export const MISSING_PATTERN_MESSAGE = 'Missing search pattern.';
export const MISSING_PATHS_MESSAGE = 'Missing input files.';

export const SearchOptionsSchema = z.object({
  caseInsensitive: z.boolean().default(false),
  invertMatch: z.boolean().default(false),
  showLineNumbers: z.boolean().default(false),
  recursive: z.boolean().default(false),
  showFilename: z.boolean().default(false),
  colorize: z.boolean().default(false),
});

export const SearchRequestSchema = z.object({
  // An empty pattern is a valid literal and matches every line.
  pattern: z.string({ required_error: MISSING_PATTERN_MESSAGE }),
  paths: z.array(z.string(), { required_error: MISSING_PATHS_MESSAGE }).min(1, MISSING_PATHS_MESSAGE),
  options: SearchOptionsSchema.default({}),
});

export type SearchOptions = Readonly<z.infer<typeof SearchOptionsSchema>>;

export interface SearchRequest {
  readonly pattern: string;
  readonly paths: readonly string[];
  readonly options: SearchOptions;
}
