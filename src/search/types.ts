import type { PathError } from '../shared';

export interface MatchResult {
  /** 1-based */
  lineNumber: number;
  rawText: string;
  /** Whether the pattern occurs in the line */
  matched: boolean;
  /** Whether the line is printed, after invert mode is applied */
  reported: boolean;
  /** Text to print, highlighted when colour is on */
  displayText: string;
}

export type ResolvedEntry =
  | { kind: 'file'; path: string }
  | { kind: 'error'; error: PathError };

export interface SearchSummary {
  filesSearched: number;
  linesReported: number;
  /** Per-path failures, in the order they were reported */
  errors: PathError[];
}
