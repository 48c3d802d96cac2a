import type { SearchOptions } from '../shared';
import type { MatchResult } from './types';

// Highlighted spans are written as exactly these bytes whether or not stdout is a terminal.
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

export interface LineMatcher {
  /** True when the pattern occurs anywhere in the line. */
  matches(line: string): boolean;
  /** Wraps every occurrence of the pattern in red. */
  highlight(line: string): string;
}

interface Span {
  start: number;
  end: number;
}

interface FoldedText {
  text: string;
  /** Original index of the character each folded code unit came from */
  starts: number[];
  /** Original index just past that character */
  ends: number[];
}

/**
 * Lowercases one character at a time so every folded position can be traced
 * back to the original string, even where lowercasing changes the length.
 */
function foldCase(text: string): FoldedText {
  let folded = '';
  const starts: number[] = [];
  const ends: number[] = [];
  let index = 0;

  for (const char of text) {
    const lower = char.toLowerCase();
    for (let i = 0; i < lower.length; i++) {
      starts.push(index);
      ends.push(index + char.length);
    }
    folded += lower;
    index += char.length;
  }

  return { text: folded, starts, ends };
}

function scan(haystack: string, needle: string): Span[] {
  const spans: Span[] = [];
  let start = haystack.indexOf(needle);
  while (start !== -1) {
    spans.push({ start, end: start + needle.length });
    start = haystack.indexOf(needle, start + needle.length);
  }
  return spans;
}

export function createLineMatcher(
  pattern: string,
  options: Pick<SearchOptions, 'caseInsensitive'>,
): LineMatcher {
  const needle = options.caseInsensitive ? foldCase(pattern).text : pattern;

  const locate = (line: string): Span[] => {
    if (needle.length === 0) return [];
    if (!options.caseInsensitive) return scan(line, needle);

    const folded = foldCase(line);
    return scan(folded.text, needle).map(({ start, end }) => ({
      start: folded.starts[start],
      end: folded.ends[end - 1],
    }));
  };

  return {
    matches(line: string): boolean {
      const haystack = options.caseInsensitive ? foldCase(line).text : line;
      return haystack.includes(needle);
    },

    highlight(line: string): string {
      let output = '';
      let cursor = 0;
      for (const span of locate(line)) {
        const start = Math.max(span.start, cursor);
        if (span.end <= start) continue;
        output += line.slice(cursor, start) + RED + line.slice(start, span.end) + RESET;
        cursor = span.end;
      }
      return output + line.slice(cursor);
    },
  };
}

export function evaluateLine(
  rawText: string,
  lineNumber: number,
  matcher: LineMatcher,
  options: Pick<SearchOptions, 'invertMatch' | 'colorize'>,
): MatchResult {
  const matched = matcher.matches(rawText);
  const reported = matched !== options.invertMatch;
  // Inverted output has nothing to highlight.
  const displayText =
    options.colorize && matched && !options.invertMatch ? matcher.highlight(rawText) : rawText;

  return { lineNumber, rawText, matched, reported, displayText };
}

/**
 * Builds the printed line: `path:` then `lineNumber:` then the text, each
 * prefix only when its option is set.
 */
export function formatLine(
  result: MatchResult,
  path: string,
  options: Pick<SearchOptions, 'showFilename' | 'showLineNumbers'>,
): string {
  const parts: string[] = [];
  if (options.showFilename) {
    parts.push(path);
  }
  if (options.showLineNumbers) {
    parts.push(String(result.lineNumber));
  }
  return parts.length > 0 ? `${parts.join(':')}:${result.displayText}` : result.displayText;
}
