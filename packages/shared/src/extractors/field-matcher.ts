/**
 * Field Matcher
 *
 * Generic first-match-wins lookup over an ordered list of patterns.
 * Knows nothing about job notices; the pattern table carries the domain.
 */

/**
 * A pattern as written in configuration.
 * `group` is the capture group holding the value (default 1).
 */
export interface FieldPatternSpec {
  pattern: string;
  group?: number;
}

/**
 * A compiled pattern ready for matching
 */
export interface FieldPattern {
  regex: RegExp;
  group: number;
}

/** Case-insensitive, and `.` also matches line breaks so values may span lines. */
export const FIELD_PATTERN_FLAGS = 'is';

/**
 * Compile a pattern spec. Throws SyntaxError for an invalid pattern.
 */
export function compileFieldPattern(spec: FieldPatternSpec): FieldPattern {
  return {
    regex: new RegExp(spec.pattern, FIELD_PATTERN_FLAGS),
    group: spec.group ?? 1,
  };
}

/**
 * Collapse every whitespace run (newlines included) to one space and trim
 */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Return the designated group of the first pattern that matches, whitespace-collapsed.
 * A match whose group did not participate, or is blank, counts as no match.
 */
export function matchField(text: string, patterns: readonly FieldPattern[]): string | null {
  for (const { regex, group } of patterns) {
    const match = regex.exec(text);
    if (!match) continue;

    const captured = match[group];
    if (captured === undefined) continue;

    const value = collapseWhitespace(captured);
    if (value) return value;
  }

  return null;
}
