/**
 * Rule model and pattern validation.
 *
 * Every pattern (ignore-file line or CLI glob) is checked here before it is
 * handed to the `ignore` matcher, which would otherwise accept anything.
 */

import { ConfigurationError } from './errors.js';

export type RuleSource = 'ignore-file' | 'cli-exclude-file' | 'cli-exclude-dir' | 'cli-include';

export interface Rule {
  /** Pattern text without its negation prefix */
  readonly pattern: string;
  readonly source: RuleSource;
  readonly negated: boolean;
  /** POSIX directory (relative to the traversal root) the rule applies under; '' for the root */
  readonly base: string;
}

/**
 * Reason a pattern cannot be compiled, or null if it is well-formed.
 */
export function findPatternProblem(pattern: string): string | null {
  const body = pattern.startsWith('!') ? pattern.slice(1) : pattern;

  if (pattern.trim() === '') return 'pattern is empty';
  if (body === '' || body === '/') return `pattern "${pattern}" matches nothing`;

  let i = 0;
  while (i < body.length) {
    const ch = body[i];

    if (ch === '\\') {
      if (i === body.length - 1) return `pattern "${pattern}" ends with an unescaped backslash`;
      i += 2;
      continue;
    }

    if (ch === '[') {
      const problem = scanCharacterClass(body, i);
      if (typeof problem === 'string') return `pattern "${pattern}": ${problem}`;
      i = problem;
      continue;
    }

    i++;
  }

  return null;
}

/** Returns the index after the closing `]`, or a problem description. */
function scanCharacterClass(body: string, open: number): number | string {
  let i = open + 1;
  if (body[i] === '!' || body[i] === '^') i++;
  // A `]` right after the opening bracket is a literal member
  if (body[i] === ']') i++;

  let previous: string | null = null;
  while (i < body.length) {
    const ch = body[i];

    if (ch === ']') return i + 1;

    if (ch === '\\' && i + 1 < body.length) {
      previous = body[i + 1];
      i += 2;
      continue;
    }

    if (ch === '-' && previous !== null && i + 1 < body.length && body[i + 1] !== ']') {
      const end = body[i + 1] === '\\' ? body[i + 2] : body[i + 1];
      if (end !== undefined && end < previous) {
        return `character range "${previous}-${end}" is out of order`;
      }
      previous = null;
      i += body[i + 1] === '\\' ? 3 : 2;
      continue;
    }

    previous = ch;
    i++;
  }

  return 'unterminated character class "["';
}

export function assertValidPattern(pattern: string, where: string): void {
  const problem = findPatternProblem(pattern);
  if (problem) {
    throw new ConfigurationError(`Invalid pattern in ${where}: ${problem}`);
  }
}

function toRule(raw: string, source: RuleSource, base: string, where: string): Rule {
  assertValidPattern(raw, where);
  const negated = raw.startsWith('!');
  const rule: Rule = { pattern: negated ? raw.slice(1) : raw, source, negated, base };
  return Object.freeze(rule);
}

/**
 * Build CLI rules of one source. Patterns are used as given; a leading `!`
 * negates, as in an ignore file.
 */
export function cliRules(patterns: readonly string[], source: Exclude<RuleSource, 'ignore-file'>): Rule[] {
  return patterns.map(raw => toRule(raw, source, '', `--${source.replace(/^cli-/, '')}`));
}

/** `--ignore` patterns: root ignore-file rules given on the command line. */
export function ignorePatternRules(patterns: readonly string[]): Rule[] {
  return patterns.map(raw => toRule(raw, 'ignore-file', '', '--ignore'));
}

/**
 * Parse ignore-file text into ordered rules.
 * Blank lines and `#` comments are skipped; `\#` and `\!` stay literal.
 */
export function parseIgnoreFile(text: string, base: string, origin: string): Rule[] {
  const rules: Rule[] = [];
  const lines = text.split(/\r?\n/);

  for (let n = 0; n < lines.length; n++) {
    const line = lines[n];
    if (line.trim() === '' || line.startsWith('#')) continue;
    rules.push(toRule(line, 'ignore-file', base, `${origin}:${n + 1}`));
  }

  return rules;
}

/** Pattern text as it appears in an ignore file, negation prefix restored. */
export function ruleLine(rule: Rule): string {
  return rule.negated ? `!${rule.pattern}` : rule.pattern;
}
