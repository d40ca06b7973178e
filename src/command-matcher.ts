import { RulePatternError } from './errors.js';

/**
 * Patterns are regular expressions searched anywhere in the raw command
 * text. Shell syntax is not parsed, so `curl.*\|.*sh` catches a pipe to a
 * shell wherever it appears.
 */
export function compileCommandPattern(pattern: string): RegExp {
  if (pattern === '') {
    throw new RulePatternError('Empty command pattern', pattern);
  }
  try {
    return new RegExp(pattern, 'i');
  } catch (err) {
    throw new RulePatternError(
      `Invalid command pattern: ${pattern}`,
      pattern,
      { cause: err }
    );
  }
}

export function matchesCommand(commandText: string, pattern: string): boolean {
  return compileCommandPattern(pattern).test(commandText);
}
