import os from 'node:os';
import path from 'node:path';
import { Minimatch, escape, type MinimatchOptions } from 'minimatch';
import { expandEnv, expandHome } from './config-path.js';
import { RulePatternError } from './errors.js';

const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nonegate: true,
  nocomment: true,
  nocase: false,
};

export interface PathMatchOptions {
  /** Replaces `~`; defaults to the invoking user's home directory */
  home?: string;
  env?: NodeJS.ProcessEnv;
  /** Base for relative candidates; defaults to process.cwd() */
  cwd?: string;
}

export type PathMatcher = (normalizedPath: string) => boolean;

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

function expand(p: string, options: PathMatchOptions): string {
  return expandHome(expandEnv(p, options.env), options.home);
}

/** Glob-escapes a substituted value; minimatch's escape leaves braces alone. */
function literal(value: string): string {
  return escape(value).replace(/[{}]/g, '\\$&');
}

/**
 * `~` and variable values are substituted as literal text. `\` stays a glob
 * escape in patterns; only candidates get `/` separators.
 */
export function expandPattern(
  pattern: string,
  options: PathMatchOptions = {}
): string {
  const env: NodeJS.ProcessEnv = {};
  for (const [name, value] of Object.entries(options.env ?? process.env)) {
    if (value !== undefined) env[name] = literal(value);
  }
  return expandHome(
    expandEnv(pattern, env),
    literal(options.home ?? os.homedir())
  );
}

/**
 * Textual normalization only: `~` and variables expanded, made absolute
 * against `cwd`, `.`/`..` and repeated separators collapsed. Symlinks are
 * not followed.
 */
export function normalizeCandidate(
  candidate: string,
  options: PathMatchOptions = {}
): string {
  if (candidate === '') return '';
  let p = expand(toPosix(candidate), options);
  if (!path.posix.isAbsolute(p)) {
    p = path.posix.join(toPosix(options.cwd ?? process.cwd()), p);
  }
  p = path.posix.normalize(p);
  return p.length > 1 && p.endsWith('/') ? p.slice(0, -1) : p;
}

/**
 * Compile a glob once. `*` stays within a segment, `**` spans zero or more
 * segments, and a trailing `/**` also covers the directory itself.
 */
export function compilePathPattern(
  pattern: string,
  options: PathMatchOptions = {}
): PathMatcher {
  const expanded = expandPattern(pattern, options);
  let glob: Minimatch;
  let self: Minimatch | null = null;
  try {
    glob = new Minimatch(expanded, GLOB_OPTIONS);
    if (expanded.endsWith('/**')) {
      self = new Minimatch(expanded.slice(0, -3) || '/', GLOB_OPTIONS);
    }
  } catch (err) {
    throw new RulePatternError(`Invalid path pattern: ${pattern}`, pattern, {
      cause: err,
    });
  }
  return (normalizedPath) => {
    if (normalizedPath === '') return false;
    return glob.match(normalizedPath) || (self?.match(normalizedPath) ?? false);
  };
}

export function matchesPath(
  candidate: string,
  pattern: string,
  options: PathMatchOptions = {}
): boolean {
  if (pattern === '') return false;
  return compilePathPattern(pattern, options)(
    normalizeCandidate(candidate, options)
  );
}
