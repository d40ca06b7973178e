import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export const CONFIG_FILE_NAME = 'patterns.yaml';

export const DEFAULT_LOG_PATH = '~/.claude/tool-guard.log';

const ENV_VAR = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.posix.join(home, p.slice(2));
  return p;
}

/** Expands `$VAR` and `${VAR}`; unset variables are left as written. */
export function expandEnv(
  p: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return p.replace(ENV_VAR, (whole, braced?: string, bare?: string) => {
    const value = env[braced ?? bare ?? ''];
    return value === undefined ? whole : value;
  });
}

/** Directories that may hold the shipped `config/` folder, nearest first. */
function packageConfigCandidates(): string[] {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return [
    path.resolve(here, '..', 'config', CONFIG_FILE_NAME),
    path.resolve(here, '..', '..', 'config', CONFIG_FILE_NAME),
  ];
}

/**
 * TOOL_GUARD_CONFIG wins; then the config shipped beside the installed
 * package; then the per-user hooks directory. The last candidate is returned
 * even when it does not exist, so the loader can report where it looked.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env
): string {
  const override = env.TOOL_GUARD_CONFIG;
  if (override) return path.resolve(expandHome(override));

  for (const candidate of packageConfigCandidates()) {
    if (existsSync(candidate)) return candidate;
  }
  return expandHome(`~/.claude/hooks/tool-guard/config/${CONFIG_FILE_NAME}`);
}
