import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { isMap, parseDocument } from 'yaml';
import { z } from 'zod';
import { parseAuditLine } from './audit.js';
import { expandHome } from './config-path.js';
import { ConfigError } from './errors.js';
import { configDocumentSchema, flagSchema } from './rules.js';
import type { Settings } from './types.js';

export const SETTING_KEYS = ['mode', 'logging_enabled', 'log_path'] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

/** Older documents spell these keys differently; a write replaces the alias. */
const ALIASES: Partial<Record<SettingKey, string>> = {
  logging_enabled: 'logging',
  log_path: 'log_file',
};

const settingValueSchemas: Record<
  SettingKey,
  z.ZodType<string | boolean, z.ZodTypeDef, unknown>
> = {
  mode: z.enum(['blocklist', 'whitelist']),
  logging_enabled: flagSchema,
  log_path: z.string().min(1),
};

export interface LogStats {
  total: number;
  blocks: number;
  allows: number;
}

export function isSettingKey(key: string): key is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(key);
}

/** Settings as the guard would see them; defaults when there is no file. */
export function readSettings(configPath: string): Settings {
  if (!existsSync(configPath)) {
    return configDocumentSchema.parse({}).settings;
  }
  const doc = parseDocument(readFileSync(configPath, 'utf-8'));
  if (doc.errors.length > 0) {
    throw new ConfigError(`Unparseable configuration in ${configPath}`, configPath, {
      cause: doc.errors[0],
    });
  }
  const root: unknown = doc.toJS();
  const raw =
    typeof root === 'object' && root !== null && 'settings' in root
      ? root.settings
      : undefined;
  const result = configDocumentSchema.shape.settings.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid settings in ${configPath}: ${result.error.issues[0]?.message ?? 'unknown'}`,
      configPath,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Rewrite one key under `settings`, leaving comments, ordering and every
 * rule in the document as they were.
 */
export function updateSetting(
  configPath: string,
  key: SettingKey,
  value: unknown
): void {
  const parsed = settingValueSchemas[key].safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid value for ${key}: ${String(value)}`,
      configPath,
      { cause: parsed.error }
    );
  }

  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Configuration not readable: ${configPath}`, configPath, {
      cause: err,
    });
  }
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new ConfigError(`Unparseable configuration in ${configPath}`, configPath, {
      cause: doc.errors[0],
    });
  }

  if (!isMap(doc.get('settings'))) {
    doc.set('settings', doc.createNode({}));
  }
  const alias = ALIASES[key];
  if (alias) doc.deleteIn(['settings', alias]);
  doc.setIn(['settings', key], parsed.data);

  writeFileSync(configPath, doc.toString());
}

export function toggleMode(configPath: string): Settings['mode'] {
  const next =
    readSettings(configPath).mode === 'whitelist' ? 'blocklist' : 'whitelist';
  updateSetting(configPath, 'mode', next);
  return next;
}

export function toggleLogging(configPath: string): boolean {
  const next = !readSettings(configPath).loggingEnabled;
  updateSetting(configPath, 'logging_enabled', next);
  return next;
}

function readLogLines(logPath: string): string[] {
  const resolved = path.resolve(expandHome(logPath));
  if (!existsSync(resolved)) return [];
  return readFileSync(resolved, 'utf-8')
    .split('\n')
    .filter((line) => line.trim() !== '');
}

export function readRecentLogs(logPath: string, n = 10): string[] {
  if (n <= 0) return [];
  return readLogLines(logPath).slice(-n);
}

export function countStats(logPath: string): LogStats {
  const stats: LogStats = { total: 0, blocks: 0, allows: 0 };
  for (const line of readLogLines(logPath)) {
    stats.total++;
    const record = parseAuditLine(line);
    if (record?.decision === 'BLOCK') stats.blocks++;
    else if (record?.decision === 'ALLOW') stats.allows++;
  }
  return stats;
}
