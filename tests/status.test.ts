import { describe, it, expect } from 'vitest';
import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { loadRuleSet } from '../src/rules.js';
import { ConfigError } from '../src/errors.js';
import {
  countStats,
  readRecentLogs,
  readSettings,
  toggleLogging,
  toggleMode,
  updateSetting,
} from '../src/status.js';
import { DEFAULT_LOG_PATH } from '../src/config-path.js';
import type { RuleSet } from '../src/types.js';
import { HOME, tempDir } from './helpers.js';

const DOCUMENT = `# keep me
settings:
  mode: blocklist # inline note
  logging: "true"

safe_zones:
  - pattern: /tmp/**
    reason: Scratch space

protected_paths:
  - pattern: ~/.ssh/**
    level: block
    reason: SSH keys
  - pattern: /etc/**
    level: read_only

dangerous_commands:
  - pattern: 'curl.*\\|.*sh'
    reason: Piping a download into a shell
`;

function writeConfig(text = DOCUMENT): string {
  const file = path.join(tempDir(), 'patterns.yaml');
  writeFileSync(file, text);
  return file;
}

function allRules(rules: RuleSet) {
  return [
    ...rules.safeZones.map((c) => c.rule),
    ...rules.protectedPaths.map((c) => c.rule),
    ...rules.dangerousCommands.map((c) => c.rule),
  ];
}

describe('readSettings', () => {
  it('returns defaults when there is no file', () => {
    expect(readSettings(path.join(tempDir(), 'none.yaml'))).toEqual({
      mode: 'blocklist',
      loggingEnabled: true,
      logPath: DEFAULT_LOG_PATH,
    });
  });

  it('reads the settings block', () => {
    expect(readSettings(writeConfig()).mode).toBe('blocklist');
  });

  it('rejects invalid settings', () => {
    expect(() => readSettings(writeConfig('settings:\n  mode: paranoid\n'))).toThrow(
      ConfigError
    );
  });
});

describe('updateSetting', () => {
  it('keeps every rule and comment intact', () => {
    const file = writeConfig();
    const before = allRules(loadRuleSet(file, { home: HOME }));

    updateSetting(file, 'mode', 'whitelist');

    const after = loadRuleSet(file, { home: HOME });
    expect(after.settings.mode).toBe('whitelist');
    expect(allRules(after)).toEqual(before);
    const text = readFileSync(file, 'utf-8');
    expect(text.startsWith('# keep me\n')).toBe(true);
    expect(text).toContain('# inline note');
  });

  it('replaces the older key spelling', () => {
    const file = writeConfig();
    updateSetting(file, 'logging_enabled', 'false');
    expect(parseYaml(readFileSync(file, 'utf-8')).settings).toEqual({
      mode: 'blocklist',
      logging_enabled: false,
    });
    expect(readSettings(file).loggingEnabled).toBe(false);
  });

  it('accepts the same flag spellings as the loader', () => {
    const file = writeConfig();
    updateSetting(file, 'logging_enabled', 'no');
    expect(parseYaml(readFileSync(file, 'utf-8')).settings.logging_enabled).toBe(false);
    updateSetting(file, 'logging_enabled', '1');
    expect(readSettings(file).loggingEnabled).toBe(true);
    expect(() => updateSetting(file, 'logging_enabled', 'maybe')).toThrow(ConfigError);
  });

  it('creates the settings block when it is empty', () => {
    const file = writeConfig('settings:\nsafe_zones:\n  - pattern: /tmp/**\n');
    updateSetting(file, 'log_path', '/var/log/guard.log');
    expect(readSettings(file).logPath).toBe('/var/log/guard.log');
    expect(loadRuleSet(file).safeZones).toHaveLength(1);
  });

  it('rejects an invalid value', () => {
    const file = writeConfig();
    expect(() => updateSetting(file, 'mode', 'paranoid')).toThrow(ConfigError);
    expect(readFileSync(file, 'utf-8')).toBe(DOCUMENT);
  });

  it('raises ConfigError for a missing file', () => {
    expect(() =>
      updateSetting(path.join(tempDir(), 'none.yaml'), 'mode', 'whitelist')
    ).toThrow(ConfigError);
  });
});

describe('toggles', () => {
  it('flips mode and logging', () => {
    const file = writeConfig();
    expect(toggleMode(file)).toBe('whitelist');
    expect(toggleMode(file)).toBe('blocklist');
    expect(toggleLogging(file)).toBe(false);
    expect(readSettings(file).loggingEnabled).toBe(false);
  });
});

describe('log views', () => {
  const LOG = [
    '[2026-01-01T00:00:00.000Z] COMMAND BLOCK: rm -rf / | Recursive force delete from root',
    '[2026-01-01T00:00:01.000Z] WRITE ALLOW: /tmp/a | Path is in safe zone: /tmp/**',
    'garbage',
    '[2026-01-01T00:00:02.000Z] WRITE BLOCK: /etc/hosts | System configuration',
    '',
  ].join('\n');

  it('returns the last n lines', () => {
    const file = path.join(tempDir(), 'guard.log');
    writeFileSync(file, LOG);
    expect(readRecentLogs(file, 2)).toEqual([
      'garbage',
      '[2026-01-01T00:00:02.000Z] WRITE BLOCK: /etc/hosts | System configuration',
    ]);
    expect(readRecentLogs(path.join(tempDir(), 'none.log'))).toEqual([]);
  });

  it('counts decisions', () => {
    const file = path.join(tempDir(), 'guard.log');
    writeFileSync(file, LOG);
    expect(countStats(file)).toEqual({ total: 4, blocks: 2, allows: 1 });
  });
});
