import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pino } from 'pino';
import { parseRuleSet, type LoadOptions } from '../src/rules.js';
import type { RuleSet } from '../src/types.js';

export const HOME = '/home/tester';

export function silentLogger() {
  return pino({ level: 'silent' });
}

/** Build a rule set from a plain document; JSON is valid YAML. */
export function ruleSetFrom(
  document: Record<string, unknown>,
  options: LoadOptions = {}
): RuleSet {
  return parseRuleSet(JSON.stringify(document), 'test', {
    home: HOME,
    env: {},
    ...options,
  });
}

export function tempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'tool-guard-'));
}
