#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { handleHookPayload } from './adapters/claude-code-adapter.js';
import { resolveConfigPath } from './config-path.js';
import { createGuard } from './guard.js';
import { createLogger } from './logger.js';
import { loadRuleSet } from './rules.js';
import {
  countStats,
  isSettingKey,
  readRecentLogs,
  readSettings,
  toggleLogging,
  toggleMode,
  updateSetting,
} from './status.js';
import type { Request } from './types.js';

const USAGE = `Usage:
  tool-guard                          read a PreToolUse payload on stdin and decide it
  tool-guard status                   show mode, logging and recent decisions
  tool-guard set <key> <value>        key: mode | logging_enabled | log_path
  tool-guard toggle mode|logging
  tool-guard logs [n]
  tool-guard check command <text>
  tool-guard check read|write <path>`;

function runHook(): number {
  const logger = createLogger();
  let raw = '';
  try {
    raw = readFileSync(0, 'utf-8');
  } catch (err) {
    // An empty payload fails to parse, which blocks.
    logger.error({ err }, 'Could not read hook payload from stdin');
  }
  const result = handleHookPayload(raw, {
    loadRuleSet: () => loadRuleSet(resolveConfigPath(), { logger }),
    logger,
  });
  if (result.stderr) process.stderr.write(result.stderr);
  return result.exitCode;
}

function runStatus(configPath: string): number {
  const settings = readSettings(configPath);
  const stats = countStats(settings.logPath);
  console.log(`Config:   ${configPath}`);
  console.log(
    `Mode:     ${settings.mode === 'whitelist' ? 'WHITELIST (only safe zones)' : 'BLOCKLIST (normal)'}`
  );
  console.log(`Logging:  ${settings.loggingEnabled ? 'enabled' : 'disabled'} (${settings.logPath})`);
  console.log(`Decisions: ${stats.total} total, ${stats.blocks} blocked, ${stats.allows} allowed`);
  const recent = readRecentLogs(settings.logPath, 10);
  if (recent.length > 0) {
    console.log('\nRecent activity:');
    for (const line of recent) console.log(`  ${line}`);
  }
  return 0;
}

function runCheck(configPath: string, args: string[]): number {
  const [what, ...rest] = args;
  const subject = rest.join(' ');
  let request: Request;
  if (what === 'command') {
    request = { kind: 'command', command: subject };
  } else if ((what === 'read' || what === 'write') && subject) {
    request = { kind: 'access', path: subject, mode: what };
  } else {
    console.error(USAGE);
    return 1;
  }
  const logger = createLogger();
  const guard = createGuard(loadRuleSet(configPath, { logger }), {
    audit: null,
    logger,
  });
  const verdict = guard(request);
  console.log(`${verdict.decision}: ${verdict.reason}`);
  return verdict.decision === 'BLOCK' ? 2 : 0;
}

function main(args: string[]): number {
  const [command, ...rest] = args;
  if (command === undefined) return runHook();

  const configPath = resolveConfigPath();
  switch (command) {
    case 'status':
      return runStatus(configPath);
    case 'set': {
      const [key, value] = rest;
      if (!key || value === undefined || !isSettingKey(key)) {
        console.error(USAGE);
        return 1;
      }
      updateSetting(configPath, key, value);
      console.log(`Set ${key} = ${value} in ${configPath}`);
      return 0;
    }
    case 'toggle':
      if (rest[0] === 'mode') {
        console.log(`Mode: ${toggleMode(configPath)}`);
        return 0;
      }
      if (rest[0] === 'logging') {
        console.log(`Logging: ${toggleLogging(configPath) ? 'enabled' : 'disabled'}`);
        return 0;
      }
      console.error(USAGE);
      return 1;
    case 'logs': {
      const n = rest[0] ? Number.parseInt(rest[0], 10) : 20;
      if (Number.isNaN(n)) {
        console.error(USAGE);
        return 1;
      }
      for (const line of readRecentLogs(readSettings(configPath).logPath, n)) {
        console.log(line);
      }
      return 0;
    }
    case 'check':
      return runCheck(configPath, rest);
    case 'help':
    case '--help':
    case '-h':
      console.log(USAGE);
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      console.error(USAGE);
      return 1;
  }
}

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
