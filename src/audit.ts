/**
 * Append-only, human-readable record of every decision. One line each:
 *
 *   [2026-01-01T12:00:00.000Z] COMMAND BLOCK: rm -rf / | Recursive force delete from root
 *
 * The guard never reads this file back. Write failures are logged and
 * dropped so that telemetry can not change a verdict.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import { expandHome } from './config-path.js';
import type { Logger } from './logger.js';
import type { AuditRecord, Request, Verdict } from './types.js';

export const MAX_SUMMARY_LENGTH = 100;

export interface AuditLog {
  record(verdict: Verdict, request: Request): void;
}

export interface AuditLogOptions {
  path: string;
  enabled: boolean;
  logger?: Logger;
  now?: () => Date;
}

export function summarize(text: string): string {
  const flat = text.replace(/\s*[\r\n]+\s*/g, ' ');
  return flat.length > MAX_SUMMARY_LENGTH
    ? `${flat.slice(0, MAX_SUMMARY_LENGTH)}...`
    : flat;
}

export function toAuditRecord(
  verdict: Verdict,
  request: Request,
  timestamp: Date
): AuditRecord {
  return {
    timestamp,
    kind:
      request.kind === 'command'
        ? 'COMMAND'
        : request.mode === 'write'
          ? 'WRITE'
          : 'READ',
    summary: summarize(request.kind === 'command' ? request.command : request.path),
    decision: verdict.decision,
    reason: verdict.reason,
  };
}

export function formatAuditLine(record: AuditRecord): string {
  return `[${record.timestamp.toISOString()}] ${record.kind} ${record.decision}: ${record.summary} | ${record.reason}`;
}

export function createAuditLog(options: AuditLogOptions): AuditLog {
  const { enabled, logger, now = () => new Date() } = options;
  const logPath = path.resolve(expandHome(options.path));

  return {
    record(verdict, request) {
      if (!enabled) return;
      const line = formatAuditLine(toAuditRecord(verdict, request, now()));
      try {
        mkdirSync(path.dirname(logPath), { recursive: true });
        appendFileSync(logPath, `${line}\n`, { flag: 'a' });
      } catch (err) {
        logger?.warn({ err, path: logPath }, 'Audit log write failed');
      }
    },
  };
}

/** An audit log that drops everything, for embedding without a log file. */
export const NOOP_AUDIT_LOG: AuditLog = { record() {} };

const LINE_PATTERN = /^\[([^\]]+)\] (COMMAND|WRITE|READ) (ALLOW|BLOCK): (.*)$/;

function isKind(value: string): value is AuditRecord['kind'] {
  return value === 'COMMAND' || value === 'WRITE' || value === 'READ';
}

/**
 * Inverse of formatAuditLine for the status view. Summaries may contain
 * ` | ` (piped commands), so the reason is taken after the last separator.
 */
export function parseAuditLine(line: string): AuditRecord | null {
  const m = LINE_PATTERN.exec(line.trimEnd());
  if (!m) return null;
  const [, stamp, kind, decision, rest] = m;
  const timestamp = new Date(stamp);
  const sep = rest.lastIndexOf(' | ');
  if (Number.isNaN(timestamp.getTime()) || sep < 0 || !isKind(kind)) {
    return null;
  }
  return {
    timestamp,
    kind,
    decision: decision === 'BLOCK' ? 'BLOCK' : 'ALLOW',
    summary: rest.slice(0, sep),
    reason: rest.slice(sep + 3),
  };
}
