import { describe, it, expect, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import {
  createAuditLog,
  formatAuditLine,
  parseAuditLine,
  summarize,
  toAuditRecord,
} from '../src/audit.js';
import type { Request, Verdict } from '../src/types.js';
import { silentLogger, tempDir } from './helpers.js';

const AT = new Date('2026-01-02T03:04:05.000Z');
const blocked: Verdict = { decision: 'BLOCK', reason: 'Recursive force delete from root' };
const allowed: Verdict = { decision: 'ALLOW', reason: 'no matching restriction' };
const rmRoot: Request = { kind: 'command', command: 'rm -rf /' };
const writeTmp: Request = { kind: 'access', path: '/tmp/out.txt', mode: 'write' };

describe('formatAuditLine', () => {
  it('renders one line per decision', () => {
    expect(formatAuditLine(toAuditRecord(blocked, rmRoot, AT))).toBe(
      '[2026-01-02T03:04:05.000Z] COMMAND BLOCK: rm -rf / | Recursive force delete from root'
    );
    expect(formatAuditLine(toAuditRecord(allowed, writeTmp, AT))).toBe(
      '[2026-01-02T03:04:05.000Z] WRITE ALLOW: /tmp/out.txt | no matching restriction'
    );
  });

  it('labels read requests', () => {
    const record = toAuditRecord(allowed, { kind: 'access', path: '/etc/hosts', mode: 'read' }, AT);
    expect(record.kind).toBe('READ');
  });
});

describe('summarize', () => {
  it('cuts long text at 100 characters', () => {
    expect(summarize('a'.repeat(150))).toBe(`${'a'.repeat(100)}...`);
    expect(summarize('a'.repeat(100))).toBe('a'.repeat(100));
  });

  it('keeps a record on one line', () => {
    expect(summarize('echo a\n  echo b\r\necho c')).toBe('echo a echo b echo c');
  });
});

describe('parseAuditLine', () => {
  it('reads back a formatted line, pipes in the summary included', () => {
    const line = formatAuditLine(
      toAuditRecord(
        { decision: 'ALLOW', reason: 'command passed security checks' },
        { kind: 'command', command: 'cat a | grep b' },
        AT
      )
    );
    expect(parseAuditLine(line)).toEqual({
      timestamp: AT,
      kind: 'COMMAND',
      decision: 'ALLOW',
      summary: 'cat a | grep b',
      reason: 'command passed security checks',
    });
  });

  it('returns null for anything else', () => {
    expect(parseAuditLine('not a log line')).toBeNull();
    expect(parseAuditLine('[yesterday] COMMAND ALLOW: ls | ok')).toBeNull();
  });
});

describe('createAuditLog', () => {
  it('appends a line per record, creating the directory', () => {
    const file = path.join(tempDir(), 'nested', 'guard.log');
    const audit = createAuditLog({ path: file, enabled: true, now: () => AT });
    audit.record(blocked, rmRoot);
    audit.record(allowed, writeTmp);
    expect(readFileSync(file, 'utf-8')).toBe(
      '[2026-01-02T03:04:05.000Z] COMMAND BLOCK: rm -rf / | Recursive force delete from root\n' +
        '[2026-01-02T03:04:05.000Z] WRITE ALLOW: /tmp/out.txt | no matching restriction\n'
    );
  });

  it('writes nothing when disabled', () => {
    const file = path.join(tempDir(), 'guard.log');
    createAuditLog({ path: file, enabled: false }).record(blocked, rmRoot);
    expect(existsSync(file)).toBe(false);
  });

  it('warns instead of throwing when the log cannot be written', () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    // A directory is not appendable.
    const audit = createAuditLog({ path: tempDir(), enabled: true, logger });
    expect(() => audit.record(blocked, rmRoot)).not.toThrow();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
