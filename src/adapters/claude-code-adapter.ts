/**
 * PreToolUse hook protocol: the host writes
 * `{"tool_name": "Bash", "tool_input": {"command": "..."}, "cwd": "..."}`
 * to stdin and reads the exit status. 0 allows silently; 2 blocks and
 * surfaces stderr to the agent.
 */

import { z } from 'zod';
import type { AuditLog } from '../audit.js';
import { REASON_EVALUATION_FAILED } from '../engine.js';
import { PayloadError } from '../errors.js';
import { createGuard } from '../guard.js';
import type { Logger } from '../logger.js';
import type { Request, RuleSet } from '../types.js';

export const EXIT_ALLOW = 0;
export const EXIT_BLOCK = 2;

export const MESSAGE_PREFIX = '[tool-guard]';

export const COMMAND_TOOLS = ['Bash'];

/** Host tools that create or modify files */
export const WRITE_TOOLS = ['Edit', 'Write', 'MultiEdit', 'NotebookEdit'];

const PATH_KEYS = ['file_path', 'path', 'target', 'file', 'notebook_path'];

const payloadSchema = z.object({
  tool_name: z.string().min(1),
  tool_input: z.record(z.unknown()),
  cwd: z.string().optional(),
});

export interface HookResult {
  exitCode: typeof EXIT_ALLOW | typeof EXIT_BLOCK;
  stderr: string;
}

export interface HookOptions {
  /** Called once per payload; a throw blocks the call */
  loadRuleSet: () => RuleSet;
  logger?: Logger;
  audit?: AuditLog | null;
  now?: () => Date;
}

function extractPath(input: Record<string, unknown>): string | null {
  for (const key of PATH_KEYS) {
    const val = input[key];
    if (typeof val === 'string' && val !== '') return val;
  }
  return null;
}

export function parseHookPayload(raw: string): Request {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PayloadError('Hook payload is not valid JSON', { cause: err });
  }

  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new PayloadError(
      `Hook payload has an unexpected shape: ${parsed.error.issues
        .map((i) => i.path.join('.') || '<root>')
        .join(', ')}`,
      { cause: parsed.error }
    );
  }
  const { tool_name: toolName, tool_input: input, cwd } = parsed.data;

  if (COMMAND_TOOLS.includes(toolName)) {
    const command = input.command;
    if (typeof command !== 'string') {
      throw new PayloadError(`${toolName} call has no command`);
    }
    return { kind: 'command', command };
  }

  if (WRITE_TOOLS.includes(toolName)) {
    const target = extractPath(input);
    if (!target) {
      throw new PayloadError(`${toolName} call has no file path`);
    }
    return cwd === undefined
      ? { kind: 'access', path: target, mode: 'write' }
      : { kind: 'access', path: target, mode: 'write', cwd };
  }

  throw new PayloadError(`Unexpected tool: ${toolName}`);
}

function blocked(reason: string): HookResult {
  return {
    exitCode: EXIT_BLOCK,
    stderr: `${MESSAGE_PREFIX} BLOCKED: ${reason}\n`,
  };
}

/**
 * One tool call in, one exit status out. Any failure before a verdict
 * exists, a bad payload or an unloadable config included, blocks.
 */
export function handleHookPayload(raw: string, options: HookOptions): HookResult {
  const logger = options.logger?.child({ component: 'hook' });
  try {
    const request = parseHookPayload(raw);
    const ruleSet = options.loadRuleSet();
    const guard = createGuard(ruleSet, {
      audit: options.audit,
      logger: options.logger,
      now: options.now,
    });
    const verdict = guard(request);
    if (verdict.decision === 'BLOCK') return blocked(verdict.reason);
    return { exitCode: EXIT_ALLOW, stderr: '' };
  } catch (err) {
    logger?.error({ err }, 'Hook evaluation failed');
    return blocked(REASON_EVALUATION_FAILED);
  }
}
