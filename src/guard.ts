import { createAuditLog, NOOP_AUDIT_LOG, type AuditLog } from './audit.js';
import { evaluate } from './engine.js';
import type { Logger } from './logger.js';
import type { Request, RuleSet, Verdict } from './types.js';

export type Guard = (request: Request) => Verdict;

export interface GuardOptions {
  /** Overrides the audit log built from the rule set's settings */
  audit?: AuditLog | null;
  logger?: Logger;
  now?: () => Date;
}

function resolveAudit(ruleSet: RuleSet, options: GuardOptions): AuditLog {
  if (options.audit === null) return NOOP_AUDIT_LOG;
  if (options.audit) return options.audit;
  return createAuditLog({
    path: ruleSet.settings.logPath,
    enabled: ruleSet.settings.loggingEnabled,
    logger: options.logger,
    now: options.now,
  });
}

/**
 * Bind a rule set to an audit log. The returned function is synchronous and
 * holds no state between calls, so it serves a one-shot hook process and an
 * embedding host alike.
 */
export function createGuard(ruleSet: RuleSet, options: GuardOptions = {}): Guard {
  const audit = resolveAudit(ruleSet, options);
  const logger = options.logger?.child({ component: 'guard' });

  return (request) => {
    const verdict = evaluate(request, ruleSet, { logger });
    try {
      audit.record(verdict, request);
    } catch (err) {
      logger?.warn({ err }, 'Audit log rejected record');
    }
    logger?.debug(
      { kind: request.kind, decision: verdict.decision, reason: verdict.reason },
      'Decision'
    );
    return verdict;
  };
}
