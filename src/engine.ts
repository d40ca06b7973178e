import type { Logger } from './logger.js';
import { normalizeCandidate } from './path-matcher.js';
import type {
  AccessRequest,
  CommandRequest,
  CompiledRule,
  Request,
  Rule,
  RuleSet,
  Verdict,
} from './types.js';

export const REASON_EVALUATION_FAILED =
  'policy evaluation failed, blocking by default';
export const REASON_NOT_IN_SAFE_ZONE = 'not in an explicit safe zone';
export const REASON_NO_RESTRICTION = 'no matching restriction';
export const REASON_COMMAND_PASSED = 'command passed security checks';

export interface EvaluateOptions {
  logger?: Logger;
}

function firstMatch<R extends Rule>(
  rules: readonly CompiledRule<R>[],
  subject: string
): R | null {
  for (const compiled of rules) {
    if (compiled.test(subject)) return compiled.rule;
  }
  return null;
}

function allow(reason: string, matchedRule?: Rule): Verdict {
  return matchedRule
    ? { decision: 'ALLOW', reason, matchedRule }
    : { decision: 'ALLOW', reason };
}

function block(reason: string, matchedRule?: Rule): Verdict {
  return matchedRule
    ? { decision: 'BLOCK', reason, matchedRule }
    : { decision: 'BLOCK', reason };
}

function evaluateCommand(request: CommandRequest, ruleSet: RuleSet): Verdict {
  const rule = firstMatch(ruleSet.dangerousCommands, request.command);
  if (rule) {
    return block(
      rule.reason ?? `Matches dangerous command pattern: ${rule.pattern}`,
      rule
    );
  }
  // Mode only governs path access; commands have no zones.
  return allow(REASON_COMMAND_PASSED);
}

function evaluateAccess(request: AccessRequest, ruleSet: RuleSet): Verdict {
  const subject = normalizeCandidate(request.path, {
    ...ruleSet.pathOptions,
    cwd: request.cwd,
  });

  const zone = firstMatch(ruleSet.safeZones, subject);
  if (zone) {
    return allow(zone.reason ?? `Path is in safe zone: ${zone.pattern}`, zone);
  }

  const rule = firstMatch(ruleSet.protectedPaths, subject);
  if (rule) {
    const reason =
      rule.reason ?? `Path matches protected pattern: ${rule.pattern}`;
    switch (rule.level) {
      case 'block':
        return block(reason, rule);
      case 'read_only':
        return request.mode === 'write'
          ? block(reason, rule)
          : allow(reason, rule);
      case 'allow':
        return allow(reason, rule);
    }
  }

  return ruleSet.settings.mode === 'whitelist'
    ? block(REASON_NOT_IN_SAFE_ZONE)
    : allow(REASON_NO_RESTRICTION);
}

/**
 * Decide a single request. Within a category the first rule in document
 * order wins; safe zones outrank protected paths, which outrank the mode
 * default. If a matcher throws, the request is blocked.
 */
export function evaluate(
  request: Request,
  ruleSet: RuleSet,
  options: EvaluateOptions = {}
): Verdict {
  try {
    return request.kind === 'command'
      ? evaluateCommand(request, ruleSet)
      : evaluateAccess(request, ruleSet);
  } catch (err) {
    options.logger?.error({ err, kind: request.kind }, 'Rule evaluation failed');
    return block(REASON_EVALUATION_FAILED);
  }
}
