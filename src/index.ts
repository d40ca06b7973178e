export { evaluate } from './engine.js';
export {
  REASON_COMMAND_PASSED,
  REASON_EVALUATION_FAILED,
  REASON_NO_RESTRICTION,
  REASON_NOT_IN_SAFE_ZONE,
  type EvaluateOptions,
} from './engine.js';
export { createGuard, type Guard, type GuardOptions } from './guard.js';
export {
  compileRuleSet,
  configDocumentSchema,
  loadRuleSet,
  parseRuleSet,
  type ConfigDocument,
  type LoadOptions,
} from './rules.js';
export {
  compilePathPattern,
  matchesPath,
  normalizeCandidate,
  type PathMatchOptions,
  type PathMatcher,
} from './path-matcher.js';
export { compileCommandPattern, matchesCommand } from './command-matcher.js';
export {
  createAuditLog,
  formatAuditLine,
  parseAuditLine,
  NOOP_AUDIT_LOG,
  type AuditLog,
  type AuditLogOptions,
} from './audit.js';
export {
  handleHookPayload,
  parseHookPayload,
  EXIT_ALLOW,
  EXIT_BLOCK,
  COMMAND_TOOLS,
  WRITE_TOOLS,
  type HookOptions,
  type HookResult,
} from './adapters/claude-code-adapter.js';
export {
  countStats,
  readRecentLogs,
  readSettings,
  toggleLogging,
  toggleMode,
  updateSetting,
  type LogStats,
  type SettingKey,
} from './status.js';
export { resolveConfigPath, expandHome } from './config-path.js';
export { createLogger, type Logger } from './logger.js';
export { ConfigError, PayloadError, RulePatternError } from './errors.js';
export type * from './types.js';
