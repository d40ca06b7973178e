import type { PathMatchOptions } from './path-matcher.js';

export type Decision = 'ALLOW' | 'BLOCK';

/** Global posture: 'blocklist' denies only listed paths, 'whitelist' only permits safe zones. */
export type GuardMode = 'blocklist' | 'whitelist';

export type AccessMode = 'read' | 'write';

export type PathLevel = 'block' | 'read_only' | 'allow';

export type RuleCategory = 'dangerous_command' | 'protected_path' | 'safe_zone';

export interface DangerousCommandRule {
  readonly category: 'dangerous_command';
  /** Regular expression, searched anywhere in the command text */
  readonly pattern: string;
  readonly reason?: string;
}

export interface ProtectedPathRule {
  readonly category: 'protected_path';
  /** Glob pattern; `~` expands to the home directory */
  readonly pattern: string;
  readonly level: PathLevel;
  readonly reason?: string;
}

export interface SafeZoneRule {
  readonly category: 'safe_zone';
  readonly pattern: string;
  /** Kept for round-tripping only; a safe zone always allows. */
  readonly level: PathLevel;
  readonly reason?: string;
}

export type Rule = DangerousCommandRule | ProtectedPathRule | SafeZoneRule;

export interface Settings {
  readonly mode: GuardMode;
  readonly loggingEnabled: boolean;
  readonly logPath: string;
}

/**
 * A rule paired with its compiled matcher and its position within its
 * category. Path rules test already-normalized absolute paths.
 */
export interface CompiledRule<R extends Rule = Rule> {
  readonly rule: R;
  readonly index: number;
  test(subject: string): boolean;
}

export interface RuleSet {
  readonly settings: Settings;
  readonly dangerousCommands: readonly CompiledRule<DangerousCommandRule>[];
  readonly protectedPaths: readonly CompiledRule<ProtectedPathRule>[];
  readonly safeZones: readonly CompiledRule<SafeZoneRule>[];
  /** Home and environment used to expand patterns; candidates get the same */
  readonly pathOptions: Readonly<PathMatchOptions>;
  /** Where the rules came from, for diagnostics */
  readonly origin: string;
}

export interface CommandRequest {
  readonly kind: 'command';
  readonly command: string;
}

export interface AccessRequest {
  readonly kind: 'access';
  readonly path: string;
  readonly mode: AccessMode;
  /** Base for relative paths; defaults to the process working directory */
  readonly cwd?: string;
}

export type Request = CommandRequest | AccessRequest;

export interface Verdict {
  decision: Decision;
  reason: string;
  /** The rule that decided the outcome, when one did */
  matchedRule?: Rule;
}

export interface AuditRecord {
  timestamp: Date;
  kind: 'COMMAND' | 'WRITE' | 'READ';
  summary: string;
  decision: Decision;
  reason: string;
}
