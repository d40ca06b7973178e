import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { compileCommandPattern } from './command-matcher.js';
import { DEFAULT_LOG_PATH } from './config-path.js';
import { ConfigError, RulePatternError } from './errors.js';
import type { Logger } from './logger.js';
import { compilePathPattern, type PathMatchOptions } from './path-matcher.js';
import type {
  CompiledRule,
  DangerousCommandRule,
  ProtectedPathRule,
  Rule,
  RuleSet,
  SafeZoneRule,
  Settings,
} from './types.js';

const TRUE_STRINGS = ['true', 'yes', '1'];
const FALSE_STRINGS = ['false', 'no', '0'];

export const flagSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const lowered = value.trim().toLowerCase();
  if (TRUE_STRINGS.includes(lowered)) return true;
  if (FALSE_STRINGS.includes(lowered)) return false;
  return value;
}, z.boolean());

const levelSchema = z.enum(['block', 'read_only', 'allow']);

const patternSchema = z.string().min(1, 'pattern must be a non-empty string');

/** A blank reason counts as none, so the pattern fallback applies. */
const reasonSchema = z.preprocess(
  (value) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value,
  z.string().optional()
);

const commandRuleSchema = z.object({
  pattern: patternSchema,
  reason: reasonSchema,
});

const protectedPathSchema = commandRuleSchema.extend({
  level: levelSchema.default('block'),
});

const safeZoneSchema = commandRuleSchema.extend({
  level: levelSchema.default('block'),
});

/** `null` (a key with no entries) and a missing key both mean "no rules". */
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((items) => items ?? []);
}

const settingsSchema = z
  .object({
    mode: z.enum(['blocklist', 'whitelist']).default('blocklist'),
    logging_enabled: flagSchema.optional(),
    logging: flagSchema.optional(),
    log_path: z.string().min(1).optional(),
    log_file: z.string().min(1).optional(),
  })
  .nullish()
  .transform(
    (raw): Settings => ({
      mode: raw?.mode ?? 'blocklist',
      loggingEnabled: raw?.logging_enabled ?? raw?.logging ?? true,
      logPath: raw?.log_path ?? raw?.log_file ?? DEFAULT_LOG_PATH,
    })
  );

export const configDocumentSchema = z.object({
  settings: settingsSchema,
  protected_paths: listOf(protectedPathSchema),
  dangerous_commands: listOf(commandRuleSchema),
  safe_zones: listOf(safeZoneSchema),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export interface LoadOptions extends PathMatchOptions {
  logger?: Logger;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

function freezeRule<R extends Rule>(rule: R): R {
  return Object.freeze(rule);
}

function compileEach<R extends Rule>(
  rules: readonly R[],
  compile: (rule: R) => (subject: string) => boolean,
  logger: Logger | undefined
): CompiledRule<R>[] {
  const compiled: CompiledRule<R>[] = [];
  rules.forEach((rule, index) => {
    try {
      const test = compile(rule);
      compiled.push(Object.freeze({ rule, index, test }));
    } catch (err) {
      if (!(err instanceof RulePatternError)) throw err;
      logger?.warn(
        { category: rule.category, index, pattern: rule.pattern, err },
        'Skipping rule with invalid pattern'
      );
    }
  });
  return compiled;
}

/** Turn a validated document into matchers. Every pattern is compiled here, once. */
export function compileRuleSet(
  document: ConfigDocument,
  origin: string,
  options: LoadOptions = {}
): RuleSet {
  const { logger } = options;

  const dangerous = document.dangerous_commands.map(
    (entry): DangerousCommandRule =>
      freezeRule<DangerousCommandRule>({ category: 'dangerous_command', ...entry })
  );
  const protectedPaths = document.protected_paths.map(
    (entry): ProtectedPathRule =>
      freezeRule<ProtectedPathRule>({ category: 'protected_path', ...entry })
  );
  const safeZones = document.safe_zones.map(
    (entry): SafeZoneRule =>
      freezeRule<SafeZoneRule>({ category: 'safe_zone', ...entry })
  );

  const pathOptions: PathMatchOptions = Object.freeze({
    home: options.home,
    env: options.env,
  });
  const pathTest = (rule: ProtectedPathRule | SafeZoneRule) =>
    compilePathPattern(rule.pattern, pathOptions);
  const commandTest = (rule: DangerousCommandRule) => {
    const regex = compileCommandPattern(rule.pattern);
    return (subject: string) => regex.test(subject);
  };

  return Object.freeze({
    settings: Object.freeze({ ...document.settings }),
    dangerousCommands: Object.freeze(compileEach(dangerous, commandTest, logger)),
    protectedPaths: Object.freeze(compileEach(protectedPaths, pathTest, logger)),
    safeZones: Object.freeze(compileEach(safeZones, pathTest, logger)),
    pathOptions,
    origin,
  });
}

/**
 * Parse a YAML (or JSON) config document. An empty document is valid and
 * yields no rules; anything that is not a mapping is a ConfigError.
 */
export function parseRuleSet(
  text: string,
  origin: string,
  options: LoadOptions = {}
): RuleSet {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Unparseable configuration in ${origin}`, origin, {
      cause: err,
    });
  }

  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${origin}: ${formatIssues(result.error)}`,
      origin,
      { cause: result.error }
    );
  }
  return compileRuleSet(result.data, origin, options);
}

export function loadRuleSet(path: string, options: LoadOptions = {}): RuleSet {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Configuration not readable: ${path}`, path, {
      cause: err,
    });
  }
  return parseRuleSet(text, path, options);
}
