/**
 * Configuration Module
 *
 * Resolves orchestrator configuration from environment variables and
 * explicit overrides, validated with zod. Overrides win over env; env
 * wins over defaults.
 *
 * Environment variables:
 * - QF_SESSION_DIR            session store root (default: .sessions)
 * - QF_SESSION_MAX_AGE_MS     profiles older than this load as expired
 * - QF_TIMEOUT_MS             per-attempt response timeout (default: 60000)
 * - QF_POLL_INTERVAL_MS       response poll interval (default: 1000)
 * - QF_STABLE_POLLS           unchanged polls before "done" (default: 3)
 * - QF_MAX_RETRIES            attempts per service (default: 3)
 * - QF_INPUT_RETRIES          attempts when input cannot be located (default: 2)
 * - QF_BACKOFF                fixed | exponential (default: exponential)
 * - QF_BACKOFF_BASE_MS        first retry delay (default: 2000)
 * - QF_BACKOFF_MAX_MS         retry delay cap (default: 30000)
 * - QF_RATE_LIMIT_DELAY_MS    delay after a rate limit signal (default: 60000)
 * - QF_S3_BUCKET / QF_S3_PREFIX / AWS_REGION / QF_S3_ENDPOINT  audit storage
 * - ANTHROPIC_API_KEY / ANTHROPIC_MODEL                        summarizer
 */

import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

export const BackoffSchema = z.object({
  strategy: z.enum(['fixed', 'exponential']),
  baseDelayMs: nonNegativeInt,
  maxDelayMs: nonNegativeInt,
  rateLimitDelayMs: nonNegativeInt,
});

export const OrchestratorConfigSchema = z.object({
  sessionDir: z.string().min(1),
  sessionMaxAgeMs: positiveInt.nullable(),
  timeoutMs: positiveInt,
  pollIntervalMs: positiveInt,
  stablePolls: positiveInt,
  maxRetriesPerService: positiveInt,
  inputRetries: positiveInt,
  backoff: BackoffSchema,
  storage: z.discriminatedUnion('type', [
    z.object({ type: z.literal('memory') }),
    z.object({
      type: z.literal('s3'),
      bucket: z.string().min(1),
      region: z.string().min(1),
      prefix: z.string().min(1),
      endpoint: z.string().url().optional(),
    }),
  ]),
  summarizer: z
    .object({
      apiKey: z.string().min(1),
      model: z.string().min(1),
    })
    .nullable(),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type BackoffConfig = z.infer<typeof BackoffSchema>;

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

/**
 * Defaults applied when neither env nor overrides set a value
 */
export const DEFAULT_CONFIG: OrchestratorConfig = {
  sessionDir: '.sessions',
  sessionMaxAgeMs: null,
  timeoutMs: 60000,
  pollIntervalMs: 1000,
  stablePolls: 3,
  maxRetriesPerService: 3,
  inputRetries: 2,
  backoff: {
    strategy: 'exponential',
    baseDelayMs: 2000,
    maxDelayMs: 30000,
    rateLimitDelayMs: 60000,
  },
  storage: { type: 'memory' },
  summarizer: null,
};

export type ConfigOverrides = Partial<Omit<OrchestratorConfig, 'backoff'>> & {
  backoff?: Partial<BackoffConfig>;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

type Env = Record<string, string | undefined>;

type RawConfig = Record<string, unknown> & { backoff: Record<string, unknown> };

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the raw (unvalidated) configuration from environment variables
 */
function fromEnv(env: Env): RawConfig {
  const bucket = readEnv(env, 'QF_S3_BUCKET');
  const apiKey = readEnv(env, 'ANTHROPIC_API_KEY');
  const endpoint = readEnv(env, 'QF_S3_ENDPOINT');

  return {
    sessionDir: readEnv(env, 'QF_SESSION_DIR') ?? DEFAULT_CONFIG.sessionDir,
    sessionMaxAgeMs: readEnv(env, 'QF_SESSION_MAX_AGE_MS') ?? DEFAULT_CONFIG.sessionMaxAgeMs,
    timeoutMs: readEnv(env, 'QF_TIMEOUT_MS') ?? DEFAULT_CONFIG.timeoutMs,
    pollIntervalMs: readEnv(env, 'QF_POLL_INTERVAL_MS') ?? DEFAULT_CONFIG.pollIntervalMs,
    stablePolls: readEnv(env, 'QF_STABLE_POLLS') ?? DEFAULT_CONFIG.stablePolls,
    maxRetriesPerService: readEnv(env, 'QF_MAX_RETRIES') ?? DEFAULT_CONFIG.maxRetriesPerService,
    inputRetries: readEnv(env, 'QF_INPUT_RETRIES') ?? DEFAULT_CONFIG.inputRetries,
    backoff: {
      strategy: readEnv(env, 'QF_BACKOFF') ?? DEFAULT_CONFIG.backoff.strategy,
      baseDelayMs: readEnv(env, 'QF_BACKOFF_BASE_MS') ?? DEFAULT_CONFIG.backoff.baseDelayMs,
      maxDelayMs: readEnv(env, 'QF_BACKOFF_MAX_MS') ?? DEFAULT_CONFIG.backoff.maxDelayMs,
      rateLimitDelayMs: readEnv(env, 'QF_RATE_LIMIT_DELAY_MS') ?? DEFAULT_CONFIG.backoff.rateLimitDelayMs,
    },
    storage: bucket
      ? {
          type: 's3',
          bucket,
          region: readEnv(env, 'AWS_REGION') ?? 'us-east-1',
          prefix: readEnv(env, 'QF_S3_PREFIX') ?? 'queries',
          ...(endpoint ? { endpoint } : {}),
        }
      : { type: 'memory' },
    summarizer: apiKey
      ? { apiKey, model: readEnv(env, 'ANTHROPIC_MODEL') ?? DEFAULT_MODEL }
      : null,
  };
}

/**
 * Load and validate configuration
 *
 * @param env - Environment variables (defaults to process.env)
 * @param overrides - Values that take precedence over the environment
 * @returns Validated configuration
 * @throws ConfigError listing every offending key
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {}
): OrchestratorConfig {
  const base = fromEnv(env);
  const { backoff: backoffOverrides, ...rest } = overrides;

  const raw = {
    ...base,
    ...rest,
    backoff: { ...base.backoff, ...backoffOverrides },
  };

  const parsed = OrchestratorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  if (parsed.data.backoff.maxDelayMs < parsed.data.backoff.baseDelayMs) {
    throw new ConfigError(['backoff.maxDelayMs: must be >= backoff.baseDelayMs']);
  }

  return parsed.data;
}
