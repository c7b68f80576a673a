import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const HOUR_MS = 60 * 60 * 1000;

export const governanceConfigSchema = z.object({
  windowDuration: z.number().int().positive(),
  maxRequestsPerWindow: z.number().int().positive(),
  minInterCallDelay: z.number().int().nonnegative(),
  burstThreshold: z.number().int().positive(),
  burstInterval: z.number().int().nonnegative(),
  burstCooldown: z.number().int().nonnegative(),
  baseDelay: z.number().nonnegative(),
  multiplier: z.number().min(1),
  delayCeiling: z.number().nonnegative(),
  jitterRatio: z.number().min(0).lt(1),
  maxAttempts: z.number().int().positive(),
  topN: z.number().int().positive(),
});

export type GovernanceConfig = z.infer<typeof governanceConfigSchema>;
export type GovernanceKey = keyof GovernanceConfig;

export type LimiterConfig = Pick<
  GovernanceConfig,
  'windowDuration' | 'maxRequestsPerWindow' | 'minInterCallDelay' | 'burstThreshold' | 'burstInterval' | 'burstCooldown'
>;

export type BackoffConfig = Pick<GovernanceConfig, 'baseDelay' | 'multiplier' | 'delayCeiling' | 'jitterRatio' | 'maxAttempts'>;

// Graph API allows 200 calls per user per rolling hour; stay at 90% of it.
export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = {
  windowDuration: HOUR_MS,
  maxRequestsPerWindow: 180,
  minInterCallDelay: 2000,
  burstThreshold: 10,
  burstInterval: 10_000,
  burstCooldown: 60_000,
  baseDelay: 5000,
  multiplier: 2,
  delayCeiling: 300_000,
  jitterRatio: 0.3,
  maxAttempts: 3,
  topN: 10,
};

export const GOVERNANCE_ENV_VARIABLES: Record<GovernanceKey, string> = {
  windowDuration: 'PP_WINDOW_MS',
  maxRequestsPerWindow: 'PP_MAX_REQUESTS',
  minInterCallDelay: 'PP_MIN_DELAY_MS',
  burstThreshold: 'PP_BURST_THRESHOLD',
  burstInterval: 'PP_BURST_INTERVAL_MS',
  burstCooldown: 'PP_BURST_COOLDOWN_MS',
  baseDelay: 'PP_BACKOFF_BASE_MS',
  multiplier: 'PP_BACKOFF_MULTIPLIER',
  delayCeiling: 'PP_BACKOFF_CEILING_MS',
  jitterRatio: 'PP_JITTER_RATIO',
  maxAttempts: 'PP_MAX_ATTEMPTS',
  topN: 'PP_TOP_N',
};

export function isGovernanceKey(key: string): key is GovernanceKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_GOVERNANCE_CONFIG, key);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

/**
 * Read numeric overrides from the environment. Unparseable values are kept as NaN
 * so validation reports them instead of silently falling back.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<GovernanceConfig> {
  const overrides: Partial<GovernanceConfig> = {};

  for (const [key, variable] of Object.entries(GOVERNANCE_ENV_VARIABLES)) {
    const raw = env[variable];
    if (raw !== undefined && raw.trim() !== '' && isGovernanceKey(key)) {
      overrides[key] = Number(raw);
    }
  }

  return overrides;
}

export function parseGovernanceOverrides(input: unknown): Partial<GovernanceConfig> {
  const result = governanceConfigSchema.partial().safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export interface LoadGovernanceConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Applied in order after the environment; later entries win. */
  overrides?: Array<Partial<GovernanceConfig> | undefined>;
}

export function loadGovernanceConfig(options: LoadGovernanceConfigOptions = {}): GovernanceConfig {
  const merged: Partial<GovernanceConfig> = {
    ...DEFAULT_GOVERNANCE_CONFIG,
    ...readEnvOverrides(options.env ?? process.env),
  };

  for (const layer of options.overrides ?? []) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined && isGovernanceKey(key)) {
        merged[key] = value;
      }
    }
  }

  const result = governanceConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
