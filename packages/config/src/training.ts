import { z } from 'zod'
import type { AttributePolicy, BuildTreeOptions, InductionLogger } from '@binary-id3/decision-tree'
import { DEFAULT_ATTRIBUTE_POLICY, DEFAULT_MAX_DEPTH } from '@binary-id3/decision-tree'

/** Log levels in increasing severity. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const ATTRIBUTE_POLICIES = ['reuse', 'exclude-ancestors'] as const satisfies readonly AttributePolicy[]

/** Environment variables read by {@link resolveTrainingConfig}. */
export const TRAINING_ENV_KEYS = [
  'ID3_MAX_DEPTH',
  'ID3_ATTRIBUTE_POLICY',
  'ID3_LOG_LEVEL',
  'ID3_DATASET',
] as const

export const trainingEnvSchema = z.object({
  ID3_MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
  ID3_ATTRIBUTE_POLICY: z.enum(ATTRIBUTE_POLICIES).default(DEFAULT_ATTRIBUTE_POLICY),
  ID3_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ID3_DATASET: z.string().optional(),
})

export interface TrainingConfig {
  maxDepth: number
  attributePolicy: AttributePolicy
  logLevel: LogLevel
  /** Dataset path for the CLI; undefined means the bundled sample. */
  datasetPath: string | undefined
}

export const DEFAULT_TRAINING_CONFIG: Readonly<TrainingConfig> = Object.freeze({
  maxDepth: DEFAULT_MAX_DEPTH,
  attributePolicy: DEFAULT_ATTRIBUTE_POLICY,
  logLevel: 'info',
  datasetPath: undefined,
})

/** Thrown when an environment variable holds a value the schema rejects. */
export class ConfigError extends Error {
  constructor(public readonly issues: readonly z.ZodIssue[]) {
    super(
      'Invalid configuration: ' +
        issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    )
    this.name = 'ConfigError'
  }
}

/**
 * Resolve training configuration from environment variables (defaults to
 * `process.env`). Unset or empty variables fall back to the defaults; any
 * other invalid value fails fast with a ConfigError.
 */
export function resolveTrainingConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Readonly<TrainingConfig> {
  const present: Record<string, string> = {}
  for (const key of TRAINING_ENV_KEYS) {
    const value = env[key]?.trim()
    if (value) present[key] = value
  }

  const result = trainingEnvSchema.safeParse(present)
  if (!result.success) {
    throw new ConfigError(result.error.issues)
  }

  return Object.freeze({
    maxDepth: result.data.ID3_MAX_DEPTH,
    attributePolicy: result.data.ID3_ATTRIBUTE_POLICY,
    logLevel: result.data.ID3_LOG_LEVEL,
    datasetPath: result.data.ID3_DATASET,
  })
}

/** Map a resolved config onto `buildTree` options. */
export function toBuildOptions<A>(
  config: Readonly<TrainingConfig>,
  logger?: InductionLogger<A>,
): BuildTreeOptions<A> {
  return {
    maxDepth: config.maxDepth,
    attributePolicy: config.attributePolicy,
    logger,
  }
}

/** True when `level` is at or above `threshold`. */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
}
