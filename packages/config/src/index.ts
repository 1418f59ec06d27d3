// Shared configuration: training options resolved from the environment.

export {
  resolveTrainingConfig,
  toBuildOptions,
  isLevelEnabled,
  trainingEnvSchema,
  ConfigError,
  DEFAULT_TRAINING_CONFIG,
  LOG_LEVELS,
  TRAINING_ENV_KEYS,
  type TrainingConfig,
  type LogLevel,
} from './training.js'
