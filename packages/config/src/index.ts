// Runtime policy for the buffer-sequence gates: env flags, defaults and
// validated per-call overrides.

export {
  resolveConfig,
  resolveFlag,
  readEnvFlag,
  traitsConfigSchema,
  traitsConfigOverridesSchema,
  DEFAULT_CONFIG,
  ENV_KEYS,
  type TraitsConfig,
  type TraitsConfigKey,
} from './policy'
