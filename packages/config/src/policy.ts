import { z } from 'zod'

/** Runtime policy for the buffer-sequence gates. */
export interface TraitsConfig {
  /** Reject values that are not buffer sequences at all when selecting an element kind. */
  strictSelection: boolean
  /** Emit a structured log line whenever a runtime gate rejects a value. */
  trace: boolean
}

export type TraitsConfigKey = keyof TraitsConfig

/** Environment variable backing each key. */
export const ENV_KEYS: Record<TraitsConfigKey, string> = {
  strictSelection: 'IOVEC_STRICT_SELECTION',
  trace: 'IOVEC_TRACE',
}

/** Defaults match the permissive selector: anything not mutable selects const. */
export const DEFAULT_CONFIG: TraitsConfig = {
  strictSelection: false,
  trace: false,
}

export const traitsConfigSchema = z.object({
  strictSelection: z.boolean(),
  trace: z.boolean(),
}).strict()

export const traitsConfigOverridesSchema = traitsConfigSchema.partial()

export function readEnvFlag(key: string): boolean | undefined {
  if (typeof process !== 'undefined' && process.env) {
    const val = process.env[key]
    if (val === 'true' || val === '1') return true
    if (val === 'false' || val === '0') return false
  }
  return undefined
}

/** Resolve a single key: env override > default. */
export function resolveFlag(key: TraitsConfigKey): boolean {
  return readEnvFlag(ENV_KEYS[key]) ?? DEFAULT_CONFIG[key]
}

/**
 * Resolve the full config: explicit overrides > env > defaults.
 * Throws a ZodError if the overrides have the wrong shape.
 */
export function resolveConfig(overrides: unknown = {}): TraitsConfig {
  const parsed = traitsConfigOverridesSchema.parse(overrides)
  return traitsConfigSchema.parse({
    strictSelection: parsed.strictSelection ?? resolveFlag('strictSelection'),
    trace: parsed.trace ?? resolveFlag('trace'),
  })
}
