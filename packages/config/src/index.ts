import { z } from 'zod'

/**
 * Feasibility validation options (RFC8955 §6, RFC9117 §4.1).
 *
 * `allowNoDestPrefix` relaxes rule (a): a FlowSpec rule without a
 * destination-prefix component is accepted, and rules (b)/(c) are skipped.
 *
 * `emptyAsPathRelaxation` lets an iBGP or locally originated rule with an
 * empty AS_PATH bypass the originator check (RFC9117 §4.1 b.2.1).
 */
export const FeasibilityConfigSchema = z.object({
  allowNoDestPrefix: z.boolean().default(false),
  emptyAsPathRelaxation: z.boolean().default(true),
})

export type FeasibilityOptions = z.infer<typeof FeasibilityConfigSchema>

/**
 * Top-level Flowgate configuration
 */
export const FlowgateConfigSchema = z.object({
  feasibility: FeasibilityConfigSchema.default({
    allowNoDestPrefix: false,
    emptyAsPathRelaxation: true,
  }),
})

export type FlowgateConfig = z.infer<typeof FlowgateConfigSchema>

const TRUE_VALUES = ['true', '1']
const FALSE_VALUES = ['false', '0']

function parseBooleanEnv(name: string): boolean | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw === '') return undefined
  const value = raw.trim().toLowerCase()
  if (TRUE_VALUES.includes(value)) return true
  if (FALSE_VALUES.includes(value)) return false
  throw new Error(`${name} must be one of true, false, 1, 0 (got "${raw}")`)
}

/**
 * Loads the default configuration from environment variables.
 *
 * - `FLOWGATE_ALLOW_NO_DEST_PREFIX`
 * - `FLOWGATE_EMPTY_AS_PATH_RELAXATION`
 *
 * Unset variables fall back to the schema defaults.
 */
export function loadDefaultConfig(): FlowgateConfig {
  return FlowgateConfigSchema.parse({
    feasibility: {
      allowNoDestPrefix: parseBooleanEnv('FLOWGATE_ALLOW_NO_DEST_PREFIX'),
      emptyAsPathRelaxation: parseBooleanEnv('FLOWGATE_EMPTY_AS_PATH_RELAXATION'),
    },
  })
}
