import {z} from 'zod'
import {getCourseDataPath, getCoursemateHome, getUsageLedgerPath} from './paths.js'

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()
// Largest delay setTimeout honours; longer ones fire after 1ms.
const timeoutMs = positiveInt.max(2_147_483_647)

const optionalTrimmed = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const modelPriceSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative()
})

export type ModelPrice = z.infer<typeof modelPriceSchema>

export const appConfigSchema = z
  .object({
    provider: z.enum(['mock', 'openai']).default('openai'),
    model: optionalTrimmed,
    baseURL: optionalTrimmed,
    homeDir: z.string().default(() => getCoursemateHome()),
    ledgerFile: optionalTrimmed,
    dataFile: optionalTrimmed,
    runtime: z
      .object({
        modelTimeoutMs: timeoutMs.default(45_000),
        modelRetryCount: nonNegativeInt.default(2),
        toolTimeoutMs: timeoutMs.default(30_000),
        maxIterations: positiveInt.default(8),
        temperature: z.coerce.number().min(0).max(2).default(0.3),
        maxOutputTokens: positiveInt.default(4096)
      })
      .default({}),
    pricing: z.record(z.string(), modelPriceSchema).default({})
  })
  .transform((config) => ({
    ...config,
    ledgerFile: config.ledgerFile ?? getUsageLedgerPath(config.homeDir),
    dataFile: config.dataFile ?? getCourseDataPath(config.homeDir)
  }))

export type AppConfig = z.infer<typeof appConfigSchema>
export type RuntimeConfig = AppConfig['runtime']
