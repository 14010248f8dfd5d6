import {z} from 'zod'
import {getChatweaveHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()

const optionalTrimmed = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const appConfigSchema = z.object({
  provider: z.enum(['mock', 'openai']).default('openai'),
  model: optionalTrimmed,
  baseURL: optionalTrimmed,
  systemPrompt: optionalTrimmed,
  workspace: z.string().default(process.cwd()),
  homeDir: z.string().default(getChatweaveHome()),
  knownFunctionNames: z.array(z.string().trim().min(1)).default([]),
  runtime: z
    .object({
      requestTimeoutMs: positiveInt.default(45_000),
      maxToolRounds: positiveInt.default(8),
      sessionLog: z.boolean().default(true)
    })
    .default({})
})

export type AppConfig = z.infer<typeof appConfigSchema>
