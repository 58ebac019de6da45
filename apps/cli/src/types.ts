import { VALID_LOG_LEVELS } from '@fabriclab/telemetry'
import { z } from 'zod'

export type CliResult<T> = { success: true; data: T } | { success: false; error: string }

/** Options every command inherits from the root program. */
export const BaseCliConfigSchema = z.object({
  topology: z.string().min(1).optional(),
  runtime: z.string().min(1).optional(),
  logLevel: z.enum(VALID_LOG_LEVELS).optional(),
})
export type BaseCliConfig = z.infer<typeof BaseCliConfigSchema>

export const UpInputSchema = BaseCliConfigSchema
export type UpInput = z.infer<typeof UpInputSchema>

export const VerifyInputSchema = BaseCliConfigSchema
export type VerifyInput = z.infer<typeof VerifyInputSchema>

export const PlanInputSchema = BaseCliConfigSchema.extend({
  waits: z.boolean().default(true),
})
export type PlanInput = z.infer<typeof PlanInputSchema>
