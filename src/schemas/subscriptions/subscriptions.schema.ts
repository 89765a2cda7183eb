import { HttpUrlSchema } from '@schemas/common/url.schema.js'
import { z } from 'zod'

export const CreateSubscriptionSchema = z.object({
  targetId: z.number().int().positive(),
  endpoint: HttpUrlSchema,
  secret: z
    .string()
    .min(16, 'Secret must be at least 16 characters')
    .max(256)
    .optional(),
})

export const SubscriptionSchema = z.object({
  id: z.number().int(),
  targetId: z.number().int(),
  endpoint: z.string(),
  createdAt: z.string(),
})

// The secret is returned once, on creation
export const CreateSubscriptionResponseSchema = z.object({
  success: z.literal(true),
  subscription: SubscriptionSchema.extend({
    secret: z.string(),
  }),
})

export type CreateSubscriptionBody = z.infer<typeof CreateSubscriptionSchema>
export type CreateSubscriptionResponse = z.infer<
  typeof CreateSubscriptionResponseSchema
>
