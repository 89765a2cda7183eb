import { z } from 'zod'

export const CreateTargetSchema = z.object({
  handle: z
    .string()
    .trim()
    .min(1, 'Handle is required')
    .max(64, 'Handle must be at most 64 characters'),
  authToken: z.string().min(1, 'authToken is required'),
  csrfToken: z.string().min(1, 'csrfToken is required'),
})

// Credentials are write-only and never part of a response
export const TargetSchema = z.object({
  id: z.number().int(),
  handle: z.string(),
  cursor: z.string().nullable(),
  nextPollAt: z.string().nullable(),
  lastPolledAt: z.string().nullable(),
  consecutiveFailures: z.number().int(),
  lastError: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

export const CreateTargetResponseSchema = z.object({
  success: z.literal(true),
  created: z.boolean(),
  target: TargetSchema,
})

export type CreateTargetBody = z.infer<typeof CreateTargetSchema>
export type TargetResponse = z.infer<typeof TargetSchema>
export type CreateTargetResponse = z.infer<typeof CreateTargetResponseSchema>
