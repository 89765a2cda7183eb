import { z } from 'zod'

export const TokenQuerySchema = z.object({
  path: z.string().startsWith('/', 'Path must start with /'),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).default('GET'),
  force: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
})

export const TokenResponseSchema = z.object({
  token: z.string(),
  header: z.string(),
  version: z.string(),
})

export type TokenQuery = z.infer<typeof TokenQuerySchema>
export type TokenResponse = z.infer<typeof TokenResponseSchema>
