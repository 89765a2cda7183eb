import { z } from 'zod'

/**
 * Validates a URL restricted to http/https schemes.
 * Restricts to http/https to mitigate SSRF risk from exotic URL schemes.
 */
export const HttpUrlSchema = z.string().refine(
  (s) => {
    try {
      const url = new URL(s)
      return url.protocol === 'http:' || url.protocol === 'https:'
    } catch {
      return false
    }
  },
  { message: 'Must be a valid http(s) URL' },
)
