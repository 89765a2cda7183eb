import { createHmac, timingSafeEqual } from 'node:crypto'

export const SIGNATURE_HEADER = 'X-Notify-Signature'
export const TIMESTAMP_HEADER = 'X-Notify-Timestamp'

/**
 * HMAC-SHA256 over `${timestamp}.${body}` keyed with the subscription
 * secret, formatted as `sha256=<hex>`.
 */
export function signPayload(
  secret: string,
  timestamp: number,
  body: string,
): string {
  const digest = createHmac('sha256', secret)
    .update(`${timestamp}.${body}`)
    .digest('hex')
  return `sha256=${digest}`
}

/**
 * Receiver-side check of the signature headers, for subscriber endpoints
 * built on this package. The service itself only signs.
 */
export function verifySignature(
  secret: string,
  timestamp: number,
  body: string,
  signature: string,
): boolean {
  const expected = Buffer.from(signPayload(secret, timestamp, body))
  const actual = Buffer.from(signature)
  return expected.length === actual.length && timingSafeEqual(expected, actual)
}
