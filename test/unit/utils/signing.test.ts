import { createHmac } from 'node:crypto'
import { signPayload, verifySignature } from '@utils/signing.js'
import { describe, expect, it } from 'vitest'

describe('signing', () => {
  const body = JSON.stringify({ title: 'New Like' })

  it('should sign timestamp and body with HMAC-SHA256', () => {
    const expected = createHmac('sha256', 'test-secret')
      .update(`1700000000.${body}`)
      .digest('hex')

    expect(signPayload('test-secret', 1700000000, body)).toBe(
      `sha256=${expected}`,
    )
  })

  it('should verify its own signatures', () => {
    const signature = signPayload('test-secret', 1700000000, body)
    expect(verifySignature('test-secret', 1700000000, body, signature)).toBe(
      true,
    )
  })

  it('should reject a signature made with another secret or timestamp', () => {
    const signature = signPayload('test-secret', 1700000000, body)
    expect(verifySignature('other-secret', 1700000000, body, signature)).toBe(
      false,
    )
    expect(verifySignature('test-secret', 1700000001, body, signature)).toBe(
      false,
    )
    expect(verifySignature('test-secret', 1700000000, body, 'sha256=00')).toBe(
      false,
    )
  })
})
