/**
 * Subscriber Push Channel
 *
 * POSTs one notification payload to one subscriber endpoint, signed with the
 * subscription secret so the receiver can verify its origin.
 */

import type {
  DeliverySender,
  DeliveryTarget,
} from '@root/types/dispatcher.types.js'
import { DispatchFailure, RateLimitError } from '@root/types/errors.js'
import type { NotificationPayload } from '@root/types/platform.types.js'
import { parseRetryAfter } from '@utils/retry-after.js'
import {
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
  signPayload,
} from '@utils/signing.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'

export interface SubscriberPushOptions {
  timeoutMs: number
  log: FastifyBaseLogger
  /** Clock in milliseconds, used for the signature timestamp */
  now?: () => number
}

/**
 * Sends a payload to a single subscriber endpoint.
 *
 * @throws RateLimitError on 429, carrying the Retry-After hint
 * @throws DispatchFailure on any other non-2xx response or transport error
 */
export async function sendToSubscriber(
  target: DeliveryTarget,
  payload: NotificationPayload,
  options: SubscriberPushOptions,
  signal?: AbortSignal,
): Promise<void> {
  const now = options.now ?? Date.now
  const timestamp = Math.floor(now() / 1000)
  const body = JSON.stringify(payload)

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
    [TIMESTAMP_HEADER]: String(timestamp),
    [SIGNATURE_HEADER]: signPayload(target.secret, timestamp, body),
  }

  const timeout = AbortSignal.timeout(options.timeoutMs)

  let response: Response
  try {
    response = await fetch(target.endpoint, {
      method: 'POST',
      headers,
      body,
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    })
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err)
    options.log.debug({ endpoint: target.endpoint, error }, 'Push request error')
    throw new DispatchFailure(`Request failed: ${error}`, undefined, {
      cause: err,
    })
  }

  if (response.status === 429) {
    throw new RateLimitError(
      'Subscriber endpoint rate limited the delivery',
      parseRetryAfter(response.headers.get('retry-after'), now()),
    )
  }

  if (!response.ok) {
    throw new DispatchFailure(
      `HTTP ${response.status}: ${response.statusText}`,
      response.status,
    )
  }

  options.log.debug(
    { endpoint: target.endpoint, sortIndex: payload.data.sort_index },
    'Push delivered',
  )
}

/**
 * Binds the channel options into a DeliverySender for the dispatcher.
 */
export function createSubscriberSender(
  options: SubscriberPushOptions,
): DeliverySender {
  return (target, payload, signal) =>
    sendToSubscriber(target, payload, options, signal)
}
