/**
 * Site-key transaction token strategy.
 *
 * Key material comes from the platform home document: a base64 key in a
 * `<meta>` tag and a marker resource, linked from the same document, that
 * selects which key bytes take part in every token. Tokens are
 *
 *   base64url(mask || (version || time || mac) XOR mask)
 *
 * where `mac` is the first 16 bytes of
 * HMAC-SHA256(key, METHOD!path!time!selected-bytes-hex).
 */
import { createHmac, randomInt } from 'node:crypto'
import { StaleKeyError, TransientNetworkError } from '@root/types/errors.js'
import type {
  SiteKeyCache,
  SiteKeyCacheStatus,
  TransactionTokenStrategy,
} from '@root/types/transaction-token.types.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  extractIndices,
  extractLinkHref,
  extractMetaContent,
} from './site-key-parser.js'

const VERSION_BYTE = 1
const MAC_LENGTH = 16

export interface SiteKeyStrategyOptions {
  baseUrl: string
  metaName: string
  markerRel: string
  ttlMs: number
  requestTimeoutMs: number
  userAgent?: string
  log: FastifyBaseLogger
  /** Clock in milliseconds */
  now?: () => number
  /** Source of the one-byte mask */
  mask?: () => number
}

export class SiteKeyStrategy implements TransactionTokenStrategy {
  readonly version = 'sk1'

  private cache: SiteKeyCache | null = null
  private readonly now: () => number
  private readonly mask: () => number

  constructor(private readonly options: SiteKeyStrategyOptions) {
    this.now = options.now ?? Date.now
    this.mask = options.mask ?? (() => randomInt(0, 256))
  }

  derive(path: string, method: string, timestamp: number): string {
    const cache = this.cache
    if (!cache) {
      throw new StaleKeyError('No site key loaded')
    }
    if (this.now() - cache.fetchedAt >= cache.ttlMs) {
      throw new StaleKeyError('Site key expired')
    }

    const time = Math.floor(timestamp / 1000) >>> 0
    const timeBytes = Buffer.alloc(4)
    timeBytes.writeUInt32BE(time)

    const selected = Buffer.from(cache.indices.map((i) => cache.key[i]))
    const mac = createHmac('sha256', cache.key)
      .update(
        `${method.toUpperCase()}!${path}!${time}!${selected.toString('hex')}`,
      )
      .digest()
      .subarray(0, MAC_LENGTH)

    const body = Buffer.concat([Buffer.from([VERSION_BYTE]), timeBytes, mac])
    const mask = this.mask() & 0xff
    const out = Buffer.alloc(body.length + 1)
    out[0] = mask
    for (let i = 0; i < body.length; i++) {
      out[i + 1] = body[i] ^ mask
    }
    return out.toString('base64url')
  }

  async refresh(signal?: AbortSignal): Promise<void> {
    const homeUrl = new URL('/', this.options.baseUrl)
    const html = await this.fetchText(homeUrl, signal)

    const encodedKey = extractMetaContent(html, this.options.metaName)
    if (!encodedKey) {
      throw new TransientNetworkError(
        `Home document has no ${this.options.metaName} meta tag`,
      )
    }
    const key = Buffer.from(encodedKey, 'base64')
    if (key.length === 0) {
      throw new TransientNetworkError('Site key is empty')
    }

    const markerHref = extractLinkHref(html, this.options.markerRel)
    if (!markerHref) {
      throw new TransientNetworkError(
        `Home document has no ${this.options.markerRel} link`,
      )
    }
    const marker = await this.fetchText(new URL(markerHref, homeUrl), signal)
    const indices = extractIndices(marker, key.length)
    if (indices.length === 0) {
      throw new TransientNetworkError('Marker resource lists no key indices')
    }

    this.cache = {
      key,
      indices,
      fetchedAt: this.now(),
      ttlMs: this.options.ttlMs,
    }
    this.options.log.info(
      { indices: indices.length },
      'Refreshed transaction key material',
    )
  }

  invalidate(): void {
    this.cache = null
  }

  describe(): SiteKeyCacheStatus {
    if (!this.cache) {
      return { cached: false, fetchedAt: null, expiresAt: null }
    }
    return {
      cached: true,
      fetchedAt: new Date(this.cache.fetchedAt),
      expiresAt: new Date(this.cache.fetchedAt + this.cache.ttlMs),
    }
  }

  private async fetchText(url: URL, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.options.requestTimeoutMs)
    let response: Response
    try {
      response = await fetch(url, {
        headers: this.options.userAgent
          ? { 'User-Agent': this.options.userAgent }
          : undefined,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
    } catch (error) {
      throw new TransientNetworkError(
        `Failed to fetch ${url.pathname}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error },
      )
    }
    if (!response.ok) {
      throw new TransientNetworkError(
        `Failed to fetch ${url.pathname}: HTTP ${response.status}`,
        response.status,
      )
    }
    return response.text()
  }
}
