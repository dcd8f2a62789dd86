import axios from 'axios'
import https from 'https'
import http from 'http'
import * as cheerio from 'cheerio'
import type { CheerioAPI } from 'cheerio'
import { log } from '@workspace/logger'
import { RetryStrategy, readErrorMessage } from '../retry/retry-strategy.js'
import type { EnrichmentMetrics } from '../observability/metrics.js'
import { hasExplicitScheme, isHttpUrl } from '../utils/url.js'
import { FetchError, FetchResponse, UrlResolution, WebEngine } from './types.js'

type AxiosWebEngineConfig = {
  probeTimeoutMs: number
  fetchTimeoutMs: number
  userAgent?: string
  retryStrategy?: RetryStrategy
  metrics?: EnrichmentMetrics
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

const PROBE_SCHEMES = ['https', 'http'] as const

const CHARSET_PATTERN = /charset\s*=\s*["']?([^;"'\s]+)/i

/** Charset announced by a Content-Type header, if any. */
const readHeaderCharset = (contentType: unknown): string | undefined =>
  typeof contentType === 'string' ? CHARSET_PATTERN.exec(contentType)?.[1] : undefined

/**
 * Axios-based engine: HEAD probes for scheme resolution and a retrying GET
 * for documents. Agents are created without keep-alive, so no socket is
 * reused between calls.
 */
export class AxiosWebEngine extends WebEngine {
  private readonly config: AxiosWebEngineConfig
  private readonly retryStrategy: RetryStrategy
  private readonly browserHeaders: Record<string, string>
  private readonly httpAgent: http.Agent
  private readonly httpsAgent: https.Agent

  constructor(config: AxiosWebEngineConfig) {
    super()
    this.config = config
    this.retryStrategy = config.retryStrategy ?? new RetryStrategy()

    this.browserHeaders = {
      'User-Agent': config.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'Accept-Encoding': 'gzip, deflate, br'
    }

    this.httpAgent = new http.Agent({ keepAlive: false })
    this.httpsAgent = new https.Agent({ keepAlive: false })
  }

  async resolveUrl(input: string): Promise<UrlResolution> {
    const trimmed = input.trim()

    if (trimmed.length === 0) {
      return { success: false, input, error: 'Empty URL' }
    }

    if (hasExplicitScheme(trimmed)) {
      return { success: true, url: trimmed, probed: false }
    }

    const failures: string[] = []
    for (const scheme of PROBE_SCHEMES) {
      const candidate = `${scheme}://${trimmed}`
      const failure = await this.probe(candidate)
      if (failure === undefined) {
        this.config.metrics?.increment(`probe.${scheme}`)
        return { success: true, url: candidate, probed: true }
      }
      failures.push(`${candidate}: ${failure}`)
    }

    this.config.metrics?.increment('probe.unresolvable')
    log.debug(`[Axios Engine] No working scheme for ${trimmed}`, failures.join('; '))

    return { success: false, input, error: failures.join('; ') }
  }

  async fetchDocument(url: string): Promise<FetchResponse<CheerioAPI>> {
    const startTime = Date.now()

    if (!isHttpUrl(url)) {
      log.debug(`[Axios Engine] Refusing to fetch malformed URL: ${url}`)
      return this.failure(url, 'schema', `Invalid or unsupported URL: ${url}`, 0, startTime)
    }

    let attempt = 0
    let shouldRetry = true
    let lastFailure: FetchError | undefined

    while (shouldRetry) {
      attempt += 1
      this.config.metrics?.increment('fetch.attempts')
      const attemptStart = Date.now()

      try {
        const response = await axios.get<ArrayBuffer>(url, {
          headers: this.browserHeaders,
          timeout: this.config.fetchTimeoutMs,
          responseType: 'arraybuffer',
          maxRedirects: 10,
          validateStatus: () => true,
          httpAgent: this.httpAgent,
          httpsAgent: this.httpsAgent
        })
        this.config.metrics?.recordFetchDuration(Date.now() - attemptStart)

        // BOM first, then the header charset, then <meta charset>; utf-8 when nothing is declared
        const content = cheerio.loadBuffer(Buffer.from(response.data), {
          encoding: {
            transportLayerEncodingLabel: readHeaderCharset(response.headers['content-type']),
            defaultEncoding: 'utf-8'
          }
        })
        const finalUrl: unknown = response.request?.res?.responseUrl

        this.config.metrics?.increment('fetch.success')
        return {
          success: true,
          content,
          metadata: {
            duration: Date.now() - startTime,
            method: 'axios',
            attempts: attempt,
            responseStatus: response.status,
            finalUrl: typeof finalUrl === 'string' ? finalUrl : url
          }
        }
      } catch (error) {
        this.config.metrics?.recordFetchDuration(Date.now() - attemptStart)

        const errorClass = this.retryStrategy.classify(error)
        const decision = this.retryStrategy.decide(errorClass, attempt)
        const message = readErrorMessage(error)

        log.warn(`[Axios Engine] Attempt ${attempt} failed for ${url} (${errorClass}):`, message)

        lastFailure = this.failure(url, errorClass, message, attempt, startTime)
        shouldRetry = decision.shouldRetry

        if (shouldRetry) {
          this.config.metrics?.increment('fetch.retries')
          await this.sleep(decision.delayMs)
        }
      }
    }

    this.config.metrics?.increment('fetch.failed')
    return lastFailure ?? this.failure(url, 'system', 'Fetch was not attempted', attempt, startTime)
  }

  async cleanup(): Promise<void> {
    this.httpAgent.destroy()
    this.httpsAgent.destroy()
  }

  /**
   * Single best-effort HEAD request. Redirects are not followed: a 3xx
   * answer already proves the scheme is served.
   *
   * @returns undefined on success, otherwise the reason the probe failed
   */
  private async probe(url: string): Promise<string | undefined> {
    try {
      const response = await axios.head(url, {
        headers: this.browserHeaders,
        timeout: this.config.probeTimeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
        httpAgent: this.httpAgent,
        httpsAgent: this.httpsAgent
      })

      return response.status < 400 ? undefined : `HTTP ${response.status}`
    } catch (error) {
      return readErrorMessage(error)
    }
  }

  private failure(
    url: string,
    errorClass: FetchError['errorClass'],
    error: string,
    attempts: number,
    startTime: number
  ): FetchError {
    return {
      success: false,
      error,
      errorClass,
      metadata: {
        duration: Date.now() - startTime,
        method: 'axios',
        attempts,
        finalUrl: url
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}

export type { AxiosWebEngineConfig }
