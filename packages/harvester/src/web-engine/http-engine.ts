import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios'
import https from 'node:https'
import http from 'node:http'
import { createLogger } from '@workspace/logger'
import { ContentParseError, errorMessage } from '../errors.js'
import { resolveParserWithPlugins } from './parser-resolver.js'
import { type FetchContentOptions, type FetchErrorCode, type FetchResponse, type ParseContext, WebEngine } from './types.js'

const log = createLogger('http-engine')

type HttpWebEngineOptions = {
  timeoutMs?: number
  userAgent?: string
  /** Replaces the network transport; used by tests. */
  adapter?: AxiosAdapter
}

const DEFAULT_TIMEOUT_MS = 30000

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

function classifyStatus(status: number): FetchErrorCode {
  if (status === 403 || status === 429) return 'blocked'
  if (status === 404 || status === 410) return 'not-found'
  return 'unexpected'
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof AxiosError &&
    (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT)
  )
}

/**
 * Plain HTTP fetching with browser-like headers. Status codes from 400 on
 * come back as a failed `FetchResponse`; nothing here throws.
 */
export class HttpWebEngine extends WebEngine {
  private readonly browserHeaders: Record<string, string>
  private readonly axiosInstance: AxiosInstance
  private readonly timeoutMs: number
  private readonly httpAgent: http.Agent
  private readonly httpsAgent: https.Agent

  constructor(options?: HttpWebEngineOptions) {
    super()
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS

    this.browserHeaders = {
      'User-Agent': options?.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'Cache-Control': 'max-age=0',
      'Upgrade-Insecure-Requests': '1',
      Connection: 'keep-alive'
    }

    this.httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets: 2 })
    this.httpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets: 2 })

    this.axiosInstance = axios.create({
      timeout: this.timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
      validateStatus: () => true,
      headers: this.browserHeaders,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(options?.adapter ? { adapter: options.adapter } : {})
    })
  }

  async fetchContent<T>(url: string, options: FetchContentOptions<T>): Promise<FetchResponse<T>> {
    const startTime = Date.now()
    const timeout = options.timeoutMs ?? this.timeoutMs

    try {
      log.debug(`Fetching ${url}`)

      const response = await this.axiosInstance.get<string>(url, {
        timeout,
        headers: { ...this.browserHeaders, Referer: `${new URL(url).origin}/` }
      })

      if (response.status >= 400) {
        return {
          success: false,
          errorCode: classifyStatus(response.status),
          error: `Failed to fetch ${url}: HTTP ${response.status}`,
          metadata: {
            duration: Date.now() - startTime,
            method: 'http',
            responseStatus: response.status
          }
        }
      }

      const redirectedTo: unknown = response.request?.res?.responseUrl
      const finalUrl = typeof redirectedTo === 'string' && redirectedTo ? redirectedTo : url

      const parseContext: ParseContext = {
        engine: 'http',
        requestUrl: url,
        finalUrl,
        response: {
          statusCode: response.status,
          headers: { ...response.headers }
        }
      }

      const { content, pluginName } = await resolveParserWithPlugins(
        { url: finalUrl, data: typeof response.data === 'string' ? response.data : '' },
        options,
        parseContext
      )

      return {
        success: true,
        content,
        finalUrl,
        metadata: {
          duration: Date.now() - startTime,
          method: 'http',
          responseStatus: response.status,
          parserPlugin: pluginName
        }
      }
    } catch (error) {
      const metadata = { duration: Date.now() - startTime, method: 'http' }

      if (error instanceof ContentParseError) {
        return { success: false, errorCode: 'parse-failed', error: error.message, metadata }
      }

      if (isTimeout(error)) {
        return {
          success: false,
          errorCode: 'timeout',
          error: `Timed out after ${timeout}ms fetching ${url}`,
          metadata
        }
      }

      const message = errorMessage(error)
      log.warn(`Fetch failed for ${url}:`, message)

      return { success: false, errorCode: 'unexpected', error: message, metadata }
    }
  }

  async cleanup(): Promise<void> {
    this.httpAgent.destroy()
    this.httpsAgent.destroy()
  }
}

export type { HttpWebEngineOptions }
