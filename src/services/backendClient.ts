import http from 'node:http'
import https from 'node:https'
import axios, { type AxiosInstance } from 'axios'
import { BackendTimeoutError, BackendUnavailableError, RequestCancelledError } from '../errors.js'

export type HeaderMap = Record<string, string | string[]>

export interface ForwardRequest {
  method: string
  path: string
  query?: string
  headers?: HeaderMap
  body?: Buffer
  /** Aborts the call when the caller goes away. */
  signal?: AbortSignal
  timeoutMs?: number
}

export interface BackendResponse {
  status: number
  headers: HeaderMap
  body: Buffer
}

export interface BackendClientOptions {
  baseUrl: string
  timeoutMs: number
}

// Connection-scoped headers that must not cross the proxy.
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
])

export function stripHopByHop(headers: HeaderMap): HeaderMap {
  const result: HeaderMap = {}
  for (const [name, value] of Object.entries(headers)) {
    if (!HOP_BY_HOP.has(name.toLowerCase())) {
      result[name.toLowerCase()] = value
    }
  }
  return result
}

function toHeaderMap(headers: object): HeaderMap {
  const result: HeaderMap = {}
  const entries: Array<[string, unknown]> = Object.entries(headers)
  for (const [name, value] of entries) {
    if (Array.isArray(value)) {
      result[name] = value.map(String)
    } else if (typeof value === 'string' || typeof value === 'number') {
      result[name] = String(value)
    }
  }
  return result
}

/**
 * Pooled HTTP client for the backend service. Every call has a hard
 * deadline and is attempted exactly once.
 */
export class BackendClient {
  private readonly httpAgent = new http.Agent({ keepAlive: true })
  private readonly httpsAgent = new https.Agent({ keepAlive: true })
  private readonly instance: AxiosInstance
  readonly timeoutMs: number

  constructor(options: BackendClientOptions) {
    this.timeoutMs = options.timeoutMs
    this.instance = axios.create({
      baseURL: options.baseUrl,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: 'arraybuffer',
      decompress: false,
      maxRedirects: 0,
      validateStatus: () => true,
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
    })
  }

  async forward(request: ForwardRequest): Promise<BackendResponse> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs
    const controller = new AbortController()
    let timedOut = false

    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)

    const onCallerAbort = () => controller.abort()
    if (request.signal?.aborted) {
      controller.abort()
    } else {
      request.signal?.addEventListener('abort', onCallerAbort, { once: true })
    }

    const headers = stripHopByHop(request.headers ?? {})
    // Bytes are relayed as-is, so only ask for an encoding the caller asked for.
    if (!('accept-encoding' in headers)) {
      headers['accept-encoding'] = 'identity'
    }

    try {
      const url = request.query ? `${request.path}?${request.query}` : request.path
      const response = await this.instance.request<ArrayBuffer>({
        url,
        method: request.method.toUpperCase(),
        headers,
        data: request.body && request.body.length > 0 ? request.body : undefined,
        signal: controller.signal,
      })

      return {
        status: response.status,
        headers: stripHopByHop(toHeaderMap(response.headers)),
        body: Buffer.from(response.data),
      }
    } catch (err) {
      if (timedOut) {
        throw new BackendTimeoutError(timeoutMs)
      }
      if (request.signal?.aborted) {
        throw new RequestCancelledError()
      }
      const reason = err instanceof Error ? err.message : String(err)
      throw new BackendUnavailableError(`Backend unavailable: ${reason}`, { cause: err })
    } finally {
      clearTimeout(timer)
      request.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  /**
   * GET a JSON document from the backend. Non-2xx answers and bodies that
   * are not JSON count as the backend being unavailable.
   */
  async getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.forward({
      method: 'GET',
      path,
      headers: { accept: 'application/json' },
      signal,
    })

    if (response.status < 200 || response.status >= 300) {
      throw new BackendUnavailableError(`Backend returned ${response.status} for ${path}`)
    }

    try {
      return JSON.parse(response.body.toString('utf8'))
    } catch (err) {
      throw new BackendUnavailableError(`Backend returned malformed JSON for ${path}`, { cause: err })
    }
  }

  close(): void {
    this.httpAgent.destroy()
    this.httpsAgent.destroy()
  }
}
