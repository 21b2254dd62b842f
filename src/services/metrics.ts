import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client'

const METRICS = {
  REQUESTS: 'api_requests_total',
  REQUEST_DURATION: 'api_request_duration_seconds',
  ACTIVE_CONNECTIONS: 'api_active_connections',
  RATE_LIMIT_HITS: 'api_rate_limit_hits_total',
} as const

export interface MetricsCollectorOptions {
  collectDefaultMetrics?: boolean
}

/**
 * Request metrics for one gateway instance. Each collector owns its own
 * registry so independent instances never share series.
 */
export class MetricsCollector {
  readonly registry = new Registry()

  private readonly requests: Counter<'method' | 'endpoint' | 'tier' | 'status'>
  private readonly duration: Histogram<'method' | 'endpoint' | 'tier'>
  private readonly activeConnections: Gauge
  private readonly rateLimitHits: Counter<'tier'>

  constructor(options: MetricsCollectorOptions = {}) {
    if (options.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry })
    }

    this.requests = new Counter({
      name: METRICS.REQUESTS,
      help: 'Total number of API requests',
      labelNames: ['method', 'endpoint', 'tier', 'status'],
      registers: [this.registry],
    })

    this.duration = new Histogram({
      name: METRICS.REQUEST_DURATION,
      help: 'Request duration in seconds',
      labelNames: ['method', 'endpoint', 'tier'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [this.registry],
    })

    this.activeConnections = new Gauge({
      name: METRICS.ACTIVE_CONNECTIONS,
      help: 'Number of active connections',
      registers: [this.registry],
    })

    this.rateLimitHits = new Counter({
      name: METRICS.RATE_LIMIT_HITS,
      help: 'Total number of rate limit hits',
      labelNames: ['tier'],
      registers: [this.registry],
    })
  }

  get contentType(): string {
    return this.registry.contentType
  }

  recordRequest(method: string, path: string, tier: string, status: number, durationSeconds: number): void {
    this.requests.inc({ method, endpoint: path, tier, status: String(status) })
    this.duration.observe({ method, endpoint: path, tier }, durationSeconds)
  }

  recordRateLimitHit(tier: string): void {
    this.rateLimitHits.inc({ tier })
  }

  setActiveConnections(count: number): void {
    this.activeConnections.set(count)
  }

  /**
   * Prometheus text exposition of every series in this collector.
   */
  async dump(): Promise<string> {
    return this.registry.metrics()
  }

  async requestCount(method: string, path: string, tier: string, status: number): Promise<number> {
    const { values } = await this.requests.get()
    const match = values.find(
      ({ labels }) =>
        labels.method === method &&
        labels.endpoint === path &&
        labels.tier === tier &&
        labels.status === String(status),
    )
    return match?.value ?? 0
  }

  async rateLimitHitCount(tier: string): Promise<number> {
    const { values } = await this.rateLimitHits.get()
    return values.find(({ labels }) => labels.tier === tier)?.value ?? 0
  }
}
