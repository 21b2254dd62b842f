import { ConfigError, loadConfig, type GatewayConfig } from './config/index.js'
import { createGateway } from './gateway.js'

function readConfig(): GatewayConfig {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[Gateway] ${err.message}`)
      process.exit(1)
    }
    throw err
  }
}

export function main(): void {
  const config = readConfig()
  const gateway = createGateway(config)

  const server = gateway.app.listen(config.port, config.host, () => {
    console.log(`API gateway listening on http://${config.host}:${config.port}`)
    console.log(`Proxying to ${config.backend.url} (timeout ${config.backend.timeoutMs}ms)`)
    gateway.start()
  })

  // Ensure graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`[Gateway] Received ${signal}, shutting down`)
    server.close((err) => {
      if (err) {
        console.error('[Gateway] Error while closing HTTP server', err)
      }
      gateway
        .close()
        .catch((closeErr: unknown) => {
          console.error('[Gateway] Error while releasing resources', closeErr)
        })
        .finally(() => process.exit(err ? 1 : 0))
    })
    server.closeIdleConnections()
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

if (process.env.NODE_ENV !== 'test') {
  main()
}
