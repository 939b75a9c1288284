#!/usr/bin/env node
import 'dotenv/config'
import { loadServerConfig } from './config.js'
import { createEditServer } from './edit-server.js'
import { logger } from './logger.js'
import { MemoryEditorHost } from './memory-host.js'
import { describeEndpoint } from './rendezvous.js'

const log = logger.child({ component: 'server' })

async function main() {
  const config = loadServerConfig()
  const host = new MemoryEditorHost({ graphical: false, headless: true })
  const { listener } = createEditServer(config, host)

  const endpoints = await listener.start()
  for (const endpoint of endpoints) {
    log.info(
      { endpoint: describeEndpoint(endpoint), serverFile: endpoint.kind === 'tcp' ? endpoint.serverFile : undefined },
      'Edit server listening',
    )
  }

  let isShuttingDown = false
  const shutdown = async (signal: string) => {
    if (isShuttingDown) return
    isShuttingDown = true
    log.info({ signal }, 'Shutting down...')
    await listener.stop()
    log.info('Shutdown complete')
    process.exit(0)
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

main().catch((err) => {
  log.error({ err }, 'Fatal startup error')
  process.exit(1)
})
