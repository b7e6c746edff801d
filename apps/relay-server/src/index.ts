import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@relay-pipeline/logging'

import {createRelayHandler} from './app'
import {loadConfig} from './config'
import {createRelayServer} from './server'

export const appName = 'relay-server'

export * from './app'
export * from './config'
export * from './http'
export * from './server'

const main = async () => {
  const config = loadConfig(process.env)
  const logger = createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logLevel,
    extraSensitiveKeys: config.logRedactKeys
  })
  const handler = createRelayHandler({config, logger})
  const relayServer = await createRelayServer({config, handler, logger})

  await relayServer.start()

  const shutdown = async () => {
    try {
      await relayServer.stop()
      process.exit(0)
    } catch (error) {
      logger.error({
        event: 'process.shutdown.failed',
        component: 'process.entrypoint',
        message: 'Relay server shutdown failed',
        reason_code: 'shutdown_failed',
        metadata: {error}
      })
      process.exit(1)
    }
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Relay server startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
