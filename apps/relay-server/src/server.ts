import {randomUUID} from 'node:crypto'
import {promises as fs} from 'node:fs'
import {createServer as createHttpServer, type IncomingMessage, type Server, type ServerResponse} from 'node:http'
import {createServer as createHttpsServer, type ServerOptions as HttpsServerOptions} from 'node:https'
import type {AddressInfo} from 'node:net'

import {createNoopLogger, runWithLogContext, setLogContextFields, type StructuredLogger} from '@relay-pipeline/logging'
import {
  buildResponse,
  isDomainDataError,
  plainResponse,
  type Handler,
  type PipelineResponse,
  type ResponseEncoding
} from '@relay-pipeline/pipeline'

import type {ServiceConfig, TlsConfig} from './config'
import {extractCorrelationId, toPipelineRequest, writeResponse} from './http'

const loadHttpsOptions = async (tlsConfig: TlsConfig | undefined): Promise<HttpsServerOptions | undefined> => {
  if (!tlsConfig?.enabled) {
    return undefined
  }

  try {
    const [key, cert, ca] = await Promise.all([
      fs.readFile(tlsConfig.keyPath),
      fs.readFile(tlsConfig.certPath),
      tlsConfig.clientCaPath ? fs.readFile(tlsConfig.clientCaPath) : Promise.resolve(undefined)
    ])

    return {
      key,
      cert,
      ...(ca ? {ca} : {}),
      requestCert: tlsConfig.requestClientCert,
      rejectUnauthorized: tlsConfig.rejectUnauthorizedClientCert
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new Error(`Unable to load TLS configuration for relay-server: ${reason}`)
  }
}

// Conversion failures happen before the pipeline and its error layers run.
const toConversionFailureResponse = ({
  error,
  encoding,
  logger
}: {
  error: unknown
  encoding: ResponseEncoding
  logger: StructuredLogger
}): PipelineResponse => {
  if (isDomainDataError(error)) {
    logger.warn({
      event: 'request.rejected',
      component: 'http.server',
      message: `Submitted data is invalid: ${error.message}`,
      reason_code: error.kind,
      status_code: 400
    })

    return buildResponse({
      status: 400,
      body: encoding === 'plain' ? error.message : {error: {...error.details, type: error.kind, message: error.message}},
      encoding
    })
  }

  const message = `Internal Server Error: ${error instanceof Error ? error.message : 'unknown error'}`
  logger.error({
    event: 'request.failed',
    component: 'http.server',
    message,
    reason_code: 'application-error',
    status_code: 500
  })

  return buildResponse({
    status: 500,
    body: encoding === 'plain' ? message : {error: {type: 'application-error', message}},
    encoding
  })
}

export type CreateRelayRequestListenerInput = {
  handler: Handler
  maxBodyBytes: number
  errorEncoding: ResponseEncoding
  logger?: StructuredLogger
  now?: () => Date
}

/** Adapts a pipeline handler to a Node request listener. The returned promise never rejects. */
export const createRelayRequestListener = ({
  handler,
  maxBodyBytes,
  errorEncoding,
  logger = createNoopLogger(),
  now = () => new Date()
}: CreateRelayRequestListenerInput) => {
  const handleRequest = async (request: IncomingMessage, response: ServerResponse) => {
    const correlationId = extractCorrelationId(request)
    const requestMethod = request.method ?? 'GET'
    const startedAtMs = now().getTime()

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: randomUUID(),
        method: requestMethod
      },
      async () => {
        let route = request.url ?? '/'
        let statusCode = 500

        logger.info({
          event: 'request.received',
          component: 'http.server',
          message: 'Request received',
          route,
          method: requestMethod
        })

        try {
          let pipelineResponse: PipelineResponse | null
          try {
            const pipelineRequest = await toPipelineRequest({request, maxBodyBytes})
            route = pipelineRequest.path
            setLogContextFields({route})
            pipelineResponse = await handler(pipelineRequest)
          } catch (error) {
            pipelineResponse = toConversionFailureResponse({error, encoding: errorEncoding, logger})
          }

          statusCode = writeResponse({response, pipelineResponse, correlationId})
        } catch (error) {
          logger.error({
            event: 'request.write_failed',
            component: 'http.server',
            message: error instanceof Error ? error.message : 'Response could not be written',
            reason_code: 'response_write_failed'
          })

          if (response.headersSent) {
            response.destroy()
          } else {
            statusCode = writeResponse({
              response,
              pipelineResponse: plainResponse(500, 'Internal Server Error'),
              correlationId
            })
          }
        } finally {
          const completed = {
            event: 'request.completed',
            component: 'http.server',
            message: 'Request completed',
            route,
            method: requestMethod,
            status_code: statusCode,
            duration_ms: Math.max(0, now().getTime() - startedAtMs)
          }

          if (statusCode >= 500) {
            logger.error(completed)
          } else if (statusCode >= 400) {
            logger.warn(completed)
          } else {
            logger.info(completed)
          }
        }
      }
    )
  }

  return handleRequest
}

export type RelayServer = {
  server: Server
  start: () => Promise<AddressInfo>
  stop: () => Promise<void>
}

export const createRelayServer = async ({
  config,
  handler,
  logger = createNoopLogger(),
  now
}: {
  config: ServiceConfig
  handler: Handler
  logger?: StructuredLogger
  now?: () => Date
}): Promise<RelayServer> => {
  const listener = createRelayRequestListener({
    handler,
    maxBodyBytes: config.maxBodyBytes,
    errorEncoding: config.errorEncoding,
    logger,
    ...(now ? {now} : {})
  })
  const onRequest = (request: IncomingMessage, response: ServerResponse) => {
    void listener(request, response)
  }

  const httpsOptions = await loadHttpsOptions(config.tls)
  const server: Server = httpsOptions ? createHttpsServer(httpsOptions, onRequest) : createHttpServer(onRequest)

  const start = () =>
    new Promise<AddressInfo>((resolve, reject) => {
      server.once('error', reject)
      server.listen(config.port, config.host, () => {
        server.off('error', reject)
        const address = server.address()
        if (typeof address !== 'object' || address === null) {
          reject(new Error('relay-server is not listening on a network address'))
          return
        }

        logger.info({
          event: 'server.started',
          component: 'http.server',
          message: `Listening on ${httpsOptions ? 'https' : 'http'}://${address.address}:${address.port}`
        })
        resolve(address)
      })
    })

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error)
          return
        }

        logger.info({event: 'server.stopped', component: 'http.server', message: 'Server stopped'})
        resolve()
      })
    })

  return {server, start, stop}
}
