import type {FetchLike} from '@relay-pipeline/forwarder'
import type {StructuredLogger} from '@relay-pipeline/logging'
import {
  composeMiddleware,
  createProxyMiddleware,
  jsonResponse,
  wrapCacheHeaders,
  wrapCertificateCn,
  wrapErrorClassification,
  wrapFrameOptionsDeny,
  wrapRequestLogging,
  wrapResponseLogging,
  type Handler
} from '@relay-pipeline/pipeline'

import type {ServiceConfig} from './config'

/** Answers the health check and declines everything else. */
export const createDefaultApplication =
  (): Handler =>
  request => {
    if (request.method === 'GET' && request.path === '/healthz') {
      return Promise.resolve(jsonResponse(200, {status: 'ok'}))
    }

    return Promise.resolve(null)
  }

/**
 * Builds the full chain around `application`, outermost first: error
 * classification, request and response logging, certificate annotation,
 * frame options, cache headers, then one proxy stage per configured rule.
 */
export const createRelayHandler = ({
  config,
  logger,
  application = createDefaultApplication(),
  fetchImpl
}: {
  config: Pick<ServiceConfig, 'errorEncoding' | 'proxyRules'>
  logger: StructuredLogger
  application?: Handler
  fetchImpl?: FetchLike
}): Handler =>
  composeMiddleware(
    wrapErrorClassification({logger, encoding: config.errorEncoding}),
    wrapRequestLogging({logger}),
    wrapResponseLogging({logger}),
    wrapCertificateCn(),
    wrapFrameOptionsDeny(),
    wrapCacheHeaders(),
    ...config.proxyRules.map(rule => createProxyMiddleware({rule, logger, ...(fetchImpl ? {fetchImpl} : {})}))
  )(application)
