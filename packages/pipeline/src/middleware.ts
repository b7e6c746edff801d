import type {StructuredLogger} from '@relay-pipeline/logging';

import {extractCommonName} from './certificate';
import {sanitizeRequest} from './sanitize';
import type {Handler, Middleware, PipelineResponse} from './types';

export const CACHE_CONTROL_VALUE = 'private, max-age=0, no-cache';
const CACHEABLE_METHODS = new Set(['GET', 'PUT']);

/** The first middleware listed ends up outermost. */
export const composeMiddleware =
  (...middlewares: Middleware[]): Middleware =>
  handler =>
    middlewares.reduceRight<Handler>((inner, middleware) => middleware(inner), handler);

const withHeader = (response: PipelineResponse, name: string, value: string): PipelineResponse => ({
  ...response,
  headers: {...response.headers, [name]: value}
});

const toStatusCode = (response: PipelineResponse | null) =>
  response && response.status >= 100 && response.status <= 599 ? {status_code: response.status} : {};

export const wrapRequestLogging =
  ({logger}: {logger: StructuredLogger}): Middleware =>
  handler =>
  async request => {
    logger.debug({
      event: 'pipeline.request.received',
      component: 'pipeline.logging',
      message: `Processing ${request.method} ${request.path}`,
      route: request.path,
      method: request.method
    });
    logger.trace({
      event: 'pipeline.request.detail',
      component: 'pipeline.logging',
      message: 'Sanitized request',
      metadata: {request: sanitizeRequest(request)}
    });

    return handler(request);
  };

export const wrapResponseLogging =
  ({logger}: {logger: StructuredLogger}): Middleware =>
  handler =>
  async request => {
    const response = await handler(request);
    logger.trace({
      event: 'pipeline.response.computed',
      component: 'pipeline.logging',
      message: 'Computed response',
      ...toStatusCode(response),
      metadata: {response}
    });

    return response;
  };

/**
 * Marks GET and PUT responses as private and uncacheable. Responses to any
 * other method come back exactly as the handler produced them.
 */
export const wrapCacheHeaders =
  (): Middleware =>
  handler =>
  async request => {
    const response = await handler(request);
    if (!response || !CACHEABLE_METHODS.has(request.method)) {
      return response;
    }

    return withHeader(response, 'cache-control', CACHE_CONTROL_VALUE);
  };

export const wrapFrameOptionsDeny =
  (): Middleware =>
  handler =>
  async request => {
    const response = await handler(request);
    return response ? withHeader(response, 'x-frame-options', 'DENY') : null;
  };

export const wrapCertificateCn =
  (): Middleware =>
  handler =>
  request =>
    handler({...request, clientCn: extractCommonName(request.clientCertificate)});
