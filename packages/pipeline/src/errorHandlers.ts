import {redactForLog, type StructuredLogger} from '@relay-pipeline/logging';

import {ResponseEncodingSchema, type ErrorEnvelope, type ResponseEncoding} from './contracts';
import {isDomainDataError, isSchemaMismatchError} from './errors';
import {composeMiddleware} from './middleware';
import {buildResponse} from './response';
import type {Middleware, PipelineResponse} from './types';

export type ErrorLayerOptions = {
  logger: StructuredLogger;
  encoding?: ResponseEncoding;
};

const SCHEMA_ERROR_DATA_KEYS = ['error', 'value', 'type'] as const;

const resolveEncoding = (encoding: ResponseEncoding | undefined) =>
  ResponseEncodingSchema.default('structured').parse(encoding);

const applicationErrorResponse = ({
  status,
  message,
  encoding
}: {
  status: number;
  message: string;
  encoding: ResponseEncoding;
}): PipelineResponse => {
  if (encoding === 'plain') {
    return buildResponse({status, body: message, encoding});
  }

  const envelope: ErrorEnvelope = {error: {type: 'application-error', message}};
  return buildResponse({status, body: envelope, encoding});
};

const describeThrown = (error: unknown) => {
  try {
    return String(error);
  } catch {
    return Object.prototype.toString.call(error);
  }
};

/**
 * Answers 400 for failures tagged with a domain-data kind and re-throws
 * everything else untouched.
 */
export const wrapDataErrors = ({logger, encoding}: ErrorLayerOptions): Middleware => {
  const resolvedEncoding = resolveEncoding(encoding);

  return handler => async request => {
    try {
      return await handler(request);
    } catch (error) {
      if (!isDomainDataError(error)) {
        throw error;
      }

      logger.error({
        event: 'pipeline.error.data_invalid',
        component: 'pipeline.errors',
        message: `Submitted data is invalid: ${error.message}`,
        reason_code: error.kind,
        status_code: 400
      });

      if (resolvedEncoding === 'plain') {
        return buildResponse({status: 400, body: error.message, encoding: resolvedEncoding});
      }

      const envelope: ErrorEnvelope = {
        error: {...error.details, type: error.kind, message: error.message}
      };
      return buildResponse({status: 400, body: envelope, encoding: resolvedEncoding});
    }
  };
};

/**
 * Answers 500 for structured failures whose message carries the schema
 * mismatch signature. Any other failure is re-thrown untouched.
 */
export const wrapSchemaErrors = ({logger, encoding}: ErrorLayerOptions): Middleware => {
  const resolvedEncoding = resolveEncoding(encoding);

  return handler => async request => {
    try {
      return await handler(request);
    } catch (error) {
      if (!isSchemaMismatchError(error)) {
        throw error;
      }

      const details = Object.fromEntries(
        SCHEMA_ERROR_DATA_KEYS.filter(key => key in error.data).map(key => [key, error.data[key]])
      );
      // The offending value may hold bigints, cycles or credentials.
      const message = `Something unexpected happened: ${JSON.stringify(redactForLog(details))}`;

      logger.error({
        event: 'pipeline.error.schema_mismatch',
        component: 'pipeline.errors',
        message,
        reason_code: 'application-error',
        status_code: 500
      });

      return applicationErrorResponse({status: 500, message, encoding: resolvedEncoding});
    }
  };
};

/** Answers 500 for anything thrown below it. Never re-throws. */
export const wrapUncaughtErrors = ({logger, encoding}: ErrorLayerOptions): Middleware => {
  const resolvedEncoding = resolveEncoding(encoding);

  return handler => async request => {
    try {
      return await handler(request);
    } catch (error) {
      const message = `Internal Server Error: ${describeThrown(error)}`;

      logger.error({
        event: 'pipeline.error.uncaught',
        component: 'pipeline.errors',
        message,
        reason_code: 'application-error',
        status_code: 500,
        metadata: error instanceof Error && error.stack ? {stack: error.stack} : {}
      });

      return applicationErrorResponse({status: 500, message, encoding: resolvedEncoding});
    }
  };
};

/** Stacks the three layers with the catch-all outermost and the data layer innermost. */
export const wrapErrorClassification = (options: ErrorLayerOptions): Middleware =>
  composeMiddleware(wrapUncaughtErrors(options), wrapSchemaErrors(options), wrapDataErrors(options));
