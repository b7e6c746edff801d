import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const ContextIdSchema = z.string().min(1).max(128);

const RequestLogContextSchema = z
  .object({
    correlation_id: ContextIdSchema.optional(),
    request_id: ContextIdSchema.optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type RequestLogContext = z.infer<typeof RequestLogContextSchema>;

const requestContext = new AsyncLocalStorage<RequestLogContext>();

/** Runs `operation` with a per-request context that every event logged inside it inherits. */
export const runWithLogContext = <T>(context: RequestLogContext, operation: () => T): T =>
  requestContext.run(RequestLogContextSchema.parse(context), operation);

export const currentLogContext = (): Readonly<RequestLogContext> | undefined => requestContext.getStore();

/**
 * Updates the active request context, e.g. once the route is known. Returns
 * false outside `runWithLogContext`.
 */
export const setLogContextFields = (fields: Partial<RequestLogContext>): boolean => {
  const active = requestContext.getStore();
  if (!active) {
    return false;
  }

  Object.assign(active, RequestLogContextSchema.partial().parse(fields));
  return true;
};
