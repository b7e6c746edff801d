import {z} from 'zod';

import {currentLogContext, type RequestLogContext} from './context';
import {createLogRedactor, type LogRedactor} from './redaction';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EventLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY
};

const LogEventInputSchema = z
  .object({
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

type LogEnvelope = Omit<LogEventInput, 'metadata'> & {
  ts: string;
  level: EventLevel;
  service: string;
  env: string;
  correlation_id: string;
  request_id: string;
  metadata: unknown;
};

export type LogStream = 'stdout' | 'stderr';

/** Receives one serialized event per call, newline included. */
export type LogSink = (line: string, stream: LogStream) => void;

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  sink?: LogSink;
  extraSensitiveKeys?: readonly string[];
};

type LogMethod = (input: LogEventInput) => void;

export type StructuredLogger = Readonly<Record<EventLevel, LogMethod>>;

const processSink: LogSink = (line, stream) => {
  (stream === 'stderr' ? process.stderr : process.stdout).write(line);
};

const toEnvelope = ({
  input,
  level,
  ts,
  identity,
  context,
  redact
}: {
  input: LogEventInput;
  level: EventLevel;
  ts: string;
  identity: {service: string; env: string};
  context: Readonly<RequestLogContext> | undefined;
  redact: LogRedactor;
}): LogEnvelope => {
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;

  return {
    ts,
    level,
    ...identity,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(input.message ? {message: input.message} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(route ? {route} : {}),
    ...(method ? {method} : {}),
    metadata: redact(input.metadata ?? {})
  };
};

/**
 * JSON-lines logger. `error` and `fatal` go to stderr, everything else to
 * stdout. Events below `level` and events that fail validation are dropped;
 * logging never throws.
 */
export const createStructuredLogger = ({
  service,
  env,
  level,
  now = () => new Date(),
  sink = processSink,
  extraSensitiveKeys = []
}: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LEVEL_RANK[LogLevelSchema.parse(level)];
  const identity = {service: z.string().min(1).parse(service), env: z.string().min(1).parse(env)};
  const redact = createLogRedactor({extraSensitiveKeys});

  const emitAt =
    (eventLevel: EventLevel): LogMethod =>
    rawInput => {
      if (LEVEL_RANK[eventLevel] < threshold) {
        return;
      }

      const parsed = LogEventInputSchema.safeParse(rawInput);
      if (!parsed.success) {
        return;
      }

      try {
        const envelope = toEnvelope({
          input: parsed.data,
          level: eventLevel,
          ts: now().toISOString(),
          identity,
          context: currentLogContext(),
          redact
        });
        sink(`${JSON.stringify(envelope)}\n`, eventLevel === 'error' || eventLevel === 'fatal' ? 'stderr' : 'stdout');
      } catch {
        // Sink failures are dropped with the event.
      }
    };

  return {
    trace: emitAt('trace'),
    debug: emitAt('debug'),
    info: emitAt('info'),
    warn: emitAt('warn'),
    error: emitAt('error'),
    fatal: emitAt('fatal')
  };
};

const ignore: LogMethod = () => undefined;

export const createNoopLogger = (): StructuredLogger => ({
  trace: ignore,
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
  fatal: ignore
});
