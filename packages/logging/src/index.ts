export {runWithLogContext, setLogContextFields, type RequestLogContext} from './context';
export {
  createNoopLogger,
  createStructuredLogger,
  LogLevelSchema,
  type LogEventInput,
  type LogLevel,
  type LogSink,
  type LogStream,
  type StructuredLogger,
  type StructuredLoggerOptions
} from './logger';
export {createLogRedactor, redactForLog, type LogRedactor} from './redaction';
