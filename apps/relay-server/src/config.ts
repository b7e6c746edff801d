import {ForwarderOptionsSchema} from '@relay-pipeline/forwarder'
import {LogLevelSchema, type LogLevel} from '@relay-pipeline/logging'
import {ResponseEncodingSchema, type ProxyRule, type ResponseEncoding} from '@relay-pipeline/pipeline'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number(value.trim())
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const portFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number(value.trim())
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().gte(0).lte(65_535))

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const INVALID_JSON = Symbol('invalid_json')

const jsonFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  if (trimmed.length === 0) {
    return undefined
  }

  try {
    const parsed: unknown = JSON.parse(trimmed)
    return parsed
  } catch {
    return INVALID_JSON
  }
}, z.unknown())

const RemoteOriginSchema = z
  .string()
  .url()
  .refine(value => /^https?:/iu.test(value), 'remote_origin must use http or https')

const PathProxyRuleConfigSchema = z
  .object({
    path: z.string().startsWith('/'),
    remote_origin: RemoteOriginSchema,
    transport: ForwarderOptionsSchema.optional()
  })
  .strict()

const PatternProxyRuleConfigSchema = z
  .object({
    pattern: z.string().min(1),
    flags: z
      .string()
      .regex(/^[imsu]*$/u, 'flags may only contain i, m, s and u')
      .optional(),
    remote_origin: RemoteOriginSchema,
    transport: ForwarderOptionsSchema.optional()
  })
  .strict()

const ProxyRuleConfigSchema = z.union([PathProxyRuleConfigSchema, PatternProxyRuleConfigSchema])

export type ProxyRuleConfig = z.infer<typeof ProxyRuleConfigSchema>

const compilePattern = ({pattern, flags, envVarName}: {pattern: string; flags?: string; envVarName: string}) => {
  try {
    return new RegExp(pattern, flags)
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'unknown error'
    throw new Error(`${envVarName} contains an invalid pattern: ${reason}`)
  }
}

/** Turns configured `{path | pattern, remote_origin, transport?}` records into proxy rules. */
export const parseProxyRules = ({raw, envVarName}: {raw: unknown; envVarName: string}): ProxyRule[] => {
  if (raw === undefined) {
    return []
  }

  const parsed = z.array(ProxyRuleConfigSchema).safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    throw new Error(`${envVarName} is invalid: ${issues.join('; ')}`)
  }

  return parsed.data.map(rule => ({
    matcher: 'pattern' in rule ? compilePattern({pattern: rule.pattern, flags: rule.flags, envVarName}) : rule.path,
    remoteOrigin: rule.remote_origin,
    ...(rule.transport ? {transport: rule.transport} : {})
  }))
}

const parseRedactKeys = (raw: string | undefined) =>
  raw
    ? raw
        .split(',')
        .map(value => value.trim())
        .filter(value => value.length > 0)
    : []

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    RELAY_SERVER_HOST: z.string().default('0.0.0.0'),
    RELAY_SERVER_PORT: portFromEnv.default(8080),
    RELAY_SERVER_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    RELAY_SERVER_LOG_LEVEL: optionalString.pipe(LogLevelSchema.optional()),
    RELAY_SERVER_LOG_REDACT_KEYS: optionalString,
    RELAY_SERVER_ERROR_ENCODING: optionalString.pipe(ResponseEncodingSchema.default('structured')),
    RELAY_SERVER_PROXY_RULES_JSON: jsonFromEnv,
    RELAY_SERVER_TLS_ENABLED: booleanFromEnv.default(false),
    RELAY_SERVER_TLS_KEY_PATH: optionalString,
    RELAY_SERVER_TLS_CERT_PATH: optionalString,
    RELAY_SERVER_TLS_CLIENT_CA_PATH: optionalString,
    RELAY_SERVER_TLS_REQUEST_CLIENT_CERT: booleanFromEnv.default(false),
    RELAY_SERVER_TLS_REJECT_UNAUTHORIZED_CLIENT_CERT: booleanFromEnv.default(false)
  })
  .strict()

export type TlsConfig = {
  enabled: true
  keyPath: string
  certPath: string
  clientCaPath?: string
  requestClientCert: boolean
  rejectUnauthorizedClientCert: boolean
}

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  maxBodyBytes: number
  logLevel: LogLevel
  logRedactKeys: string[]
  errorEncoding: ResponseEncoding
  proxyRules: ProxyRule[]
  tls?: TlsConfig
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  RELAY_SERVER_HOST: env.RELAY_SERVER_HOST,
  RELAY_SERVER_PORT: env.RELAY_SERVER_PORT,
  RELAY_SERVER_MAX_BODY_BYTES: env.RELAY_SERVER_MAX_BODY_BYTES,
  RELAY_SERVER_LOG_LEVEL: env.RELAY_SERVER_LOG_LEVEL,
  RELAY_SERVER_LOG_REDACT_KEYS: env.RELAY_SERVER_LOG_REDACT_KEYS,
  RELAY_SERVER_ERROR_ENCODING: env.RELAY_SERVER_ERROR_ENCODING,
  RELAY_SERVER_PROXY_RULES_JSON: env.RELAY_SERVER_PROXY_RULES_JSON,
  RELAY_SERVER_TLS_ENABLED: env.RELAY_SERVER_TLS_ENABLED,
  RELAY_SERVER_TLS_KEY_PATH: env.RELAY_SERVER_TLS_KEY_PATH,
  RELAY_SERVER_TLS_CERT_PATH: env.RELAY_SERVER_TLS_CERT_PATH,
  RELAY_SERVER_TLS_CLIENT_CA_PATH: env.RELAY_SERVER_TLS_CLIENT_CA_PATH,
  RELAY_SERVER_TLS_REQUEST_CLIENT_CERT: env.RELAY_SERVER_TLS_REQUEST_CLIENT_CERT,
  RELAY_SERVER_TLS_REJECT_UNAUTHORIZED_CLIENT_CERT: env.RELAY_SERVER_TLS_REJECT_UNAUTHORIZED_CLIENT_CERT
})

const loadTlsConfig = (parsed: z.infer<typeof envSchema>): TlsConfig | undefined => {
  if (!parsed.RELAY_SERVER_TLS_ENABLED) {
    return undefined
  }

  const keyPath = parsed.RELAY_SERVER_TLS_KEY_PATH
  const certPath = parsed.RELAY_SERVER_TLS_CERT_PATH
  if (!keyPath || !certPath) {
    throw new Error('RELAY_SERVER_TLS_KEY_PATH and RELAY_SERVER_TLS_CERT_PATH are required when TLS is enabled')
  }

  const rejectUnauthorizedClientCert = parsed.RELAY_SERVER_TLS_REJECT_UNAUTHORIZED_CLIENT_CERT
  if (rejectUnauthorizedClientCert && !parsed.RELAY_SERVER_TLS_CLIENT_CA_PATH) {
    throw new Error('RELAY_SERVER_TLS_CLIENT_CA_PATH is required when TLS is configured to verify client certificates')
  }

  return {
    enabled: true,
    keyPath,
    certPath,
    ...(parsed.RELAY_SERVER_TLS_CLIENT_CA_PATH ? {clientCaPath: parsed.RELAY_SERVER_TLS_CLIENT_CA_PATH} : {}),
    requestClientCert: parsed.RELAY_SERVER_TLS_REQUEST_CLIENT_CERT || rejectUnauthorizedClientCert,
    rejectUnauthorizedClientCert
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))
  if (parsed.RELAY_SERVER_PROXY_RULES_JSON === INVALID_JSON) {
    throw new Error('RELAY_SERVER_PROXY_RULES_JSON must be valid JSON')
  }

  const proxyRules = parseProxyRules({
    raw: parsed.RELAY_SERVER_PROXY_RULES_JSON,
    envVarName: 'RELAY_SERVER_PROXY_RULES_JSON'
  })
  const tls = loadTlsConfig(parsed)

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.RELAY_SERVER_HOST,
    port: parsed.RELAY_SERVER_PORT,
    maxBodyBytes: parsed.RELAY_SERVER_MAX_BODY_BYTES,
    logLevel: parsed.RELAY_SERVER_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
    logRedactKeys: parseRedactKeys(parsed.RELAY_SERVER_LOG_REDACT_KEYS),
    errorEncoding: parsed.RELAY_SERVER_ERROR_ENCODING,
    proxyRules,
    ...(tls ? {tls} : {})
  }
}
