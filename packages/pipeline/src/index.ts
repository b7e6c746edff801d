export {
  ErrorEnvelopeSchema,
  HttpMethodSchema,
  ResponseCookieSchema,
  ResponseEncodingSchema,
  SameSiteSchema,
  type ErrorEnvelope,
  type HttpMethod,
  type ResponseCookie,
  type ResponseEncoding,
  type SameSite
} from './contracts';
export {extractCommonName, parseClientCertificate} from './certificate';
export {
  applyResponseCookies,
  encodeCookieValue,
  parseCookieHeader,
  serializeCookieHeader,
  serializeSetCookie,
  wrapCookies
} from './cookies';
export {
  wrapDataErrors,
  wrapErrorClassification,
  wrapSchemaErrors,
  wrapUncaughtErrors,
  type ErrorLayerOptions
} from './errorHandlers';
export {
  assertMatchesSchema,
  domainDataErrorKinds,
  isDomainDataError,
  isSchemaMismatchError,
  ProxyTransportError,
  requestDataInvalid,
  SCHEMA_MISMATCH_SIGNATURE,
  ServiceError,
  serviceStatusVersionNotFound,
  StructuredError,
  userDataInvalid,
  type DomainDataErrorKind
} from './errors';
export {
  CACHE_CONTROL_VALUE,
  composeMiddleware,
  wrapCacheHeaders,
  wrapCertificateCn,
  wrapFrameOptionsDeny,
  wrapRequestLogging,
  wrapResponseLogging
} from './middleware';
export {buildTargetUrl, compileMatcher, createProxyMiddleware, wrapProxy, type ProxyOptions} from './proxy';
export {buildResponse, JSON_CONTENT_TYPE, jsonResponse, plainResponse, TEXT_CONTENT_TYPE} from './response';
export {sanitizeRequest, type SanitizedRequest} from './sanitize';
export {
  createRequest,
  getHeader,
  type ClientCertificate,
  type CreateRequestInput,
  type Handler,
  type Middleware,
  type PeerCertificateLike,
  type PipelineHeaders,
  type PipelineRequest,
  type PipelineResponse,
  type ProxyRule,
  type RequestCookie
} from './types';
