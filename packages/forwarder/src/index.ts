export {
  DEFAULT_FORWARDER_OPTIONS,
  ForwarderOptionsSchema,
  HeaderListSchema,
  RelayRequestInputSchema,
  type FetchLike,
  type ForwarderOptions,
  type ForwarderOptionsInput,
  type Header,
  type HeaderList,
  type RelayRequestInput,
  type RelayedResponse
} from './contracts';
export {
  err,
  forwarderErrorCodes,
  ok,
  type ForwarderError,
  type ForwarderErrorCode,
  type ForwarderFailure,
  type ForwarderResult,
  type ForwarderSuccess
} from './errors';
export {relayRequest} from './forward';
export {
  HOP_BY_HOP_HEADER_NAMES,
  normalizeHeaderName,
  stripHopByHopHeaders,
  toHeaderList,
  validateHeaderValue
} from './headers';

export const packageName = 'forwarder';
