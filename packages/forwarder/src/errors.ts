export const forwarderErrorCodes = [
  'invalid_input',
  'invalid_header_name',
  'invalid_header_value',
  'invalid_connection_header',
  'forbidden_upstream_header',
  'request_url_invalid',
  'upstream_timeout',
  'upstream_network_error',
  'upstream_response_too_large'
] as const;

export type ForwarderErrorCode = (typeof forwarderErrorCodes)[number];

export type ForwarderError = {
  code: ForwarderErrorCode;
  message: string;
};

export type ForwarderSuccess<T> = {ok: true; value: T};
export type ForwarderFailure = {ok: false; error: ForwarderError};
export type ForwarderResult<T> = ForwarderSuccess<T> | ForwarderFailure;

export const ok = <T>(value: T): ForwarderSuccess<T> => ({ok: true, value});

export const err = (code: ForwarderErrorCode, message: string): ForwarderFailure => ({
  ok: false,
  error: {code, message}
});
