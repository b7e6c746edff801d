import type {HeaderList} from './contracts';
import {err, ok, type ForwarderResult} from './errors';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const CONNECTION_TOKEN_SPLIT_REGEX = /\s*,\s*/u;

export const HOP_BY_HOP_HEADER_NAMES = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

export const normalizeHeaderName = (name: string): ForwarderResult<string> => {
  const normalizedName = name.trim().toLowerCase();
  if (!HTTP_HEADER_NAME_REGEX.test(normalizedName)) {
    return err('invalid_header_name', `Invalid header name: ${name}`);
  }

  return ok(normalizedName);
};

export const validateHeaderValue = (value: string): ForwarderResult<string> => {
  if (/[\r\n]/u.test(value)) {
    return err('invalid_header_value', 'Header values must not contain CR or LF');
  }

  return ok(value.trim());
};

export const toHeaderList = (headers: Readonly<Record<string, string | string[] | undefined>>): HeaderList =>
  Object.entries(headers).flatMap(([name, value]) => {
    if (value === undefined) {
      return [];
    }

    const values = Array.isArray(value) ? value : [value];
    return values.map(item => ({name, value: item}));
  });

const parseConnectionHeaderTokens = (connectionHeaderValue: string): ForwarderResult<Set<string>> => {
  const tokenSet = new Set<string>();

  for (const rawToken of connectionHeaderValue.split(CONNECTION_TOKEN_SPLIT_REGEX)) {
    const token = rawToken.trim().toLowerCase();
    if (token.length === 0) {
      continue;
    }

    if (!HTTP_HEADER_NAME_REGEX.test(token)) {
      return err('invalid_connection_header', `Connection header contains an invalid token: ${rawToken}`);
    }

    tokenSet.add(token);
  }

  return ok(tokenSet);
};

/**
 * Normalizes names to lower case, validates values and drops hop-by-hop
 * headers along with any header the Connection header nominates.
 */
export const stripHopByHopHeaders = (headers: HeaderList): ForwarderResult<HeaderList> => {
  const normalizedHeaders: HeaderList = [];
  const headersToStrip = new Set(HOP_BY_HOP_HEADER_NAMES);

  for (const header of headers) {
    const normalizedName = normalizeHeaderName(header.name);
    if (!normalizedName.ok) {
      return normalizedName;
    }

    const normalizedValue = validateHeaderValue(header.value);
    if (!normalizedValue.ok) {
      return normalizedValue;
    }

    if (normalizedName.value === 'connection') {
      const connectionTokens = parseConnectionHeaderTokens(normalizedValue.value);
      if (!connectionTokens.ok) {
        return connectionTokens;
      }

      connectionTokens.value.forEach(token => headersToStrip.add(token));
    }

    normalizedHeaders.push({name: normalizedName.value, value: normalizedValue.value});
  }

  return ok(normalizedHeaders.filter(header => !headersToStrip.has(header.name)));
};
