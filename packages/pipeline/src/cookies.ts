import {ResponseCookieSchema, type ResponseCookie} from './contracts';
import type {Middleware, PipelineResponse, RequestCookie} from './types';

const COOKIE_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;
// Anything outside RFC 6265 cookie-octet.
const NON_COOKIE_OCTET_REGEX = /[^\x21\x23-\x2B\x2D-\x3A\x3C-\x5B\x5D-\x7E]/gu;

const unquote = (value: string) =>
  value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;

const decodeCookieValue = (value: string) => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

export const encodeCookieValue = (value: string) =>
  value.replace(NON_COOKIE_OCTET_REGEX, character => encodeURIComponent(character));

/**
 * Parses a `Cookie` request header. Pairs with an invalid name are skipped and
 * the first occurrence of a name wins.
 */
export const parseCookieHeader = (header: string | undefined): Record<string, RequestCookie> => {
  const cookies = new Map<string, RequestCookie>();
  if (!header) {
    return {};
  }

  for (const pair of header.split(';')) {
    const separatorIndex = pair.indexOf('=');
    if (separatorIndex < 0) {
      continue;
    }

    const name = pair.slice(0, separatorIndex).trim();
    if (!COOKIE_NAME_REGEX.test(name) || cookies.has(name)) {
      continue;
    }

    const rawValue = unquote(pair.slice(separatorIndex + 1).trim());
    cookies.set(name, {value: decodeCookieValue(rawValue)});
  }

  return Object.fromEntries(cookies);
};

export const serializeCookieHeader = (cookies: Readonly<Record<string, RequestCookie>>): string =>
  Object.entries(cookies)
    .map(([name, cookie]) => `${name}=${encodeCookieValue(cookie.value)}`)
    .join('; ');

export const serializeSetCookie = (name: string, cookie: ResponseCookie): string => {
  if (!COOKIE_NAME_REGEX.test(name)) {
    throw new TypeError(`Invalid cookie name: ${name}`);
  }

  const parsed = ResponseCookieSchema.parse(cookie);
  const attributes = [
    parsed.path ? `Path=${parsed.path}` : null,
    parsed.domain ? `Domain=${parsed.domain}` : null,
    parsed.maxAge !== undefined ? `Max-Age=${parsed.maxAge}` : null,
    parsed.expires ? `Expires=${parsed.expires.toUTCString()}` : null,
    parsed.secure ? 'Secure' : null,
    parsed.httpOnly ? 'HttpOnly' : null,
    parsed.sameSite ? `SameSite=${parsed.sameSite}` : null
  ].filter((attribute): attribute is string => attribute !== null);

  return [`${name}=${encodeCookieValue(parsed.value)}`, ...attributes].join('; ');
};

const toHeaderValues = (value: string | string[] | undefined) => {
  if (value === undefined) {
    return [];
  }

  return Array.isArray(value) ? value : [value];
};

/** Moves `response.cookies` onto the `set-cookie` header. */
export const applyResponseCookies = (response: PipelineResponse): PipelineResponse => {
  const {cookies, ...rest} = response;
  if (!cookies || Object.keys(cookies).length === 0) {
    return rest;
  }

  const setCookie = [
    ...toHeaderValues(rest.headers['set-cookie']),
    ...Object.entries(cookies).map(([name, cookie]) => serializeSetCookie(name, cookie))
  ];

  return {...rest, headers: {...rest.headers, 'set-cookie': setCookie}};
};

export const wrapCookies =
  (): Middleware =>
  handler =>
  async request => {
    const cookies = request.cookies ?? parseCookieHeader(request.headers.cookie);
    const response = await handler({...request, cookies});
    return response ? applyResponseCookies(response) : null;
  };
