import {
  ForwarderOptionsSchema,
  relayRequest,
  toHeaderList,
  type FetchLike,
  type ForwarderOptions
} from '@relay-pipeline/forwarder';
import {createNoopLogger, type StructuredLogger} from '@relay-pipeline/logging';

import {parseCookieHeader, serializeCookieHeader, wrapCookies} from './cookies';
import {ProxyTransportError} from './errors';
import type {Handler, Middleware, PipelineRequest, PipelineResponse, ProxyRule, RequestCookie} from './types';

export type ProxyOptions = {
  handler: Handler;
  rule: ProxyRule;
  logger?: StructuredLogger;
  fetchImpl?: FetchLike;
};

type CompiledMatcher = {
  matches: (path: string) => boolean;
  remainder: (path: string) => string;
};

/**
 * A string matches as a literal prefix followed by `/`. A pattern is anchored
 * to the start of the path and loses `g`/`y` so no `lastIndex` survives a call.
 */
export const compileMatcher = (matcher: string | RegExp): CompiledMatcher => {
  if (typeof matcher === 'string') {
    return {
      matches: path => path.startsWith(`${matcher}/`),
      remainder: path => path.replace(matcher, '')
    };
  }

  const anchored = new RegExp(`^${matcher.source}`, matcher.flags.replace(/[gy]/gu, ''));
  return {
    matches: path => anchored.test(path),
    remainder: path => path.replace(anchored, '')
  };
};

/**
 * Appends the unmatched part of the path to the origin's path. Only the path
 * and query come from the request; scheme, host and port are the origin's.
 */
export const buildTargetUrl = ({
  origin,
  remainder,
  queryString
}: {
  origin: URL;
  remainder: string;
  queryString?: string;
}) => {
  const target = new URL(origin);
  const basePath = origin.pathname.replace(/\/$/u, '');
  const suffix = remainder.length === 0 || remainder.startsWith('/') ? remainder : `/${remainder}`;

  target.pathname = `${basePath}${suffix}`;
  target.search = queryString ? `?${queryString}` : '';
  target.hash = '';

  return target.toString();
};

const sameCookies = (
  left: Readonly<Record<string, RequestCookie>>,
  right: Readonly<Record<string, RequestCookie>>
) => {
  const leftEntries = Object.entries(left);
  return (
    leftEntries.length === Object.keys(right).length &&
    leftEntries.every(([name, cookie]) => right[name]?.value === cookie.value)
  );
};

// The inbound Cookie header goes out byte for byte unless the cookies were replaced on the way in.
const relayCookieHeader = (request: PipelineRequest) => {
  const inbound = request.headers.cookie;
  if (!request.cookies) {
    return inbound;
  }

  if (inbound && sameCookies(parseCookieHeader(inbound), request.cookies)) {
    return inbound;
  }

  const serialized = serializeCookieHeader(request.cookies);
  return serialized.length > 0 ? serialized : undefined;
};

const toRelayHeaders = (request: PipelineRequest) => {
  const headers = toHeaderList(request.headers).filter(header => header.name.toLowerCase() !== 'cookie');
  const cookieHeader = relayCookieHeader(request);

  return cookieHeader === undefined ? headers : [...headers, {name: 'cookie', value: cookieHeader}];
};

const relay = async ({
  request,
  target,
  transport,
  fetchImpl
}: {
  request: PipelineRequest;
  target: string;
  transport: ForwarderOptions;
  fetchImpl?: FetchLike;
}): Promise<PipelineResponse> => {
  const result = await relayRequest({
    input: {
      method: request.method,
      url: target,
      headers: toRelayHeaders(request),
      body: request.body,
      options: transport
    },
    fetchImpl
  });

  if (!result.ok) {
    throw new ProxyTransportError({code: result.error.code, target, message: result.error.message});
  }

  return {
    status: result.value.status,
    headers: result.value.headers,
    body: result.value.body
  };
};

/**
 * Relays requests whose path matches `rule` to the rule's remote origin and
 * hands every other request to `handler`. Cookies are parsed before and
 * serialized after, for both branches.
 */
export const wrapProxy = ({handler, rule, logger = createNoopLogger(), fetchImpl}: ProxyOptions): Handler => {
  const matcher = compileMatcher(rule.matcher);
  const origin = new URL(rule.remoteOrigin);
  const transport = ForwarderOptionsSchema.parse(rule.transport ?? {});

  return wrapCookies()(async request => {
    if (!matcher.matches(request.path)) {
      return handler(request);
    }

    const target = buildTargetUrl({
      origin,
      remainder: matcher.remainder(request.path),
      queryString: request.queryString
    });
    const response = await relay({request, target, transport, fetchImpl});

    logger.debug({
      event: 'pipeline.proxy.relayed',
      component: 'pipeline.proxy',
      message: `Proxying request to ${request.path} to remote url ${target}. Remote server responded with status ${response.status}`,
      route: request.path,
      method: request.method,
      status_code: response.status
    });

    return response;
  });
};

export const createProxyMiddleware =
  (options: Omit<ProxyOptions, 'handler'>): Middleware =>
  handler =>
    wrapProxy({...options, handler});
