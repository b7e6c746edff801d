import type {
  ReadableStream as NodeReadableStream,
  ReadableStreamDefaultReader
} from 'node:stream/web';

import {
  RelayRequestInputSchema,
  type FetchLike,
  type HeaderList,
  type RelayRequestInput,
  type RelayedResponse
} from './contracts';
import {err, ok, type ForwarderResult} from './errors';
import {HOP_BY_HOP_HEADER_NAMES, normalizeHeaderName, stripHopByHopHeaders, validateHeaderValue} from './headers';

// The relay sets these itself: fetch derives host and framing from the target URL and body.
const CLIENT_HEADER_DENYLIST = new Set(['host', 'content-length']);

const INJECTED_HEADER_DENYLIST = new Set([...HOP_BY_HOP_HEADER_NAMES, 'host', 'content-length']);

// fetch hands back a decoded body, so the upstream framing and encoding no longer apply.
const RESPONSE_HEADER_DENYLIST = new Set([
  ...HOP_BY_HOP_HEADER_NAMES,
  'content-length',
  'content-encoding',
  'set-cookie'
]);

const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD']);

const parseTargetUrl = (url: string): ForwarderResult<URL> => {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    return err('request_url_invalid', `Invalid relay URL: ${url}`);
  }

  if (parsedUrl.protocol !== 'http:' && parsedUrl.protocol !== 'https:') {
    return err('request_url_invalid', `Relay URL scheme is not supported: ${parsedUrl.protocol}`);
  }

  return ok(parsedUrl);
};

const buildUpstreamHeaders = ({
  requestHeaders,
  injectedHeaders
}: {
  requestHeaders: HeaderList;
  injectedHeaders: Record<string, string>;
}): ForwarderResult<HeaderList> => {
  const strippedRequestHeaders = stripHopByHopHeaders(requestHeaders);
  if (!strippedRequestHeaders.ok) {
    return strippedRequestHeaders;
  }

  let upstreamHeaders = strippedRequestHeaders.value.filter(header => !CLIENT_HEADER_DENYLIST.has(header.name));

  for (const [name, value] of Object.entries(injectedHeaders)) {
    const normalizedName = normalizeHeaderName(name);
    if (!normalizedName.ok) {
      return normalizedName;
    }

    const normalizedValue = validateHeaderValue(value);
    if (!normalizedValue.ok) {
      return normalizedValue;
    }

    if (INJECTED_HEADER_DENYLIST.has(normalizedName.value)) {
      return err(
        'forbidden_upstream_header',
        `Injected header is forbidden for upstream forwarding: ${normalizedName.value}`
      );
    }

    upstreamHeaders = upstreamHeaders.filter(header => header.name !== normalizedName.value);
    upstreamHeaders.push({name: normalizedName.value, value: normalizedValue.value});
  }

  return ok(upstreamHeaders);
};

const toHeadersObject = (headers: HeaderList): Headers => {
  const upstreamHeaders = new Headers();
  for (const header of headers) {
    upstreamHeaders.append(header.name, header.value);
  }

  return upstreamHeaders;
};

const collectResponseHeaders = (response: Response): Record<string, string | string[]> => {
  const collected: Record<string, string | string[]> = {};

  for (const [name, value] of response.headers.entries()) {
    const lowerName = name.toLowerCase();
    if (RESPONSE_HEADER_DENYLIST.has(lowerName)) {
      continue;
    }

    collected[lowerName] = value;
  }

  const setCookies = response.headers.getSetCookie();
  if (setCookies.length > 0) {
    collected['set-cookie'] = setCookies;
  }

  return collected;
};

const readResponseBodyWithLimit = async ({
  response,
  maxResponseBytes
}: {
  response: Response;
  maxResponseBytes: number;
}): Promise<ForwarderResult<Buffer>> => {
  const contentLengthHeader = response.headers.get('content-length');
  if (contentLengthHeader && /^\d+$/u.test(contentLengthHeader.trim())) {
    const contentLength = Number.parseInt(contentLengthHeader, 10);
    if (Number.isSafeInteger(contentLength) && contentLength > maxResponseBytes) {
      return err(
        'upstream_response_too_large',
        `Upstream response exceeds max_response_bytes=${maxResponseBytes}`
      );
    }
  }

  if (!response.body) {
    return ok(Buffer.alloc(0));
  }

  const reader: ReadableStreamDefaultReader<Uint8Array> = (
    response.body as NodeReadableStream<Uint8Array>
  ).getReader();
  const chunks: Buffer[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const readResult = await reader.read();
      if (readResult.done) {
        break;
      }

      const chunk = readResult.value;
      if (chunk.byteLength === 0) {
        continue;
      }

      totalBytes += chunk.byteLength;
      if (totalBytes > maxResponseBytes) {
        await reader.cancel();
        return err(
          'upstream_response_too_large',
          `Upstream response exceeds max_response_bytes=${maxResponseBytes}`
        );
      }

      chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    }

    return ok(Buffer.concat(chunks, totalBytes));
  } catch (unknownError) {
    return mapFetchError(unknownError);
  }
};

const mapFetchError = (unknownError: unknown) => {
  if (unknownError instanceof Error) {
    if (unknownError.name === 'AbortError' || unknownError.name === 'TimeoutError') {
      return err('upstream_timeout', 'Upstream request timed out');
    }

    const cause = unknownError.cause instanceof Error ? `: ${unknownError.cause.message}` : '';
    return err('upstream_network_error', `${unknownError.message}${cause}`);
  }

  return err('upstream_network_error', 'Upstream request failed');
};

/**
 * Performs one outbound HTTP exchange and buffers the reply.
 *
 * Expected failures (bad input, refused connections, timeouts, oversized
 * bodies) come back as a failed result rather than a thrown error. Nothing is
 * retried.
 */
export const relayRequest = async ({
  input,
  fetchImpl
}: {
  input: RelayRequestInput;
  fetchImpl?: FetchLike;
}): Promise<ForwarderResult<RelayedResponse>> => {
  const parsedInput = RelayRequestInputSchema.safeParse(input);
  if (!parsedInput.success) {
    return err('invalid_input', parsedInput.error.message);
  }

  const {method, url, headers, body, options} = parsedInput.data;

  const targetUrl = parseTargetUrl(url);
  if (!targetUrl.ok) {
    return targetUrl;
  }

  const upstreamHeaders = buildUpstreamHeaders({
    requestHeaders: headers,
    injectedHeaders: options.headers
  });
  if (!upstreamHeaders.ok) {
    return upstreamHeaders;
  }

  const requestFetch = fetchImpl ?? globalThis.fetch;

  let upstreamResponse: Response;
  try {
    upstreamResponse = await requestFetch(targetUrl.value, {
      method,
      headers: toHeadersObject(upstreamHeaders.value),
      body: body && !METHODS_WITHOUT_BODY.has(method.toUpperCase()) ? body : undefined,
      redirect: options.follow_redirects ? 'follow' : 'manual',
      signal: AbortSignal.timeout(options.total_timeout_ms)
    });
  } catch (unknownError) {
    return mapFetchError(unknownError);
  }

  const responseBody = await readResponseBodyWithLimit({
    response: upstreamResponse,
    maxResponseBytes: options.max_response_bytes
  });
  if (!responseBody.ok) {
    return responseBody;
  }

  return ok({
    status: upstreamResponse.status,
    headers: collectResponseHeaders(upstreamResponse),
    body: responseBody.value
  });
};
