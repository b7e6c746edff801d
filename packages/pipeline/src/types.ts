import type {X509Certificate} from '@peculiar/x509';
import type {ForwarderOptionsInput} from '@relay-pipeline/forwarder';

import type {HttpMethod, ResponseCookie} from './contracts';

/** The subset of a Node `tls.PeerCertificate` the pipeline reads. */
export type PeerCertificateLike = {
  readonly subject?: {readonly CN?: string | string[]};
};

export type ClientCertificate = X509Certificate | PeerCertificateLike;

export type RequestCookie = {value: string};

export type PipelineHeaders = Readonly<Record<string, string>>;

export type PipelineRequest = {
  readonly method: HttpMethod;
  readonly path: string;
  readonly queryString?: string;
  readonly headers: PipelineHeaders;
  readonly cookies?: Readonly<Record<string, RequestCookie>>;
  readonly clientCertificate?: ClientCertificate;
  readonly clientCn?: string | null;
  readonly authorization?: Readonly<Record<string, unknown>>;
  readonly body?: Buffer;
};

export type PipelineResponse = {
  status: number;
  headers: Record<string, string | string[]>;
  body?: string | Buffer;
  cookies?: Record<string, ResponseCookie>;
};

/** A handler resolves `null` to decline the request. */
export type Handler = (request: PipelineRequest) => Promise<PipelineResponse | null>;

export type Middleware = (handler: Handler) => Handler;

export type ProxyRule = {
  matcher: string | RegExp;
  remoteOrigin: string;
  transport?: ForwarderOptionsInput;
};

export type CreateRequestInput = Omit<PipelineRequest, 'headers'> & {
  headers?: Readonly<Record<string, string>>;
};

/** Builds a request snapshot with lower-cased header names. */
export const createRequest = ({headers = {}, ...rest}: CreateRequestInput): PipelineRequest => ({
  ...rest,
  headers: Object.fromEntries(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]))
});

export const getHeader = (request: PipelineRequest, name: string): string | undefined =>
  request.headers[name.toLowerCase()];
