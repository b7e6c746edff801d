import {extractCommonName} from './certificate';
import type {PipelineRequest} from './types';

export type SanitizedRequest = Omit<PipelineRequest, 'clientCertificate'> & {
  readonly clientCertificate?: never;
  readonly clientCertCn?: string | null;
};

const withoutCertificateCredential = (authorization: Readonly<Record<string, unknown>>) =>
  Object.fromEntries(Object.entries(authorization).filter(([key]) => key !== 'certificate'));

/**
 * Logging-safe view of a request: the raw client certificate is replaced by
 * its Common Name and the credential under `authorization.certificate` is
 * removed. The request handed down the chain is left untouched.
 */
export const sanitizeRequest = (request: PipelineRequest | SanitizedRequest): SanitizedRequest => {
  const {authorization, clientCertificate, ...rest} = request;
  const sanitized: SanitizedRequest =
    clientCertificate === undefined ? rest : {...rest, clientCertCn: extractCommonName(clientCertificate)};

  if (!authorization) {
    return sanitized;
  }

  const remaining = withoutCertificateCredential(authorization);
  return Object.keys(remaining).length > 0 ? {...sanitized, authorization: remaining} : sanitized;
};
