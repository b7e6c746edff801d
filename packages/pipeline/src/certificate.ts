import {X509Certificate} from '@peculiar/x509';

import type {ClientCertificate} from './types';

const firstNonEmpty = (values: readonly string[]) => values.find(value => value.length > 0) ?? null;

/**
 * Returns the subject Common Name of a client certificate, or `null` when no
 * certificate was presented or its subject carries no CN.
 */
export const extractCommonName = (certificate: ClientCertificate | null | undefined): string | null => {
  if (!certificate) {
    return null;
  }

  if (certificate instanceof X509Certificate) {
    return firstNonEmpty(certificate.subjectName.getField('CN'));
  }

  // Node reports a repeated subject attribute as an array.
  const commonName = certificate.subject?.CN;
  if (commonName === undefined) {
    return null;
  }

  return firstNonEmpty(Array.isArray(commonName) ? commonName : [commonName]);
};

/** Parses DER bytes or PEM text into a certificate. Throws on malformed input. */
export const parseClientCertificate = (raw: Buffer | string): X509Certificate =>
  new X509Certificate(typeof raw === 'string' ? raw : new Uint8Array(raw));
