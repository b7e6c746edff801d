import {webcrypto} from 'node:crypto';

import * as x509 from '@peculiar/x509';
import type {StructuredLogger} from '@relay-pipeline/logging';
import {vi} from 'vitest';

import type {Handler, PipelineResponse} from '../types';

export const createRecordingLogger = () =>
  ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  }) satisfies StructuredLogger;

export const createSelfSignedCertificate = async (name: string) => {
  const keys = await webcrypto.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: 2048,
      publicExponent: new Uint8Array([1, 0, 1]),
      hash: 'SHA-256'
    },
    true,
    ['sign', 'verify']
  );

  return x509.X509CertificateGenerator.createSelfSigned({
    name,
    keys,
    notBefore: new Date('2026-01-01T00:00:00.000Z'),
    notAfter: new Date('2027-01-01T00:00:00.000Z')
  });
};

export const okResponse = (): PipelineResponse => ({
  status: 200,
  headers: {'content-type': 'text/plain; charset=utf-8'},
  body: 'ok'
});

export const respondWith =
  (response: PipelineResponse | null): Handler =>
  () =>
    Promise.resolve(response);
