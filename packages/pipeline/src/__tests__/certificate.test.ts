import {describe, expect, it} from 'vitest';

import {extractCommonName, parseClientCertificate} from '../certificate';
import {createSelfSignedCertificate} from './fixtures';

describe('extractCommonName', () => {
  it('returns null without a certificate', () => {
    expect(extractCommonName(undefined)).toBeNull();
    expect(extractCommonName(null)).toBeNull();
  });

  it('reads the subject CN of an x509 certificate', async () => {
    const certificate = await createSelfSignedCertificate('CN=client.example.test, O=Relay Tests');

    expect(extractCommonName(certificate)).toBe('client.example.test');
  });

  it('returns null for a subject without CN', async () => {
    const certificate = await createSelfSignedCertificate('O=No Common Name');

    expect(extractCommonName(certificate)).toBeNull();
  });

  it('reads node peer certificate subjects', () => {
    expect(extractCommonName({subject: {CN: 'peer.example.test'}})).toBe('peer.example.test');
    expect(extractCommonName({subject: {CN: ['first.example.test', 'second.example.test']}})).toBe(
      'first.example.test'
    );
  });

  it('returns null for an empty peer certificate', () => {
    // Node hands back an empty object when the client presented nothing.
    expect(extractCommonName({})).toBeNull();
  });
});

describe('parseClientCertificate', () => {
  it('parses DER bytes and PEM text', async () => {
    const certificate = await createSelfSignedCertificate('CN=der.example.test');

    const fromDer = parseClientCertificate(Buffer.from(certificate.rawData));
    const fromPem = parseClientCertificate(certificate.toString('pem'));

    expect(extractCommonName(fromDer)).toBe('der.example.test');
    expect(extractCommonName(fromPem)).toBe('der.example.test');
  });

  it('throws on malformed input', () => {
    expect(() => parseClientCertificate(Buffer.from('not a certificate'))).toThrow();
  });
});
