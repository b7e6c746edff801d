import {webcrypto} from 'node:crypto'
import {mkdtempSync, rmSync, writeFileSync} from 'node:fs'
import {request as httpsRequest} from 'node:https'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import * as x509 from '@peculiar/x509'
import type {StructuredLogger} from '@relay-pipeline/logging'
import {jsonResponse} from '@relay-pipeline/pipeline'
import {afterEach, describe, expect, it, vi} from 'vitest'

import {createRelayHandler} from '../app'
import {loadConfig} from '../config'
import {createRelayServer, type RelayServer} from '../server'

const createRecordingLogger = () =>
  ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  }) satisfies StructuredLogger

const createPemIdentity = async (name: string) => {
  const keys = await webcrypto.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: 2048,
      publicExponent: new Uint8Array([1, 0, 1]),
      hash: 'SHA-256'
    },
    true,
    ['sign', 'verify']
  )
  const certificate = await x509.X509CertificateGenerator.createSelfSigned({
    name,
    keys,
    notBefore: new Date(Date.now() - 60_000),
    notAfter: new Date(Date.now() + 86_400_000)
  })
  const privateKeyDer = await webcrypto.subtle.exportKey('pkcs8', keys.privateKey)

  return {
    certPem: certificate.toString('pem'),
    keyPem: x509.PemConverter.encode(privateKeyDer, 'PRIVATE KEY')
  }
}

const running: RelayServer[] = []
const tempDirs: string[] = []

afterEach(async () => {
  await Promise.all(running.splice(0).map(server => server.stop()))
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, {recursive: true, force: true})
  }
})

const startServer = async ({
  env,
  application,
  logger = createRecordingLogger()
}: {
  env?: NodeJS.ProcessEnv
  application?: Parameters<typeof createRelayHandler>[0]['application']
  logger?: StructuredLogger
} = {}) => {
  const config = loadConfig({NODE_ENV: 'test', RELAY_SERVER_HOST: '127.0.0.1', RELAY_SERVER_PORT: '0', ...env})
  const handler = createRelayHandler({config, logger, ...(application ? {application} : {})})
  const relayServer = await createRelayServer({config, handler, logger})
  const address = await relayServer.start()
  running.push(relayServer)
  return {address, logger}
}

describe('createRelayServer over http', () => {
  it('serves the health check through the full chain', async () => {
    const {address, logger} = await startServer()

    const response = await fetch(`http://127.0.0.1:${address.port}/healthz`, {
      headers: {'x-correlation-id': 'corr-health'}
    })

    expect(response.status).toBe(200)
    expect(await response.text()).toBe('{"status":"ok"}')
    expect(response.headers.get('content-type')).toBe('application/json; charset=utf-8')
    expect(response.headers.get('cache-control')).toBe('private, max-age=0, no-cache')
    expect(response.headers.get('x-frame-options')).toBe('DENY')
    expect(response.headers.get('x-correlation-id')).toBe('corr-health')
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({event: 'request.completed', route: '/healthz', method: 'GET', status_code: 200})
    )
  })

  it('answers 404 when nothing handles the request', async () => {
    const {address} = await startServer()

    const response = await fetch(`http://127.0.0.1:${address.port}/missing`)

    expect(response.status).toBe(404)
    expect(await response.text()).toBe('Not Found')
  })

  it('rejects oversized bodies with a data error', async () => {
    const {address} = await startServer({env: {RELAY_SERVER_MAX_BODY_BYTES: '8'}})

    const response = await fetch(`http://127.0.0.1:${address.port}/upload`, {
      method: 'POST',
      body: 'x'.repeat(64)
    })

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({
      error: {max_body_bytes: 8, type: 'request-data-invalid', message: 'Request body exceeds 8 bytes'}
    })
  })

  it('fails to start when the port is taken', async () => {
    const {address} = await startServer()
    const config = loadConfig({NODE_ENV: 'test', RELAY_SERVER_HOST: '127.0.0.1', RELAY_SERVER_PORT: String(address.port)})
    const second = await createRelayServer({config, handler: () => Promise.resolve(null)})

    await expect(second.start()).rejects.toThrow('EADDRINUSE')
  })
})

describe('createRelayServer over https', () => {
  it('hands the client certificate CN to the application', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'relay-server-tls-'))
    tempDirs.push(dir)
    const serverIdentity = await createPemIdentity('CN=localhost')
    const clientIdentity = await createPemIdentity('CN=relay-client.test')
    writeFileSync(join(dir, 'key.pem'), serverIdentity.keyPem)
    writeFileSync(join(dir, 'cert.pem'), serverIdentity.certPem)

    const {address} = await startServer({
      env: {
        RELAY_SERVER_TLS_ENABLED: 'true',
        RELAY_SERVER_TLS_KEY_PATH: join(dir, 'key.pem'),
        RELAY_SERVER_TLS_CERT_PATH: join(dir, 'cert.pem'),
        RELAY_SERVER_TLS_REQUEST_CLIENT_CERT: 'true'
      },
      application: request => Promise.resolve(jsonResponse(200, {cn: request.clientCn ?? null}))
    })

    const body = await new Promise<string>((resolve, reject) => {
      const outgoing = httpsRequest(
        {
          host: '127.0.0.1',
          port: address.port,
          path: '/whoami',
          method: 'GET',
          key: clientIdentity.keyPem,
          cert: clientIdentity.certPem,
          rejectUnauthorized: false
        },
        incoming => {
          const chunks: Buffer[] = []
          incoming.on('data', (chunk: Buffer) => chunks.push(chunk))
          incoming.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
          incoming.on('error', reject)
        }
      )
      outgoing.on('error', reject)
      outgoing.end()
    })

    expect(body).toBe('{"cn":"relay-client.test"}')
  }, 20_000)

  it('fails with a descriptive error when TLS files are missing', async () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      RELAY_SERVER_TLS_ENABLED: 'true',
      RELAY_SERVER_TLS_KEY_PATH: '/nonexistent/relay/key.pem',
      RELAY_SERVER_TLS_CERT_PATH: '/nonexistent/relay/cert.pem'
    })

    await expect(createRelayServer({config, handler: () => Promise.resolve(null)})).rejects.toThrow(
      'Unable to load TLS configuration for relay-server'
    )
  })
})
