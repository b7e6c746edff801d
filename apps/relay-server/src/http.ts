import {randomUUID} from 'node:crypto'
import type {IncomingHttpHeaders, IncomingMessage, OutgoingHttpHeaders, ServerResponse} from 'node:http'
import {TLSSocket} from 'node:tls'

import {
  HttpMethodSchema,
  createRequest,
  parseClientCertificate,
  plainResponse,
  requestDataInvalid,
  type ClientCertificate,
  type PipelineRequest,
  type PipelineResponse
} from '@relay-pipeline/pipeline'

export const extractCorrelationId = (request: Pick<IncomingMessage, 'headers'>) => {
  const header = request.headers['x-correlation-id']
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: AsyncIterable<unknown>
  maxBodyBytes: number
}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw requestDataInvalid('Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw requestDataInvalid(`Request body exceeds ${maxBodyBytes} bytes`, {max_body_bytes: maxBodyBytes})
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

// A request-side set-cookie is dropped.
const flattenHeaders = (headers: IncomingHttpHeaders) =>
  Object.fromEntries(
    Object.entries(headers).flatMap(([name, value]) => {
      if (value === undefined || name === 'set-cookie') {
        return []
      }

      return [[name, Array.isArray(value) ? value.join(', ') : value]]
    })
  )

const splitRequestTarget = (target: string) => {
  if (!target.startsWith('/')) {
    throw requestDataInvalid(`Request target must be an absolute path: ${target}`)
  }

  const queryIndex = target.indexOf('?')
  if (queryIndex < 0) {
    return {path: target}
  }

  const queryString = target.slice(queryIndex + 1)
  return {
    path: target.slice(0, queryIndex),
    ...(queryString.length > 0 ? {queryString} : {})
  }
}

export const readClientCertificate = (socket: unknown): ClientCertificate | undefined => {
  if (!(socket instanceof TLSSocket)) {
    return undefined
  }

  // Node returns an empty object when the client presented no certificate.
  const peerCertificate = socket.getPeerCertificate()
  if (!Buffer.isBuffer(peerCertificate.raw)) {
    return undefined
  }

  return parseClientCertificate(peerCertificate.raw)
}

/**
 * Converts a Node request into a pipeline request. Unknown methods, malformed
 * targets and oversized bodies fail with `request-data-invalid`.
 */
export const toPipelineRequest = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}): Promise<PipelineRequest> => {
  const method = HttpMethodSchema.safeParse(request.method?.toUpperCase())
  if (!method.success) {
    throw requestDataInvalid(`Unsupported request method: ${request.method ?? '<none>'}`)
  }

  const target = splitRequestTarget(request.url ?? '/')
  const body = await readBodyBuffer({request, maxBodyBytes})
  const clientCertificate = readClientCertificate(request.socket)

  return createRequest({
    method: method.data,
    ...target,
    headers: flattenHeaders(request.headers),
    ...(body.length > 0 ? {body} : {}),
    ...(clientCertificate ? {clientCertificate} : {})
  })
}

const toBodyBuffer = (body: PipelineResponse['body']) => {
  if (body === undefined) {
    return Buffer.alloc(0)
  }

  return typeof body === 'string' ? Buffer.from(body, 'utf8') : body
}

/** Writes a pipeline response. A declined request becomes a plain 404. */
export const writeResponse = ({
  response,
  pipelineResponse,
  correlationId
}: {
  response: Pick<ServerResponse, 'writeHead' | 'end'>
  pipelineResponse: PipelineResponse | null
  correlationId?: string
}) => {
  const resolved = pipelineResponse ?? plainResponse(404, 'Not Found')
  const body = toBodyBuffer(resolved.body)
  const headers: OutgoingHttpHeaders = {
    ...resolved.headers,
    'content-length': String(body.length),
    ...(correlationId ? {'x-correlation-id': correlationId} : {})
  }

  response.writeHead(resolved.status, headers)
  response.end(body)

  return resolved.status
}
