import {ResponseEncodingSchema, type ResponseEncoding} from './contracts';
import type {PipelineResponse} from './types';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

const toText = (body: unknown) => (typeof body === 'string' ? body : String(body));

export const jsonResponse = (status: number, body: unknown): PipelineResponse => ({
  status,
  headers: {'content-type': JSON_CONTENT_TYPE},
  body: JSON.stringify(body)
});

export const plainResponse = (status: number, body: unknown): PipelineResponse => ({
  status,
  headers: {'content-type': TEXT_CONTENT_TYPE},
  body: toText(body)
});

export const buildResponse = ({
  status,
  body,
  encoding
}: {
  status: number;
  body: unknown;
  encoding: ResponseEncoding;
}): PipelineResponse => {
  switch (ResponseEncodingSchema.parse(encoding)) {
    case 'structured':
      return jsonResponse(status, body);
    case 'plain':
      return plainResponse(status, body);
  }
};
