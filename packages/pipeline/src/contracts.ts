import {z} from 'zod';

export const HttpMethodSchema = z.enum(['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS', 'TRACE', 'CONNECT']);

export const ResponseEncodingSchema = z.enum(['structured', 'plain']);

export const SameSiteSchema = z.enum(['Strict', 'Lax', 'None']);

export const ResponseCookieSchema = z
  .object({
    value: z.string(),
    path: z.string().min(1).optional(),
    domain: z.string().min(1).optional(),
    maxAge: z.number().int().optional(),
    expires: z.date().optional(),
    secure: z.boolean().optional(),
    httpOnly: z.boolean().optional(),
    sameSite: SameSiteSchema.optional()
  })
  .strict();

export const ErrorEnvelopeSchema = z
  .object({
    error: z
      .object({
        type: z.string().min(1),
        message: z.string()
      })
      .passthrough()
  })
  .strict();

export type HttpMethod = z.infer<typeof HttpMethodSchema>;
export type ResponseEncoding = z.infer<typeof ResponseEncodingSchema>;
export type SameSite = z.infer<typeof SameSiteSchema>;
export type ResponseCookie = z.infer<typeof ResponseCookieSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;
