import {z} from 'zod';

const HTTP_TOKEN_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;

export const HeaderSchema = z
  .object({
    name: z.string().min(1),
    value: z.string()
  })
  .strict();

export const HeaderListSchema = z.array(HeaderSchema);

export const ForwarderOptionsSchema = z
  .object({
    total_timeout_ms: z.number().int().min(100).max(120_000).default(15_000),
    follow_redirects: z.boolean().default(false),
    max_response_bytes: z
      .number()
      .int()
      .min(1)
      .max(100 * 1024 * 1024)
      .default(10 * 1024 * 1024),
    headers: z.record(z.string().min(1), z.string()).default({})
  })
  .strict();

export const RelayRequestInputSchema = z
  .object({
    method: z.string().regex(HTTP_TOKEN_REGEX),
    url: z.string().min(1),
    headers: HeaderListSchema,
    body: z.instanceof(Buffer).optional(),
    options: ForwarderOptionsSchema.default({})
  })
  .strict();

export type Header = z.infer<typeof HeaderSchema>;
export type HeaderList = z.infer<typeof HeaderListSchema>;
export type ForwarderOptions = z.infer<typeof ForwarderOptionsSchema>;
export type ForwarderOptionsInput = z.input<typeof ForwarderOptionsSchema>;
export type RelayRequestInput = z.input<typeof RelayRequestInputSchema>;

export type RelayedResponse = {
  status: number;
  headers: Record<string, string | string[]>;
  body: Buffer;
};

export const DEFAULT_FORWARDER_OPTIONS = ForwarderOptionsSchema.parse({});

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;
