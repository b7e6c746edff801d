import type {ForwarderErrorCode} from '@relay-pipeline/forwarder';
import type {z} from 'zod';

export const domainDataErrorKinds = [
  'request-data-invalid',
  'user-data-invalid',
  'service-status-version-not-found'
] as const;

export type DomainDataErrorKind = (typeof domainDataErrorKinds)[number];

/** A failure tagged with a closed `kind`. Details are merged into the error envelope. */
export class ServiceError<TKind extends string = string> extends Error {
  public readonly kind: TKind;
  public readonly details: Readonly<Record<string, unknown>>;

  public constructor({
    kind,
    message,
    details = {}
  }: {
    kind: TKind;
    message: string;
    details?: Record<string, unknown>;
  }) {
    super(message);
    this.name = 'ServiceError';
    this.kind = kind;
    this.details = details;
  }
}

export const requestDataInvalid = (message: string, details?: Record<string, unknown>) =>
  new ServiceError({kind: 'request-data-invalid', message, details});

export const userDataInvalid = (message: string, details?: Record<string, unknown>) =>
  new ServiceError({kind: 'user-data-invalid', message, details});

export const serviceStatusVersionNotFound = (message: string, details?: Record<string, unknown>) =>
  new ServiceError({kind: 'service-status-version-not-found', message, details});

const domainDataErrorKindSet: ReadonlySet<string> = new Set(domainDataErrorKinds);

export const isDomainDataError = (value: unknown): value is ServiceError<DomainDataErrorKind> =>
  value instanceof ServiceError && domainDataErrorKindSet.has(value.kind);

/** A failure carrying a message plus an arbitrary data record. */
export class StructuredError extends Error {
  public readonly data: Readonly<Record<string, unknown>>;

  public constructor({message, data = {}}: {message: string; data?: Record<string, unknown>}) {
    super(message);
    this.name = 'StructuredError';
    this.data = data;
  }
}

export const SCHEMA_MISMATCH_SIGNATURE = /does not match schema/u;

export const isSchemaMismatchError = (value: unknown): value is StructuredError =>
  value instanceof StructuredError && SCHEMA_MISMATCH_SIGNATURE.test(value.message);

export const assertMatchesSchema = <TSchema extends z.ZodTypeAny>({
  schema,
  value
}: {
  schema: TSchema;
  value: unknown;
}): z.output<TSchema> => {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
  throw new StructuredError({
    message: `Value does not match schema: ${issues.join('; ')}`,
    data: {type: 'schema-validation-error', value, error: issues}
  });
};

export class ProxyTransportError extends Error {
  public readonly code: ForwarderErrorCode;
  public readonly target: string;

  public constructor({code, target, message}: {code: ForwarderErrorCode; target: string; message: string}) {
    super(`Proxy request to ${target} failed: ${message}`);
    this.name = 'ProxyTransportError';
    this.code = code;
    this.target = target;
  }
}
