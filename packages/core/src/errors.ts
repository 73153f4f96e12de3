export type DigestErrorKind =
  | "config_read"
  | "config_parse"
  | "credential"
  | "transport"
  | "response_shape"
  | "project_resolution"
  | "cache_io";

export interface DigestErrorOptions {
  cause?: unknown;
  status?: number;
}

export class DigestError extends Error {
  readonly kind: DigestErrorKind;
  readonly status: number | undefined;

  constructor(kind: DigestErrorKind, message: string, options: DigestErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DigestError";
    this.kind = kind;
    this.status = options.status;
  }
}

export function isDigestError(error: unknown, kind?: DigestErrorKind): error is DigestError {
  if (!(error instanceof DigestError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
