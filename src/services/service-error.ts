export type ServiceErrorKind =
  | "not_found"
  | "unauthorized"
  | "forbidden"
  | "invalid_input"
  | "conflict"
  | "store_unavailable"
  | "publish_failed"
  | "internal";

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  not_found: 404,
  unauthorized: 401,
  forbidden: 403,
  invalid_input: 400,
  conflict: 409,
  store_unavailable: 503,
  publish_failed: 502,
  internal: 500
};

export class ServiceError extends Error {
  readonly statusCode: number;

  constructor(
    public readonly kind: ServiceErrorKind,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ServiceError";
    this.statusCode = STATUS_BY_KIND[kind];
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export function storeUnavailable(operation: string, cause: unknown): ServiceError {
  return new ServiceError(
    "store_unavailable",
    "store_unavailable",
    `Backing store failed during ${operation}.`,
    null,
    { cause }
  );
}
