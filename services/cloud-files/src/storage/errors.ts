import type { ProviderName } from "./types.js";

export type TransportErrorCode =
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "INVALID_REQUEST"
  | "PROVIDER_ERROR";

export class TransportError extends Error {
  readonly code: TransportErrorCode;
  readonly provider: ProviderName;
  readonly status?: number;
  readonly causeDetails?: unknown;

  constructor(params: {
    code: TransportErrorCode;
    provider: ProviderName;
    message: string;
    status?: number;
    causeDetails?: unknown;
  }) {
    super(params.message);
    this.name = "TransportError";
    this.code = params.code;
    this.provider = params.provider;
    this.status = params.status;
    this.causeDetails = params.causeDetails;
  }
}

function codeForStatus(status: number): TransportErrorCode {
  if (status === 401 || status === 403) return "UNAUTHORIZED";
  if (status === 404) return "NOT_FOUND";
  if (status === 429) return "RATE_LIMITED";
  if (status >= 400 && status < 500) return "INVALID_REQUEST";
  return "PROVIDER_ERROR";
}

const statusMessages: Record<TransportErrorCode, string> = {
  UNAUTHORIZED: "authorization failed",
  NOT_FOUND: "file not found",
  RATE_LIMITED: "rate limited",
  INVALID_REQUEST: "request rejected",
  PROVIDER_ERROR: "internal error"
};

export function mapHttpError(provider: ProviderName, status: number, details?: unknown): TransportError {
  const code = codeForStatus(status);
  return new TransportError({
    code,
    provider,
    status,
    message: `${provider} ${statusMessages[code]}`,
    causeDetails: details
  });
}

/** Wraps a thrown network exception (DNS, reset, abort) that never produced a response. */
export function networkError(provider: ProviderName, cause: unknown): TransportError {
  return new TransportError({
    code: "PROVIDER_ERROR",
    provider,
    message: `${provider} request failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    causeDetails: cause
  });
}

export type CloudFilesErrorKind =
  | "unknown"
  | "missingScopes"
  | "fetch"
  | "download"
  | "upload"
  | "authorize"
  | "signIn";

const messages: Record<CloudFilesErrorKind, string> = {
  unknown: "response did not contain the expected fields",
  missingScopes: "not signed in or required scopes not granted",
  fetch: "fetching file metadata failed",
  download: "downloading file failed",
  upload: "uploading file failed",
  authorize: "requesting scopes failed",
  signIn: "sign-in failed"
};

/**
 * The single failure type every manager operation resolves with.
 * `cause` keeps the transport or identity error that triggered it, when there is one.
 */
export class CloudFilesError extends Error {
  readonly kind: CloudFilesErrorKind;
  readonly provider: ProviderName;

  constructor(kind: CloudFilesErrorKind, provider: ProviderName, cause?: unknown) {
    super(`${provider}: ${messages[kind]}`, cause === undefined ? undefined : { cause });
    this.name = "CloudFilesError";
    this.kind = kind;
    this.provider = provider;
  }
}

export function isCloudFilesError(value: unknown): value is CloudFilesError {
  return value instanceof CloudFilesError;
}

export function needsReauthorization(error: CloudFilesError): boolean {
  return error.kind === "missingScopes" || error.kind === "authorize" || error.kind === "signIn";
}
