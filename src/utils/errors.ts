// Error taxonomy shared by services and route handlers.
// `kind` is the stable code reported at the HTTP boundary.

export type ErrorKind =
  | 'malformed_model_output'
  | 'payment_required'
  | 'upstream_failed'
  | 'unrecognized_provider_response'
  | 'no_narration'
  | 'configuration'
  | 'invalid_request';

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;

  constructor(kind: ErrorKind, status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.status = status;
  }
}

/** The segmentation completion could not be read as structured data. */
export class MalformedModelOutputError extends AppError {
  constructor(message: string) {
    super('malformed_model_output', 502, message);
  }
}

/** Image provider account cannot be billed further. Never retried. */
export class BillingCreditError extends AppError {
  constructor(message: string = 'Image provider credit is insufficient. Please top up.') {
    super('payment_required', 402, message);
  }
}

export class UpstreamProviderError extends AppError {
  readonly upstreamMessage: string;

  constructor(upstreamMessage: string, prefix: string = 'Upstream generation failed') {
    super('upstream_failed', 502, `${prefix}: ${upstreamMessage}`);
    this.upstreamMessage = upstreamMessage;
  }
}

export class UnrecognizedProviderResponseError extends AppError {
  readonly shape: string;

  constructor(shape: string) {
    super('unrecognized_provider_response', 502, `Unexpected provider output format: ${shape}`);
    this.shape = shape;
  }
}

export class NoNarrationProducedError extends AppError {
  constructor(message: string = 'No narration audio was produced for any scene') {
    super('no_narration', 502, message);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('configuration', 500, message);
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid_request', 400, `Invalid request: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Thrown by provider adapters when the provider answered and refused the
 * request (as opposed to a network or timeout failure).
 */
export class ProviderRejectionError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'ProviderRejectionError';
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const BILLING_PATTERNS = [
  /insufficient[\s_]credit/i,
  /status:?\s*402/i,
  /payment required/i,
  /insufficient[\s_]quota/i,
  /billing[\s_]hard[\s_]limit/i,
];

/** True for HTTP 402 or any of the known credit-exhaustion phrases. */
export function isBillingFailure(error: unknown): boolean {
  if (error instanceof BillingCreditError) return true;
  if (error instanceof ProviderRejectionError && error.statusCode === 402) return true;
  const message = errorMessage(error);
  return BILLING_PATTERNS.some((pattern) => pattern.test(message));
}
