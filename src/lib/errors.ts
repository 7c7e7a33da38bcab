export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type FetchErrorKind =
  | "timeout"
  | "network"
  | "render_not_ready"
  | "http_status";

/**
 * The page could not be fetched or rendered. Retryable unless the site
 * answered with a status that will not change on retry (404, 410, other 4xx).
 */
export class FetchError extends PipelineError {
  readonly kind: FetchErrorKind;
  readonly status: number | null;
  readonly retryable: boolean;
  readonly url: string;

  constructor(
    url: string,
    kind: FetchErrorKind,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    const status = options.status ?? null;
    super(
      status !== null
        ? `HTTP ${status} for ${url}`
        : `${kind.replace(/_/g, " ")} for ${url}`
    );
    this.url = url;
    this.kind = kind;
    this.status = status;
    this.retryable = options.retryable ?? isRetryableStatus(status);
    if (options.cause !== undefined) this.cause = options.cause;
  }

  /** Reason label used in crawl reports. */
  get reason(): string {
    return this.status !== null ? `http_${this.status}` : this.kind;
  }
}

export function isRetryableStatus(status: number | null): boolean {
  if (status === null) return true;
  return status === 429 || status >= 500;
}

export type ExtractionReason =
  | "empty_page"
  | "missing_required_selector"
  | "malformed_price";

/** The page loaded but could not be turned into a record. Terminal per listing. */
export class ExtractionError extends PipelineError {
  readonly reason: ExtractionReason;
  readonly url: string;

  constructor(url: string, reason: ExtractionReason) {
    super(`Extraction failed for ${url}: ${reason}`);
    this.url = url;
    this.reason = reason;
  }
}

export class ValidationError extends PipelineError {
  readonly listingId: string;
  readonly field: string;
  readonly reason: string;

  constructor(listingId: string, field: string, reason: string) {
    super(`Listing ${listingId}: ${field} ${reason}`);
    this.listingId = listingId;
    this.field = field;
    this.reason = reason;
  }
}

export class SchemaViolation extends PipelineError {
  readonly listingId: string;
  readonly column: string;

  constructor(listingId: string, column: string) {
    super(`Listing ${listingId}: column ${column} violates the feature schema`);
    this.listingId = listingId;
    this.column = column;
  }
}

/** The data source could not be reached for the whole run. */
export class SourceUnreachableError extends PipelineError {}

/** A snapshot table holds a row that does not match its schema. */
export class SnapshotError extends PipelineError {}
