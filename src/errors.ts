export type StatusSource = "github-actions" | "appveyor";

const SOURCE_LABELS: Record<StatusSource, string> = {
  "github-actions": "GitHub workflow conclusion",
  appveyor: "AppVeyor status",
};

export class UnrecognizedStatusError extends Error {
  readonly source: StatusSource;
  readonly status: string | null;

  constructor(source: StatusSource, status: string | null) {
    super(`Unknown ${SOURCE_LABELS[source]}: ${JSON.stringify(status)}`);
    this.name = "UnrecognizedStatusError";
    this.source = source;
    this.status = status;
  }
}

/** An upstream source broke an invariant the report depends on. */
export class ContractViolationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ContractViolationError";
  }
}

export class TransportError extends Error {
  readonly operation: string;

  constructor(operation: string, options?: ErrorOptions) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Request failed while trying to ${operation}${detail}`, options);
    this.name = "TransportError";
    this.operation = operation;
  }
}
