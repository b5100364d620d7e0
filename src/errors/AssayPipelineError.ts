export type AssayPipelineErrorCode =
  | 'MALFORMED_LOCATION'
  | 'BARCODE_CONVERSION_AMBIGUITY'
  | 'INVALID_TEMPLATE';

export class AssayPipelineError extends Error {
  readonly code: AssayPipelineErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: AssayPipelineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AssayPipelineError';
    this.code = code;
    this.details = details;
  }
}

export function isAssayPipelineError(err: unknown): err is AssayPipelineError {
  return err instanceof AssayPipelineError;
}
