export interface DecodeErrorDetails {
  expectedKind: string;
  actualKind?: string;
}

/**
 * Raised when a document cannot be materialized as the kind a transformer
 * expects. No partial result accompanies it.
 */
export class DecodeError extends Error implements DecodeErrorDetails {
  readonly expectedKind: string;

  readonly actualKind?: string;

  constructor(message: string, details: DecodeErrorDetails, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
    this.expectedKind = details.expectedKind;
    this.actualKind = details.actualKind;
  }
}

export function isDecodeError(value: unknown): value is DecodeError {
  return value instanceof DecodeError;
}
