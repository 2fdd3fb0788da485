/**
 * Reasons a signal can be rejected by the codec.
 */
export type SignalCodecErrorCode =
  | "EMPTY_INPUT"
  | "TOO_LARGE"
  | "TOO_SHORT"
  | "INVALID_ALPHABET"
  | "CORRUPT_PAYLOAD"
  | "OVERSIZED_PAYLOAD"
  | "NON_PRINTABLE";

/**
 * Error thrown when a descriptor cannot be encoded or a token cannot be decoded.
 */
export class SignalCodecError extends Error {
  readonly code: SignalCodecErrorCode;

  constructor(code: SignalCodecErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SignalCodecError";
    this.code = code;
  }
}
