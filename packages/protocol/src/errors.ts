/**
 * Reasons an inbound wire record is rejected.
 */
export type MessageFormatErrorCode =
  | "MALFORMED_PAYLOAD"
  | "MISSING_KIND"
  | "MISSING_SENDER"
  | "UNKNOWN_KIND"
  | "BODY_TOO_LONG"
  | "NEGATIVE_TIMESTAMP";

/**
 * Error thrown when a wire record cannot be parsed or fails validation.
 */
export class MessageFormatError extends Error {
  readonly code: MessageFormatErrorCode;

  constructor(code: MessageFormatErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MessageFormatError";
    this.code = code;
  }
}
