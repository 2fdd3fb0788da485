/**
 * Chat wire protocol.
 *
 * Each chat event travels as one JSON object on a single line:
 *
 * ```
 * {"type":"chat","from":"alice","text":"hi","timestamp":1700000000000}\n
 * ```
 *
 * The JSON keys (`type`, `from`, `text`, `timestamp`) are shared with every
 * other client of the protocol and never change; they map onto the
 * `kind`, `sender` and `body` fields of {@link ChatMessage}.
 *
 * The data channel already preserves message boundaries, so the newline is
 * only a record terminator that keeps the stream splittable.
 *
 * Local construction is trusted; every inbound record is validated.
 */

import { MessageFormatError } from "./errors.js";

/** Recognized message kinds */
export const MESSAGE_KINDS = ["chat", "join", "leave"] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

/** Longest accepted body, in characters (code points) */
export const MAX_BODY_LENGTH = 1000;

/** Record terminator */
export const RECORD_SEPARATOR = "\n";

/**
 * A single chat event.
 */
export interface ChatMessage {
  readonly kind: MessageKind;
  /** Display name of the author */
  readonly sender: string;
  /** Text, empty for join/leave announcements */
  readonly body: string;
  /** Milliseconds since the Unix epoch */
  readonly timestamp: number;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Build a message stamped with the current time.
 */
export function createMessage(
  kind: MessageKind,
  sender: string,
  body: string,
  now: () => number = Date.now,
): ChatMessage {
  return Object.freeze({ kind, sender, body, timestamp: now() });
}

/**
 * Render a message as one newline-terminated record.
 */
export function serializeMessage(message: ChatMessage): Uint8Array {
  return encoder.encode(formatMessage(message) + RECORD_SEPARATOR);
}

/**
 * Parse and validate one inbound record.
 *
 * @throws MessageFormatError describing the first problem found
 */
export function deserializeMessage(data: Uint8Array | string): ChatMessage {
  let text = typeof data === "string" ? data : decoder.decode(data);
  if (text.endsWith(RECORD_SEPARATOR)) {
    text = text.slice(0, -RECORD_SEPARATOR.length);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MessageFormatError("MALFORMED_PAYLOAD", "Invalid JSON format", { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new MessageFormatError("MALFORMED_PAYLOAD", "Message must be a JSON object");
  }

  const timestamp = readNumber(parsed, "timestamp");
  if (!Number.isInteger(timestamp)) {
    throw new MessageFormatError("MALFORMED_PAYLOAD", "Field 'timestamp' must be an integer");
  }

  return Object.freeze(
    checkFields({
      kind: readString(parsed, "type"),
      sender: readString(parsed, "from"),
      body: readString(parsed, "text"),
      timestamp,
    }),
  );
}

/**
 * Validate a message against the wire constraints.
 *
 * @throws MessageFormatError
 */
export function validateMessage(message: ChatMessage): void {
  checkFields(message);
}

/**
 * Whether a message satisfies the wire constraints.
 */
export function isValidMessage(message: ChatMessage): boolean {
  try {
    checkFields(message);
    return true;
  } catch {
    return false;
  }
}

/**
 * The record for a message without its terminator, for logs and debugging.
 */
export function formatMessage(message: ChatMessage): string {
  return JSON.stringify({
    type: message.kind,
    from: message.sender,
    text: message.body,
    timestamp: message.timestamp,
  });
}

export function isMessageKind(value: string): value is MessageKind {
  return MESSAGE_KINDS.some((kind) => kind === value);
}

interface WireFields {
  kind: string;
  sender: string;
  body: string;
  timestamp: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Absent and null fields read as the zero value
function readString(record: Record<string, unknown>, name: string): string {
  const value = record[name];
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") {
    throw new MessageFormatError("MALFORMED_PAYLOAD", `Field '${name}' must be a string`);
  }
  return value;
}

function readNumber(record: Record<string, unknown>, name: string): number {
  const value = record[name];
  if (value === undefined || value === null) return 0;
  if (typeof value !== "number") {
    throw new MessageFormatError("MALFORMED_PAYLOAD", `Field '${name}' must be a number`);
  }
  return value;
}

function checkFields({ kind, sender, body, timestamp }: WireFields): ChatMessage {
  if (kind === "") {
    throw new MessageFormatError("MISSING_KIND", "Message kind is required");
  }
  if (sender === "") {
    throw new MessageFormatError("MISSING_SENDER", "Message sender is required");
  }
  if (!isMessageKind(kind)) {
    throw new MessageFormatError("UNKNOWN_KIND", `Unknown message kind: ${kind}`);
  }
  if ([...body].length > MAX_BODY_LENGTH) {
    throw new MessageFormatError("BODY_TOO_LONG", `Message body exceeds ${MAX_BODY_LENGTH} characters`);
  }
  if (timestamp < 0) {
    throw new MessageFormatError("NEGATIVE_TIMESTAMP", "Message timestamp cannot be negative");
  }
  return { kind, sender, body, timestamp };
}
