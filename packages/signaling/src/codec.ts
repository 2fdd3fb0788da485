/**
 * Copy/paste signaling codec.
 *
 * Turns a session descriptor (several kilobytes of SDP wrapped in JSON) into
 * a short token that can be pasted into a chat window or an e-mail, and back.
 *
 * The encoding pipeline:
 * 1. UTF-8 encode the text
 * 2. gzip it at the highest compression level
 * 3. URL-safe base64 without padding
 *
 * Decoding reverses the steps and refuses anything that does not come back as
 * printable text, so a mangled paste fails loudly instead of producing bytes.
 */

import { gzip, Inflate } from "pako";
import { SignalCodecError } from "./errors.js";

/** Largest descriptor accepted in either direction (4 MiB of UTF-8) */
export const MAX_SIGNAL_SIZE = 4 * 1024 * 1024;

/** Shortest token worth attempting to decode */
export const MIN_TOKEN_LENGTH = 10;

/** Typical encoded/original length ratio for descriptors */
export const COMPRESSION_RATIO_ESTIMATE = 0.75;

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

// C0 controls except TAB, LF and CR, plus DEL
const CONTROL_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

// String.fromCharCode argument limit stays well below engine stack limits
const BINARY_CHUNK_SIZE = 0x8000;

// Inflate output granularity; a bomb is cut off at most this far past the limit
const INFLATE_CHUNK_SIZE = 64 * 1024;

const encoder = new TextEncoder();

/**
 * Encode descriptor text into a compact URL-safe token.
 *
 * @throws SignalCodecError `EMPTY_INPUT` or `TOO_LARGE`
 */
export function encodeSignal(text: string): string {
  if (text.length === 0) {
    throw new SignalCodecError("EMPTY_INPUT", "Signal text cannot be empty");
  }

  const bytes = encoder.encode(text);
  if (bytes.length > MAX_SIGNAL_SIZE) {
    throw new SignalCodecError(
      "TOO_LARGE",
      `Signal text too large: ${bytes.length} bytes (max ${MAX_SIGNAL_SIZE})`,
    );
  }

  return toBase64Url(gzip(bytes, { level: 9 }));
}

/**
 * Decode a token produced by {@link encodeSignal} back into the original text.
 *
 * The token must not contain surrounding whitespace; callers trim user input.
 *
 * @throws SignalCodecError for empty, short, foreign-alphabet, corrupt,
 * oversized or non-text tokens
 */
export function decodeSignal(token: string): string {
  if (token.length === 0) {
    throw new SignalCodecError("EMPTY_INPUT", "Signal token cannot be empty");
  }
  if (token.length < MIN_TOKEN_LENGTH) {
    throw new SignalCodecError(
      "TOO_SHORT",
      `Signal token too short: ${token.length} characters (min ${MIN_TOKEN_LENGTH})`,
    );
  }
  if (!BASE64URL_PATTERN.test(token)) {
    throw new SignalCodecError("INVALID_ALPHABET", "Signal token contains invalid characters");
  }

  const inflated = inflateBounded(fromBase64Url(token));

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(inflated);
  } catch (error) {
    throw new SignalCodecError("NON_PRINTABLE", "Decoded signal is not valid UTF-8 text", {
      cause: error,
    });
  }
  if (CONTROL_PATTERN.test(text)) {
    throw new SignalCodecError("NON_PRINTABLE", "Decoded signal contains non-printable characters");
  }

  return text;
}

/**
 * Estimate the token length for a descriptor of the given length.
 *
 * Small descriptors barely compress; large ones usually land well below
 * this figure. Meant for UI hints only.
 */
export function estimateEncodedSize(length: number): number {
  return Math.floor(length * COMPRESSION_RATIO_ESTIMATE);
}

/**
 * gunzip, giving up as soon as the output passes {@link MAX_SIGNAL_SIZE}.
 */
function inflateBounded(compressed: Uint8Array): Uint8Array {
  const inflator = new Inflate({ chunkSize: INFLATE_CHUNK_SIZE });
  const chunks: Uint8Array[] = [];
  let size = 0;
  let status: number | undefined;

  inflator.onData = (chunk) => {
    const bytes = typeof chunk === "string" ? encoder.encode(chunk) : new Uint8Array(chunk);
    size += bytes.length;
    if (size > MAX_SIGNAL_SIZE) {
      throw new SignalCodecError(
        "OVERSIZED_PAYLOAD",
        `Decoded signal exceeds ${MAX_SIGNAL_SIZE} bytes`,
      );
    }
    chunks.push(bytes);
  };
  inflator.onEnd = (code) => {
    status = code;
  };

  try {
    inflator.push(compressed, true);
  } catch (error) {
    if (error instanceof SignalCodecError) throw error;
    const err = error instanceof Error ? error : new Error(String(error));
    throw new SignalCodecError("CORRUPT_PAYLOAD", `Failed to decompress signal: ${err.message}`, {
      cause: err,
    });
  }

  // pako reports nothing for a truncated stream: the end is simply never reached
  if (status === undefined) {
    throw new SignalCodecError("CORRUPT_PAYLOAD", "Failed to decompress signal: truncated data");
  }
  if (status !== 0) {
    throw new SignalCodecError(
      "CORRUPT_PAYLOAD",
      `Failed to decompress signal: ${inflator.msg || `error code ${status}`}`,
    );
  }

  const result = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

function toBase64Url(bytes: Uint8Array): string {
  let binary = "";
  for (let offset = 0; offset < bytes.length; offset += BINARY_CHUNK_SIZE) {
    binary += String.fromCharCode(...bytes.subarray(offset, offset + BINARY_CHUNK_SIZE));
  }
  return btoa(binary).replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

function fromBase64Url(token: string): Uint8Array {
  // A single trailing sextet cannot carry a whole byte
  if (token.length % 4 === 1) {
    throw new SignalCodecError("CORRUPT_PAYLOAD", "Signal token has an impossible length");
  }

  let base64 = token.replace(/-/g, "+").replace(/_/g, "/");
  while (base64.length % 4) {
    base64 += "=";
  }

  let binary: string;
  try {
    binary = atob(base64);
  } catch (error) {
    throw new SignalCodecError("CORRUPT_PAYLOAD", "Signal token is not valid base64", {
      cause: error,
    });
  }

  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}
