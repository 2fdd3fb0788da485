/**
 * @peerchat/signaling
 *
 * Codec for exchanging WebRTC session descriptors by hand. A descriptor is
 * compressed and base64url-encoded into a token the users copy between
 * each other; the receiving side decodes it back to the exact same text.
 *
 * @example
 * ```typescript
 * import { decodeSignal, encodeSignal } from "@peerchat/signaling";
 *
 * const token = encodeSignal(JSON.stringify({ type: "offer", sdp }));
 * // ...user pastes token on the other machine...
 * const text = decodeSignal(token.trim());
 * ```
 *
 * @packageDocumentation
 */

export {
  COMPRESSION_RATIO_ESTIMATE,
  decodeSignal,
  encodeSignal,
  estimateEncodedSize,
  MAX_SIGNAL_SIZE,
  MIN_TOKEN_LENGTH,
} from "./codec.js";
export { SignalCodecError, type SignalCodecErrorCode } from "./errors.js";
