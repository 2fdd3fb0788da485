/**
 * Text form of session descriptors.
 *
 * Descriptors travel as `{"type":"offer","sdp":"v=0\r\n..."}`, the shape of
 * a browser RTCSessionDescriptionInit, so tokens produced here can be pasted
 * into any peer that speaks the same JSON.
 */

import { DescriptorParseError } from "./errors.js";
import type { DescriptorKind, SessionDescriptor } from "./types.js";

export function serializeDescriptor(descriptor: SessionDescriptor): string {
  return JSON.stringify({ type: descriptor.kind, sdp: descriptor.body });
}

/**
 * Parse descriptor text, optionally requiring a specific kind.
 *
 * @throws DescriptorParseError
 */
export function parseDescriptor(text: string, expected?: DescriptorKind): SessionDescriptor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DescriptorParseError("Session description is not valid JSON", { cause: error });
  }

  if (typeof parsed !== "object" || parsed === null || !("type" in parsed) || !("sdp" in parsed)) {
    throw new DescriptorParseError("Session description must have 'type' and 'sdp' fields");
  }

  const { type, sdp } = parsed;
  if (type !== "offer" && type !== "answer") {
    throw new DescriptorParseError(`Unsupported session description type: ${String(type)}`);
  }
  if (typeof sdp !== "string" || sdp.length === 0) {
    throw new DescriptorParseError("Session description 'sdp' must be a non-empty string");
  }
  if (expected && type !== expected) {
    throw new DescriptorParseError(`Expected an ${expected} but received an ${type}`);
  }

  return { kind: type, body: sdp };
}
