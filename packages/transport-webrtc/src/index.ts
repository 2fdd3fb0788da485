/**
 * @peerchat/transport-webrtc
 *
 * Transport layer for serverless two-party chat.
 *
 * This package defines the {@link TransportPeer} contract the chat session
 * talks to, and a WebRTC implementation of it running on werift, so the
 * session never touches engine types directly.
 *
 * Features:
 * - One ordered data channel per peer
 * - Non-trickle signaling: descriptors are final when returned
 * - Gathering wait bounded by a timeout and an AbortSignal
 * - Engine states classified into up/down/ignore
 *
 * @example Manual signaling between two processes:
 * ```typescript
 * import { serializeDescriptor, WebRtcPeer } from "@peerchat/transport-webrtc";
 *
 * // Offering side
 * const host = new WebRtcPeer();
 * const offer = serializeDescriptor(await host.createOffer());
 *
 * // Answering side, after receiving `offer`
 * const guest = new WebRtcPeer();
 * const answer = serializeDescriptor(await guest.createAnswer(offer));
 *
 * // Offering side, after receiving `answer`
 * await host.setRemoteAnswer(answer);
 * ```
 *
 * @packageDocumentation
 */

export { parseDescriptor, serializeDescriptor } from "./descriptor.js";
export {
  ChannelNotOpenError,
  DescriptorParseError,
  GatheringAbortedError,
  GatheringTimeoutError,
  PeerClosedError,
  TransportError,
} from "./errors.js";
export { classifyTransportState, type LinkStatus } from "./link-status.js";
export * from "./types.js";
export { WebRtcPeer } from "./webrtc-peer.js";
