/**
 * Chat session types
 */

import type { ChatMessage } from "@peerchat/protocol";
import type { Logger, TransportPeer, WebRtcPeerOptions } from "@peerchat/transport-webrtc";

/**
 * Lifecycle of a session.
 *
 * ```
 * idle ──createRoom──▶ offer-created ──acceptAnswer──▶ answer-accepted ─┐
 *   └───joinRoom────▶ answer-created ──────────────────────────────────┤
 *                                                                       ▼
 *                     disconnected ◀──transport down── connected ◀─transport up
 * any ──disconnect──▶ closed
 * ```
 */
export type SessionState =
  | "idle"
  | "offer-created"
  | "answer-created"
  | "answer-accepted"
  | "connected"
  | "disconnected"
  | "closed";

export type MessageHandler = (message: ChatMessage) => void;
export type ConnectedHandler = () => void;
export type DisconnectedHandler = () => void;
export type ErrorHandler = (error: Error) => void;

/**
 * Options for {@link ChatSession}.
 */
export interface ChatSessionOptions {
  /** Transport to use (default: a new WebRtcPeer) */
  peer?: TransportPeer;
  /** Builds the transport when `peer` is not given */
  createPeer?: () => TransportPeer;
  /** Options for the default WebRtcPeer; ignored when `peer` or `createPeer` is given */
  webrtc?: WebRtcPeerOptions;
  /** Delay before announcing ourselves on a fresh connection, ms (default: 100) */
  joinAnnounceDelay?: number;
  /** Delay before the disconnected callback after `disconnect()`, ms (default: 100) */
  disconnectNotifyDelay?: number;
  /** Upper bound for candidate gathering in createRoom/joinRoom, ms */
  gatheringTimeout?: number;
  logger?: Logger;
}
