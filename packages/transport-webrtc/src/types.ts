/**
 * Transport peer types
 *
 * The contract between the chat session and whatever moves its bytes.
 */

/**
 * Which side of the handshake a descriptor belongs to.
 */
export type DescriptorKind = "offer" | "answer";

/**
 * A complete local or remote session description, candidates included.
 */
export interface SessionDescriptor {
  readonly kind: DescriptorKind;
  /** Engine-specific description text (SDP for WebRTC) */
  readonly body: string;
}

/**
 * Connection state as reported by the engine.
 *
 * Kept as an open string: engines may report states this package does not
 * know about, and {@link classifyTransportState} ignores those.
 */
export type TransportState = string;

/**
 * Bounds for the candidate gathering wait.
 */
export interface GatherOptions {
  /** Aborts the wait; the handshake step rejects with GatheringAbortedError */
  signal?: AbortSignal;
  /** Milliseconds before the step rejects with GatheringTimeoutError */
  timeout?: number;
}

export type MessageCallback = (data: Uint8Array) => void;

export type StateChangeCallback = (state: TransportState) => void;

/**
 * The single seam between the chat layer and the real-time transport.
 *
 * Callback registration is single-slot: registering replaces the previous
 * callback, `null` clears it.
 */
export interface TransportPeer {
  /**
   * Open the local data channel and produce a final offer.
   * Resolves only after candidate gathering has completed.
   */
  createOffer(options?: GatherOptions): Promise<SessionDescriptor>;

  /**
   * Apply a remote offer (descriptor text) and produce a final answer.
   * Resolves only after candidate gathering has completed.
   */
  createAnswer(remoteOffer: string, options?: GatherOptions): Promise<SessionDescriptor>;

  /** Apply the answer received for a locally created offer. */
  setRemoteAnswer(remoteAnswer: string): Promise<void>;

  /**
   * Apply a remote offer and arm the inbound data channel handler.
   */
  setRemoteOffer(remoteOffer: string): Promise<void>;

  /**
   * Send one message over the data channel.
   *
   * @throws ChannelNotOpenError when there is no open channel yet
   */
  send(data: Uint8Array): void;

  onMessage(callback: MessageCallback | null): void;

  onStateChange(callback: StateChangeCallback | null): void;

  /** Release the channel and connection. Repeated calls are no-ops. */
  close(): Promise<void>;
}

/**
 * Optional logger for debugging.
 */
export interface Logger {
  debug?: (message: string, ...args: unknown[]) => void;
  info?: (message: string, ...args: unknown[]) => void;
  warn?: (message: string, ...args: unknown[]) => void;
  error?: (message: string, ...args: unknown[]) => void;
}

/**
 * ICE server entry.
 */
export interface IceServer {
  urls: string;
  username?: string;
  credential?: string;
}

/**
 * Options for the WebRTC-backed peer.
 */
export interface WebRtcPeerOptions {
  /** ICE servers (default: Google public STUN) */
  iceServers?: IceServer[];
  /** Data channel label (default: "chat") */
  channelLabel?: string;
  /** Ordered delivery (default: true) */
  ordered?: boolean;
  /** Candidate gathering timeout in ms when the caller passes none (default: 10000) */
  iceGatheringTimeout?: number;
  logger?: Logger;
}

/**
 * Default STUN servers.
 */
export const DEFAULT_ICE_SERVERS: IceServer[] = [{ urls: "stun:stun.l.google.com:19302" }];
