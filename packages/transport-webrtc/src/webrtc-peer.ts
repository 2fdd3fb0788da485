/**
 * WebRTC transport peer.
 *
 * Wraps a werift RTCPeerConnection with one ordered data channel. Signaling
 * is manual (copy/paste), so there is no trickle ICE: every descriptor is
 * returned only after candidate gathering has finished and therefore already
 * carries all candidates.
 *
 * The offering side creates the channel; the answering side receives it
 * through the `datachannel` event armed in {@link WebRtcPeer.setRemoteOffer}.
 */

import { RTCPeerConnection, RTCSessionDescription } from "werift";
import { parseDescriptor } from "./descriptor.js";
import {
  ChannelNotOpenError,
  GatheringAbortedError,
  GatheringTimeoutError,
  PeerClosedError,
  TransportError,
} from "./errors.js";
import type {
  DescriptorKind,
  GatherOptions,
  MessageCallback,
  SessionDescriptor,
  StateChangeCallback,
  TransportPeer,
  WebRtcPeerOptions,
} from "./types.js";
import { DEFAULT_ICE_SERVERS } from "./types.js";

const DEFAULT_ICE_GATHERING_TIMEOUT = 10000; // 10 seconds
const DEFAULT_CHANNEL_LABEL = "chat";

type DataChannel = ReturnType<RTCPeerConnection["createDataChannel"]>;
type Subscription = { unSubscribe: () => void };

const encoder = new TextEncoder();

/**
 * Production {@link TransportPeer} backed by werift.
 *
 * @example Offering side:
 * ```typescript
 * const peer = new WebRtcPeer();
 * peer.onStateChange((state) => console.log(state));
 * const offer = await peer.createOffer({ timeout: 15000 });
 * // ...deliver serializeDescriptor(offer), receive the answer text...
 * await peer.setRemoteAnswer(answerText);
 * ```
 */
export class WebRtcPeer implements TransportPeer {
  private readonly options: WebRtcPeerOptions;
  private readonly pc: RTCPeerConnection;
  private dataChannel: DataChannel | null = null;
  private channelSubscriptions: Subscription[] = [];
  private localOfferReady = false;
  private remoteOffer: string | null = null;
  private answeredOffer: string | null = null;
  private messageCallback: MessageCallback | null = null;
  private stateCallback: StateChangeCallback | null = null;
  private closed = false;

  constructor(options: WebRtcPeerOptions = {}) {
    this.options = options;
    this.pc = new RTCPeerConnection({
      iceServers: options.iceServers ?? DEFAULT_ICE_SERVERS,
    });

    this.pc.connectionStateChange.subscribe((state) => {
      this.options.logger?.debug?.(`Connection state changed: ${state}`);
      this.stateCallback?.(state);
    });

    this.pc.iceConnectionStateChange.subscribe((state) => {
      this.options.logger?.debug?.(`ICE connection state changed: ${state}`);
    });

    // Only the answering side sees this: the offering side owns the channel
    this.pc.onDataChannel.subscribe((channel) => {
      this.options.logger?.debug?.("Data channel received");
      this.attachDataChannel(channel);
    });
  }

  async createOffer(options?: GatherOptions): Promise<SessionDescriptor> {
    this.ensureOpen();

    // A retry after a failed gathering wait resumes the offer already in place
    if (!this.localOfferReady) {
      if (!this.dataChannel) {
        const label = this.options.channelLabel ?? DEFAULT_CHANNEL_LABEL;
        this.attachDataChannel(
          this.pc.createDataChannel(label, { ordered: this.options.ordered ?? true }),
        );
      }
      const offer = await this.pc.createOffer();
      await this.pc.setLocalDescription(offer);
      this.localOfferReady = true;
    }
    await this.waitForIceGathering(options);

    return this.localDescriptor("offer");
  }

  async createAnswer(remoteOffer: string, options?: GatherOptions): Promise<SessionDescriptor> {
    await this.setRemoteOffer(remoteOffer);

    // A retry for the same offer resumes the answer already in place
    const { body } = parseDescriptor(remoteOffer, "offer");
    if (this.answeredOffer !== body) {
      const answer = await this.pc.createAnswer();
      await this.pc.setLocalDescription(answer);
      this.answeredOffer = body;
    }
    await this.waitForIceGathering(options);

    return this.localDescriptor("answer");
  }

  async setRemoteAnswer(remoteAnswer: string): Promise<void> {
    this.ensureOpen();
    const { body } = parseDescriptor(remoteAnswer, "answer");
    await this.pc.setRemoteDescription(new RTCSessionDescription(body, "answer"));
  }

  async setRemoteOffer(remoteOffer: string): Promise<void> {
    this.ensureOpen();
    const { body } = parseDescriptor(remoteOffer, "offer");
    if (this.remoteOffer === body) {
      return;
    }
    await this.pc.setRemoteDescription(new RTCSessionDescription(body, "offer"));
    this.remoteOffer = body;
  }

  send(data: Uint8Array): void {
    const channel = this.dataChannel;
    if (!channel || channel.readyState !== "open") {
      throw new ChannelNotOpenError();
    }
    channel.send(Buffer.from(data));
  }

  onMessage(callback: MessageCallback | null): void {
    this.messageCallback = callback;
  }

  onStateChange(callback: StateChangeCallback | null): void {
    this.stateCallback = callback;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.releaseChannelSubscriptions();
    if (this.dataChannel) {
      try {
        this.dataChannel.close();
      } catch (error) {
        this.options.logger?.error?.("Error closing data channel:", error);
      }
      this.dataChannel = null;
    }

    await this.pc.close();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new PeerClosedError();
    }
  }

  private attachDataChannel(channel: DataChannel): void {
    if (this.dataChannel === channel) {
      return;
    }
    this.releaseChannelSubscriptions();
    this.dataChannel = channel;

    this.channelSubscriptions.push(
      channel.stateChanged.subscribe((state) => {
        this.options.logger?.debug?.(`Data channel ${state}`);
      }),
      channel.onMessage.subscribe((data) => {
        const bytes = typeof data === "string" ? encoder.encode(data) : new Uint8Array(data);
        this.options.logger?.debug?.(`Received ${bytes.length} bytes`);
        this.messageCallback?.(bytes);
      }),
    );
  }

  private releaseChannelSubscriptions(): void {
    for (const subscription of this.channelSubscriptions) {
      subscription.unSubscribe();
    }
    this.channelSubscriptions = [];
  }

  /**
   * Wait until the engine reports that candidate gathering is complete.
   */
  private waitForIceGathering(options: GatherOptions = {}): Promise<void> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new GatheringAbortedError({ cause: signal.reason }));
    }
    if (this.pc.iceGatheringState === "complete") {
      return Promise.resolve();
    }

    const timeout =
      options.timeout ?? this.options.iceGatheringTimeout ?? DEFAULT_ICE_GATHERING_TIMEOUT;

    return new Promise((resolve, reject) => {
      let settled = false;
      let gathering: Subscription | undefined;

      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        gathering?.unSubscribe();
        signal?.removeEventListener("abort", onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = () => finish(new GatheringAbortedError({ cause: signal?.reason }));

      const timer = setTimeout(() => finish(new GatheringTimeoutError(timeout)), timeout);
      signal?.addEventListener("abort", onAbort, { once: true });

      gathering = this.pc.iceGatheringStateChange.subscribe((state) => {
        this.options.logger?.debug?.(`ICE gathering state changed: ${state}`);
        if (state === "complete") {
          finish();
        }
      });
    });
  }

  private localDescriptor(kind: DescriptorKind): SessionDescriptor {
    const description = this.pc.localDescription;
    if (!description) {
      throw new TransportError(`No local ${kind} after ICE gathering`);
    }
    return { kind, body: description.sdp };
  }
}
