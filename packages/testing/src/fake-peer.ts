/**
 * Deterministic in-process transport peers.
 *
 * FakePeer implements the TransportPeer contract without any networking.
 * Descriptors are predictable (`fake-offer-1`, `fake-answer-2`, ...), every
 * call is recorded, failures can be scripted, and two fakes sharing a
 * FakeNetwork connect to each other when the offer/answer exchange between
 * them completes, delivering sent bytes to the other side in order.
 */

import {
  ChannelNotOpenError,
  classifyTransportState,
  type GatherOptions,
  GatheringAbortedError,
  GatheringTimeoutError,
  type MessageCallback,
  PeerClosedError,
  parseDescriptor,
  type SessionDescriptor,
  type StateChangeCallback,
  type TransportPeer,
  type TransportState,
} from "@peerchat/transport-webrtc";

export type FakePeerOperation =
  | "createOffer"
  | "createAnswer"
  | "setRemoteAnswer"
  | "setRemoteOffer"
  | "send"
  | "close";

export interface FakePeerOptions {
  /** Network to register descriptors on (default: a private one) */
  network?: FakeNetwork;
  /** Simulated candidate gathering time in ms (default: 0) */
  gatherDelay?: number;
}

/**
 * Links fakes by the descriptors they produce.
 */
export class FakeNetwork {
  private counter = 0;
  private readonly peers = new Map<string, FakePeer>();

  nextDescriptor(kind: SessionDescriptor["kind"], peer: FakePeer): SessionDescriptor {
    this.counter++;
    const descriptor: SessionDescriptor = { kind, body: `fake-${kind}-${this.counter}` };
    this.peers.set(descriptor.body, peer);
    return descriptor;
  }

  lookup(body: string): FakePeer | undefined {
    return this.peers.get(body);
  }
}

export class FakePeer implements TransportPeer {
  /** Every operation invoked, in call order */
  readonly calls: FakePeerOperation[] = [];
  /** Copies of all successfully sent payloads */
  readonly sentMessages: Uint8Array[] = [];
  /** Whether `send` accepts data; follows simulated up/down states */
  channelOpen = false;

  private readonly network: FakeNetwork;
  private readonly gatherDelay: number;
  private readonly failures = new Map<FakePeerOperation, Error>();
  private messageCallback: MessageCallback | null = null;
  private stateCallback: StateChangeCallback | null = null;
  private offerer: FakePeer | null = null;
  private remote: FakePeer | null = null;
  private closed = false;

  constructor(options: FakePeerOptions = {}) {
    this.network = options.network ?? new FakeNetwork();
    this.gatherDelay = options.gatherDelay ?? 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Make the next call of `operation` fail with `error`.
   */
  failNext(operation: FakePeerOperation, error: Error): void {
    this.failures.set(operation, error);
  }

  async createOffer(options?: GatherOptions): Promise<SessionDescriptor> {
    this.begin("createOffer");
    await this.gather(options);
    return this.network.nextDescriptor("offer", this);
  }

  async createAnswer(remoteOffer: string, options?: GatherOptions): Promise<SessionDescriptor> {
    this.begin("createAnswer");
    await this.setRemoteOffer(remoteOffer);
    await this.gather(options);
    return this.network.nextDescriptor("answer", this);
  }

  async setRemoteOffer(remoteOffer: string): Promise<void> {
    this.begin("setRemoteOffer");
    const { body } = parseDescriptor(remoteOffer, "offer");
    this.offerer = this.network.lookup(body) ?? null;
  }

  async setRemoteAnswer(remoteAnswer: string): Promise<void> {
    this.begin("setRemoteAnswer");
    const { body } = parseDescriptor(remoteAnswer, "answer");
    const answerer = this.network.lookup(body);
    if (answerer && answerer.offerer === this) {
      this.link(answerer);
    }
  }

  send(data: Uint8Array): void {
    this.calls.push("send");
    this.throwScriptedFailure("send");
    if (this.closed || !this.channelOpen) {
      throw new ChannelNotOpenError();
    }

    const copy = new Uint8Array(data);
    this.sentMessages.push(copy);

    const remote = this.remote;
    if (remote) {
      setTimeout(() => remote.simulateMessage(copy), 0);
    }
  }

  onMessage(callback: MessageCallback | null): void {
    this.messageCallback = callback;
  }

  onStateChange(callback: StateChangeCallback | null): void {
    this.stateCallback = callback;
  }

  async close(): Promise<void> {
    this.calls.push("close");
    this.throwScriptedFailure("close");
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.channelOpen = false;

    const remote = this.remote;
    this.remote = null;
    if (remote) {
      remote.remote = null;
      setTimeout(() => remote.simulateStateChange("disconnected"), 0);
    }
    setTimeout(() => this.stateCallback?.("closed"), 0);
  }

  /**
   * Deliver bytes to the registered message callback, synchronously.
   */
  simulateMessage(data: Uint8Array | string): void {
    const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
    this.messageCallback?.(bytes);
  }

  /**
   * Report a transport state to the registered callback, synchronously.
   * Up states open the channel, down states close it.
   */
  simulateStateChange(state: TransportState): void {
    const status = classifyTransportState(state);
    if (status === "up") {
      this.channelOpen = true;
    } else if (status === "down") {
      this.channelOpen = false;
    }
    this.stateCallback?.(state);
  }

  /**
   * Sent payloads decoded as UTF-8.
   */
  sentText(): string[] {
    const decoder = new TextDecoder();
    return this.sentMessages.map((data) => decoder.decode(data));
  }

  private begin(operation: FakePeerOperation): void {
    this.calls.push(operation);
    this.throwScriptedFailure(operation);
    if (this.closed) {
      throw new PeerClosedError();
    }
  }

  private throwScriptedFailure(operation: FakePeerOperation): void {
    const failure = this.failures.get(operation);
    if (failure) {
      this.failures.delete(operation);
      throw failure;
    }
  }

  private link(answerer: FakePeer): void {
    this.remote = answerer;
    answerer.remote = this;

    setTimeout(() => {
      for (const peer of [this, answerer]) {
        if (!peer.closed) peer.simulateStateChange("connecting");
      }
      for (const peer of [this, answerer]) {
        if (!peer.closed) peer.simulateStateChange("connected");
      }
    }, 0);
  }

  private gather(options: GatherOptions = {}): Promise<void> {
    const { signal, timeout } = options;
    if (this.gatherDelay <= 0 && !signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const timers: ReturnType<typeof setTimeout>[] = [];

      const finish = (error?: Error) => {
        for (const timer of timers) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = () => finish(new GatheringAbortedError({ cause: signal?.reason }));

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      timers.push(setTimeout(() => finish(), this.gatherDelay));
      if (timeout !== undefined && timeout < this.gatherDelay) {
        timers.push(setTimeout(() => finish(new GatheringTimeoutError(timeout)), timeout));
      }
    });
  }
}
