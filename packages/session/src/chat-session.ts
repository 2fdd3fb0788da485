/**
 * Chat session orchestration.
 *
 * Drives the three-message copy/paste handshake (offer, answer, accept),
 * turns noisy transport state reports into one connected/disconnected event
 * per transition, and applies the wire protocol to everything that crosses
 * the data channel.
 *
 * Handshake steps and `disconnect()` run one at a time under a mutex.
 * Transport callbacks never wait for it: they run to completion on the
 * event loop, so the connected flag is always updated atomically. User
 * callbacks are dispatched on a later task, never from inside a session call.
 */

import {
  type ChatMessage,
  createMessage,
  deserializeMessage,
  MAX_BODY_LENGTH,
  serializeMessage,
} from "@peerchat/protocol";
import { decodeSignal, encodeSignal } from "@peerchat/signaling";
import {
  classifyTransportState,
  type GatherOptions,
  type Logger,
  serializeDescriptor,
  type SessionDescriptor,
  type TransportPeer,
  type TransportState,
  WebRtcPeer,
} from "@peerchat/transport-webrtc";
import { Mutex } from "async-mutex";
import {
  AlreadyConnectedError,
  EmptyAnswerCodeError,
  EmptyRoomCodeError,
  EmptyTextError,
  InvalidSessionStateError,
  MessageTooLongError,
  NotConnectedError,
  UsernameEmptyError,
} from "./errors.js";
import type {
  ChatSessionOptions,
  ConnectedHandler,
  DisconnectedHandler,
  ErrorHandler,
  MessageHandler,
  SessionState,
} from "./types.js";

const DEFAULT_JOIN_ANNOUNCE_DELAY = 100;
const DEFAULT_DISCONNECT_NOTIFY_DELAY = 100;

const STATUS_TEXT: Readonly<Record<SessionState, string>> = {
  idle: "Not connected",
  "offer-created": "Room created - waiting for an answer code...",
  "answer-created": "Answer code created - waiting for the host to accept it...",
  "answer-accepted": "Answer accepted - connecting...",
  connected: "Connected - ready to chat!",
  disconnected: "Connection lost",
  closed: "Disconnected",
};

const HOST_INSTRUCTIONS = `Connection Instructions:
1. You created a room - share your room code with the other person
2. They will join your room and give you an "answer code"
3. Paste their answer code to complete the connection`;

const GUEST_INSTRUCTIONS = `Connection Instructions:
1. Get a room code from someone else
2. Join with their code - you'll get an "answer code"
3. Send your answer code back to them
4. The connection establishes automatically once they accept your answer`;

function preview(token: string): string {
  return `${token.slice(0, 10)}...`;
}

/**
 * One side of a two-party chat.
 *
 * @example Host:
 * ```typescript
 * const session = new ChatSession("alice");
 * session.onMessage((message) => render(message));
 * const roomCode = await session.createRoom();
 * // share roomCode, receive answerCode
 * await session.acceptAnswer(answerCode);
 * ```
 *
 * @example Guest:
 * ```typescript
 * const session = new ChatSession("bob");
 * const answerCode = await session.joinRoom(roomCode);
 * // send answerCode back to the host
 * ```
 */
export class ChatSession {
  readonly username: string;

  private readonly peer: TransportPeer;
  private readonly logger?: Logger;
  private readonly joinAnnounceDelay: number;
  private readonly disconnectNotifyDelay: number;
  private readonly gatheringTimeout?: number;
  private readonly mutex = new Mutex();

  private currentState: SessionState = "idle";
  private connected = false;
  private currentRoomCode = "";
  private readonly lifetime = new AbortController();
  private joinTimer: ReturnType<typeof setTimeout> | null = null;

  private messageHandler: MessageHandler | null = null;
  private connectedHandler: ConnectedHandler | null = null;
  private disconnectedHandler: DisconnectedHandler | null = null;
  private errorHandler: ErrorHandler | null = null;

  /**
   * @throws UsernameEmptyError when the name is empty or only whitespace
   */
  constructor(username: string, options: ChatSessionOptions = {}) {
    if (username.trim() === "") {
      throw new UsernameEmptyError();
    }

    this.username = username;
    this.logger = options.logger;
    this.joinAnnounceDelay = options.joinAnnounceDelay ?? DEFAULT_JOIN_ANNOUNCE_DELAY;
    this.disconnectNotifyDelay = options.disconnectNotifyDelay ?? DEFAULT_DISCONNECT_NOTIFY_DELAY;
    this.gatheringTimeout = options.gatheringTimeout;
    this.peer =
      options.peer ??
      options.createPeer?.() ??
      new WebRtcPeer({ logger: options.logger, ...options.webrtc });

    this.peer.onMessage((data) => this.handleData(data));
    this.peer.onStateChange((state) => this.handleTransportState(state));
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Room code of the current attempt; empty before a room exists and after disconnect */
  get roomCode(): string {
    return this.currentRoomCode;
  }

  /**
   * Create a room and return the room code to share.
   */
  createRoom(): Promise<string> {
    return this.mutex.runExclusive(async () => {
      this.requireIdle("create a room");

      const offer = await this.gather((options) => this.peer.createOffer(options));
      const roomCode = encodeSignal(serializeDescriptor(offer));

      this.currentRoomCode = roomCode;
      this.setState("offer-created");
      this.logger?.debug?.(`Created room with code: ${preview(roomCode)}`);
      return roomCode;
    });
  }

  /**
   * Join a room by its code and return the answer code to send back.
   */
  joinRoom(roomCode: string): Promise<string> {
    return this.mutex.runExclusive(async () => {
      this.requireIdle("join a room");

      const code = roomCode.trim();
      if (code === "") {
        throw new EmptyRoomCodeError();
      }

      const offer = decodeSignal(code);
      const answer = await this.gather((options) => this.peer.createAnswer(offer, options));
      const answerCode = encodeSignal(serializeDescriptor(answer));

      this.currentRoomCode = code;
      this.setState("answer-created");
      this.logger?.debug?.(`Created answer for room. Answer code: ${preview(answerCode)}`);
      return answerCode;
    });
  }

  /**
   * Complete the handshake on the hosting side with the guest's answer code.
   */
  acceptAnswer(answerCode: string): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const code = answerCode.trim();
      if (code === "") {
        throw new EmptyAnswerCodeError();
      }
      if (this.currentState !== "offer-created") {
        throw new InvalidSessionStateError("accept an answer", this.currentState);
      }

      const answer = decodeSignal(code);
      await this.peer.setRemoteAnswer(answer);

      this.setState("answer-accepted");
      this.logger?.debug?.("Accepted answer from peer");
    });
  }

  /**
   * Send a chat line to the other side.
   *
   * Transport failures propagate as thrown by the peer.
   */
  sendMessage(text: string): void {
    if (!this.connected) {
      throw new NotConnectedError();
    }
    if (text === "") {
      throw new EmptyTextError();
    }
    if ([...text].length > MAX_BODY_LENGTH) {
      throw new MessageTooLongError(MAX_BODY_LENGTH);
    }

    this.peer.send(serializeMessage(createMessage("chat", this.username, text)));
    this.logger?.debug?.(`Sent message (${text.length} chars)`);
  }

  /**
   * Leave the room and release the transport. Safe to call repeatedly.
   *
   * A handshake step still gathering candidates, or queued behind this
   * call, fails with GatheringAbortedError.
   */
  disconnect(): Promise<void> {
    if (!this.lifetime.signal.aborted) {
      this.lifetime.abort(new Error("Session disconnected"));
    }

    return this.mutex.runExclusive(async () => {
      const wasConnected = this.connected;

      if (wasConnected) {
        const leave = serializeMessage(createMessage("leave", this.username, ""));
        try {
          this.peer.send(leave);
        } catch (error) {
          this.logger?.warn?.("Failed to send leave message:", error);
        }
        this.connected = false;
      }

      this.cancelJoinAnnouncement();
      this.currentRoomCode = "";
      this.setState("closed");

      const handler = this.disconnectedHandler;
      if (wasConnected && handler) {
        setTimeout(() => this.invoke("disconnected", () => handler()), this.disconnectNotifyDelay);
      }

      await this.peer.close();
    });
  }

  onMessage(handler: MessageHandler | null): void {
    this.messageHandler = handler;
  }

  onConnected(handler: ConnectedHandler | null): void {
    this.connectedHandler = handler;
  }

  onDisconnected(handler: DisconnectedHandler | null): void {
    this.disconnectedHandler = handler;
  }

  onError(handler: ErrorHandler | null): void {
    this.errorHandler = handler;
  }

  /**
   * Short human-readable description of where the session stands.
   */
  connectionStatus(): string {
    return STATUS_TEXT[this.currentState];
  }

  /**
   * What the user should do next in the copy/paste flow.
   */
  connectionInstructions(): string {
    const hosting =
      this.currentState === "offer-created" || this.currentState === "answer-accepted";
    return hosting ? HOST_INSTRUCTIONS : GUEST_INSTRUCTIONS;
  }

  private requireIdle(operation: string): void {
    if (this.connected) {
      throw new AlreadyConnectedError();
    }
    if (this.currentState !== "idle") {
      throw new InvalidSessionStateError(operation, this.currentState);
    }
  }

  private gather(
    step: (options: GatherOptions) => Promise<SessionDescriptor>,
  ): Promise<SessionDescriptor> {
    return step({ signal: this.lifetime.signal, timeout: this.gatheringTimeout });
  }

  private setState(next: SessionState): void {
    if (this.currentState !== next) {
      this.logger?.debug?.(`Session state: ${this.currentState} -> ${next}`);
      this.currentState = next;
    }
  }

  private handleTransportState(state: TransportState): void {
    this.logger?.debug?.(`Connection state: ${state}`);
    if (this.currentState === "closed") {
      return;
    }

    const status = classifyTransportState(state);
    if (status === "ignore") {
      return;
    }

    const wasConnected = this.connected;
    this.connected = status === "up";

    if (this.connected && !wasConnected) {
      this.setState("connected");
      this.logger?.info?.("Successfully connected to peer");
      this.scheduleJoinAnnouncement();
      const handler = this.connectedHandler;
      if (handler) this.dispatch("connected", () => handler());
    } else if (!this.connected && wasConnected) {
      this.cancelJoinAnnouncement();
      this.setState("disconnected");
      this.logger?.info?.("Disconnected from peer");
      const handler = this.disconnectedHandler;
      if (handler) this.dispatch("disconnected", () => handler());
    }
  }

  private scheduleJoinAnnouncement(): void {
    const join = serializeMessage(createMessage("join", this.username, ""));
    this.cancelJoinAnnouncement();
    this.joinTimer = setTimeout(() => {
      this.joinTimer = null;
      if (!this.connected) {
        return;
      }
      try {
        this.peer.send(join);
      } catch (error) {
        this.logger?.warn?.("Failed to send join message:", error);
      }
    }, this.joinAnnounceDelay);
  }

  private cancelJoinAnnouncement(): void {
    if (this.joinTimer) {
      clearTimeout(this.joinTimer);
      this.joinTimer = null;
    }
  }

  private handleData(data: Uint8Array): void {
    if (this.currentState === "closed") {
      return;
    }

    let message: ChatMessage;
    try {
      message = deserializeMessage(data);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger?.warn?.(`Failed to parse message: ${err.message}`);
      const handler = this.errorHandler;
      if (handler) this.dispatch("error", () => handler(err));
      return;
    }

    switch (message.kind) {
      case "join":
        this.logger?.info?.(`${message.sender} joined the chat`);
        break;
      case "leave":
        this.logger?.info?.(`${message.sender} left the chat`);
        break;
      default:
        this.logger?.debug?.(`Received message from ${message.sender}`);
    }

    const handler = this.messageHandler;
    if (handler) this.dispatch("message", () => handler(message));
  }

  private dispatch(name: string, call: () => void): void {
    queueMicrotask(() => this.invoke(name, call));
  }

  private invoke(name: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger?.error?.(`Error in ${name} callback:`, error);
    }
  }
}
