/**
 * Base class for transport peer failures.
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Thrown by `send` before the data channel exists or while it is not open.
 */
export class ChannelNotOpenError extends TransportError {
  constructor(message = "Data channel is not open") {
    super(message);
    this.name = "ChannelNotOpenError";
  }
}

/**
 * Thrown when descriptor text is malformed or of the wrong kind.
 */
export class DescriptorParseError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DescriptorParseError";
  }
}

/**
 * Thrown when candidate gathering does not complete in time.
 */
export class GatheringTimeoutError extends TransportError {
  readonly timeout: number;

  constructor(timeout: number) {
    super(`ICE gathering did not complete within ${timeout}ms`);
    this.name = "GatheringTimeoutError";
    this.timeout = timeout;
  }
}

/**
 * Thrown when the caller aborts a handshake step during candidate gathering.
 */
export class GatheringAbortedError extends TransportError {
  constructor(options?: ErrorOptions) {
    super("ICE gathering was aborted", options);
    this.name = "GatheringAbortedError";
  }
}

/**
 * Thrown by handshake operations on a peer that has been closed.
 */
export class PeerClosedError extends TransportError {
  constructor() {
    super("Peer connection is closed");
    this.name = "PeerClosedError";
  }
}
