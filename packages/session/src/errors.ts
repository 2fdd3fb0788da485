/**
 * Base class for chat session precondition and input errors.
 *
 * These never damage the session: correct the input or wait for the right
 * state and call again.
 */
export class ChatSessionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ChatSessionError";
  }
}

export class UsernameEmptyError extends ChatSessionError {
  constructor() {
    super("Username cannot be empty");
    this.name = "UsernameEmptyError";
  }
}

export class AlreadyConnectedError extends ChatSessionError {
  constructor() {
    super("Already connected to a room");
    this.name = "AlreadyConnectedError";
  }
}

export class NotConnectedError extends ChatSessionError {
  constructor() {
    super("Not connected to any room");
    this.name = "NotConnectedError";
  }
}

export class EmptyRoomCodeError extends ChatSessionError {
  constructor() {
    super("Room code cannot be empty");
    this.name = "EmptyRoomCodeError";
  }
}

export class EmptyAnswerCodeError extends ChatSessionError {
  constructor() {
    super("Answer code cannot be empty");
    this.name = "EmptyAnswerCodeError";
  }
}

export class EmptyTextError extends ChatSessionError {
  constructor() {
    super("Message text cannot be empty");
    this.name = "EmptyTextError";
  }
}

export class MessageTooLongError extends ChatSessionError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Message text exceeds ${limit} characters`);
    this.name = "MessageTooLongError";
    this.limit = limit;
  }
}

/**
 * Thrown when a handshake step is called out of order.
 */
export class InvalidSessionStateError extends ChatSessionError {
  readonly operation: string;
  readonly state: string;

  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while session is ${state}`);
    this.name = "InvalidSessionStateError";
    this.operation = operation;
    this.state = state;
  }
}
