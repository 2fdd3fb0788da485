/**
 * @peerchat/session
 *
 * Two-party chat over a manually signaled transport. Room codes and answer
 * codes are exchanged out of band (copy/paste); after that the peers talk
 * directly.
 *
 * @packageDocumentation
 */

export { ChatSession } from "./chat-session.js";
export {
  AlreadyConnectedError,
  ChatSessionError,
  EmptyAnswerCodeError,
  EmptyRoomCodeError,
  EmptyTextError,
  InvalidSessionStateError,
  MessageTooLongError,
  NotConnectedError,
  UsernameEmptyError,
} from "./errors.js";
export type {
  ChatSessionOptions,
  ConnectedHandler,
  DisconnectedHandler,
  ErrorHandler,
  MessageHandler,
  SessionState,
} from "./types.js";
