/**
 * @peerchat/protocol
 *
 * Line-framed JSON messages exchanged over an open data channel.
 *
 * @packageDocumentation
 */

export { MessageFormatError, type MessageFormatErrorCode } from "./errors.js";
export {
  type ChatMessage,
  createMessage,
  deserializeMessage,
  formatMessage,
  isMessageKind,
  isValidMessage,
  MAX_BODY_LENGTH,
  MESSAGE_KINDS,
  type MessageKind,
  RECORD_SEPARATOR,
  serializeMessage,
  validateMessage,
} from "./message.js";
