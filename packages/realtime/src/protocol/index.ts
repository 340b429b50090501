export { MESSAGE_TYPES, isMessageType, type MessageType } from './message-types.js';
export {
  createProtocolMessage,
  decodeProtocolMessage,
  encodeProtocolMessage,
  protocolMessageDecoder,
  wireMessageSchema,
  type MessageDecoder,
  type MessagePayload,
  type ProtocolMessage,
  type ProtocolMessageInit,
  type WireMessage,
} from './protocol-message.js';
