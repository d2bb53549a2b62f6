export { encodeMessage, decodeMessage } from './codec.js'
export { MessageTag, MAX_STRING_BYTES } from './types.js'
export type { Message, MessageType, HelloMessage, AckMessage, NackMessage, SendMessage, DecodedMessage } from './types.js'
