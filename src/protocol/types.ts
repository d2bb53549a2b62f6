export interface HelloMessage {
  type: 'HELLO'
  fileName: string
  fileSize: number
}

export interface AckMessage {
  type: 'ACK'
}

export interface NackMessage {
  type: 'NACK'
  reason: string
}

export interface SendMessage {
  type: 'SEND'
  fileSize: number
}

export type Message = HelloMessage | AckMessage | NackMessage | SendMessage

export type MessageType = Message['type']

export const MessageTag = {
  HELLO: 0x01,
  ACK: 0x02,
  NACK: 0x03,
  SEND: 0x04
} as const satisfies Record<MessageType, number>

export interface DecodedMessage {
  message: Message
  bytesRead: number
}

export const MAX_STRING_BYTES = 4096
