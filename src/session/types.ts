import type { TransferErrorKind } from '../errors.js'
import type { FileSink } from '../files.js'

export type Role = 'sender' | 'receiver'

export type SessionState =
  | 'START'
  | 'AWAITING_OFFER'
  | 'OFFER_SENT'
  | 'ACCEPTED'
  | 'REJECTED'
  | 'TRANSFERRING'
  | 'DONE'
  | 'ABORTED'

export type Outcome =
  | { status: 'completed'; bytes: number }
  | { status: 'rejected'; reason: string }
  | { status: 'failed'; error: TransferErrorKind; message: string }

export interface FileOffer {
  fileName: string
  fileSize: number
}

export type Admission =
  | { accepted: true; sink: FileSink }
  | { accepted: false; reason: string }

export type Admit = (offer: FileOffer, sessionId: string) => Promise<Admission>
