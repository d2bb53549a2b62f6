export { TransferSession } from './session.js'
export type { TransferSessionConfig, SenderSessionConfig, ReceiverSessionConfig } from './session.js'
export { Connection } from './connection.js'
export type { Role, SessionState, Outcome, FileOffer, Admission, Admit } from './types.js'
