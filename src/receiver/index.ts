export { FileReceiver, listen } from './server.js'
export type { FileReceiverConfig, FileReceiverEvents, SessionReport } from './server.js'
export { acceptAll, limitFileSize, allOf } from './policy.js'
export type { AdmissionPolicy, AdmissionDecision } from './policy.js'
export { NameReservations } from './reservations.js'
