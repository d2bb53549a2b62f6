export { sendFile } from './client.js'
export type { SendOptions } from './client.js'
