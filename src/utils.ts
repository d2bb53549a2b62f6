import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(): string {
  return b4a.toString(crypto.randomBytes(16), 'hex')
}

export function shortId(id: string): string {
  return id.slice(0, 8)
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}
