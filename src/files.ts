import fs from 'node:fs'
import path from 'node:path'
import b4a from 'b4a'
import { TransferError } from './errors.js'

/** What the sender streams: a named byte source of known length. */
export interface FileSource {
  name: string
  size: number
  open(): AsyncIterable<Uint8Array>
}

/** Where one accepted transfer lands until it is committed or discarded. */
export interface FileSink {
  write(chunk: Uint8Array): Promise<void>
  /** Move the data to its final name; returns the final path. */
  commit(): Promise<string>
  discard(): Promise<void>
}

export interface OutputDirectory {
  readonly root: string
  exists(name: string): boolean
  create(name: string, sessionId: string): Promise<FileSink>
}

const MAX_NAME_BYTES = 255

// In-flight data is kept under a fixed-length name of this shape, so the
// temporary name fits wherever the offered name does.
const PARTIAL_NAME = /^\.ferry-[0-9a-f]+\.part$/

/**
 * Returns an error message if `name` could not be stored as a single entry
 * directly inside `root`, otherwise null.
 */
export function validateFileName(name: string, root?: string): string | null {
  if (!name) return 'file name is empty'
  if (name === '.' || name === '..') return `file name "${name}" is a directory reference`
  if (name.includes('/') || name.includes('\\')) return 'file name contains a path separator'
  if (name.includes('\0')) return 'file name contains a NUL byte'
  if (b4a.byteLength(name) > MAX_NAME_BYTES) return `file name is longer than ${MAX_NAME_BYTES} bytes`
  if (PARTIAL_NAME.test(name)) return 'file name is reserved for partial transfers'

  if (root !== undefined) {
    const base = path.resolve(root)
    const target = path.resolve(base, name)
    if (path.dirname(target) !== base) return 'file name resolves outside the output directory'
  }

  return null
}

export function tempFileName(sessionId: string): string {
  return `.ferry-${sessionId}.part`
}

export class DirectoryOutput implements OutputDirectory {
  readonly root: string

  constructor(root: string) {
    this.root = path.resolve(root)
  }

  exists(name: string): boolean {
    return fs.existsSync(path.join(this.root, name))
  }

  async create(name: string, sessionId: string): Promise<FileSink> {
    const error = validateFileName(name, this.root)
    if (error) {
      throw new TransferError('PathSecurityError', error)
    }

    const finalPath = path.join(this.root, name)
    const tempPath = path.join(this.root, tempFileName(sessionId))
    const handle = await fs.promises.open(tempPath, 'wx')
    let closed = false

    const close = async (): Promise<void> => {
      if (closed) return
      closed = true
      await handle.close()
    }

    return {
      async write(chunk: Uint8Array): Promise<void> {
        let offset = 0
        while (offset < chunk.length) {
          const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset)
          offset += bytesWritten
        }
      },
      async commit(): Promise<string> {
        await close()
        await fs.promises.rename(tempPath, finalPath)
        return finalPath
      },
      async discard(): Promise<void> {
        await close()
        await fs.promises.rm(tempPath, { force: true })
      }
    }
  }
}

export function ensureOutputDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true })
  }
}

export async function openFileSource(filePath: string): Promise<FileSource> {
  const stat = await fs.promises.stat(filePath)
  if (!stat.isFile()) {
    throw new TransferError('IoError', `${filePath} is not a regular file`)
  }

  return {
    name: path.basename(filePath),
    size: stat.size,
    open: () => fs.createReadStream(filePath)
  }
}

export function memorySource(name: string, data: Uint8Array): FileSource {
  return {
    name,
    size: data.length,
    async *open() {
      yield data
    }
  }
}
