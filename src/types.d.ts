declare module 'hypercore-crypto' {
  interface HypercoreCrypto {
    randomBytes(n: number): Buffer
  }
  const crypto: HypercoreCrypto
  export = crypto
}

declare module 'b4a' {
  interface B4A {
    alloc(size: number): Buffer
    from(data: string | Uint8Array | number[], encoding?: string): Buffer
    concat(buffers: Uint8Array[], totalLength?: number): Buffer
    byteLength(data: string | Uint8Array, encoding?: string): number
    toString(buf: Uint8Array, encoding?: string, start?: number, end?: number): string
  }
  const b4a: B4A
  export = b4a
}
