import type { FileOffer } from '../session/index.js'
import { formatSize } from '../utils.js'

export type AdmissionDecision = { accept: true } | { accept: false; reason: string }

export type AdmissionPolicy = (offer: FileOffer) => AdmissionDecision | Promise<AdmissionDecision>

export const acceptAll: AdmissionPolicy = () => ({ accept: true })

export function limitFileSize(maxBytes: number): AdmissionPolicy {
  return (offer) => {
    if (offer.fileSize > maxBytes) {
      return { accept: false, reason: `file is ${formatSize(offer.fileSize)}, limit is ${formatSize(maxBytes)}` }
    }
    return { accept: true }
  }
}

/** First rejection wins; policies run in order. */
export function allOf(...policies: AdmissionPolicy[]): AdmissionPolicy {
  return async (offer) => {
    for (const policy of policies) {
      const decision = await policy(offer)
      if (!decision.accept) return decision
    }
    return { accept: true }
  }
}
