/**
 * Names of destination files currently claimed by a running session. Checking
 * and claiming happen in one synchronous call, so two sessions offering the
 * same name can never both hold it.
 */
export class NameReservations {
  private names: Set<string> = new Set()

  reserve(name: string): boolean {
    if (this.names.has(name)) return false
    this.names.add(name)
    return true
  }

  release(name: string): void {
    this.names.delete(name)
  }

  has(name: string): boolean {
    return this.names.has(name)
  }

  get size(): number {
    return this.names.size
  }
}
