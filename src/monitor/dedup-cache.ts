/**
 * Process-lifetime set of post ids already seen. Membership only; entries
 * are never expired, only removed when a delivery is rolled back.
 */
export class DedupCache {
  private readonly ids = new Set<string>()

  contains(id: string): boolean {
    return this.ids.has(id)
  }

  add(id: string): void {
    this.ids.add(id)
  }

  remove(id: string): void {
    this.ids.delete(id)
  }

  get size(): number {
    return this.ids.size
  }
}
