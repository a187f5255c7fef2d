// Run-scoped record of links already handed downstream. Cross-run duplicates
// are the shop store's concern (upsert by natural key).
export class LinkDeduplicator {
  private readonly seenKeys = new Set<string>();

  seen(key: string): boolean {
    return this.seenKeys.has(key);
  }

  mark(key: string) {
    this.seenKeys.add(key);
  }

  markIfNew(key: string): boolean {
    if (this.seenKeys.has(key)) {
      return false;
    }
    this.seenKeys.add(key);
    return true;
  }

  get size() {
    return this.seenKeys.size;
  }

  clear() {
    this.seenKeys.clear();
  }
}
