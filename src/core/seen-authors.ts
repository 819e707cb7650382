/**
 * Account ids already welcomed by this process. Grows for the lifetime of
 * the process and is never persisted; a restart starts from empty.
 */
export class SeenAuthorTracker {
  private readonly authors = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const authorId of initial) {
      this.authors.add(authorId);
    }
  }

  has(authorId: string): boolean {
    return this.authors.has(authorId);
  }

  /**
   * Returns false when the author was already present.
   */
  add(authorId: string): boolean {
    if (this.authors.has(authorId)) {
      return false;
    }
    this.authors.add(authorId);
    return true;
  }

  get size(): number {
    return this.authors.size;
  }

  values(): string[] {
    return [...this.authors];
  }
}
