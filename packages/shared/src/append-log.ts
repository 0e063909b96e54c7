/**
 * Append-only in-memory log.
 *
 * Backs the notification log and the calendar sync history. Entries are
 * frozen on append; there is no update or delete.
 */
export class AppendOnlyLog<T extends object> {
  private readonly entries: T[] = [];

  /** Append an entry and return the frozen copy that was stored. */
  append(entry: T): Readonly<T> {
    const frozen = Object.freeze({ ...entry });
    this.entries.push(frozen);
    return frozen;
  }

  /** Snapshot of all entries in append order. */
  all(): readonly T[] {
    return [...this.entries];
  }

  filter(predicate: (entry: T) => boolean): T[] {
    return this.entries.filter(predicate);
  }

  get size(): number {
    return this.entries.length;
  }
}
