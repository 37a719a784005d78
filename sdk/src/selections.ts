import type { Document } from './document';

/**
 * Papers a user chose to keep, in the order they were saved.
 * Saving the same paper twice keeps both entries.
 */
export class SelectionSet {
  private items: Document[];

  constructor(initial: readonly Document[] = []) {
    this.items = [...initial];
  }

  append(document: Document): void {
    this.items.push(document);
  }

  /**
   * Snapshot of the current selections; later appends do not show up in it
   */
  all(): Document[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
