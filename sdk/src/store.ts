import type { Document } from './document';

/**
 * Source of the paper collection.
 * Implement this to plug in another backend (MongoDB, a REST API, a JSON dump...)
 */
export interface DocumentStore {
  /**
   * Every document, in a stable order that the corpus snapshot keeps
   */
  fetchAll(): Promise<Document[]>;
}

/**
 * Store over an in-process array, for tests and fixtures
 */
export class MemoryDocumentStore implements DocumentStore {
  private documents: Document[];

  constructor(documents: readonly Document[] = []) {
    this.documents = [...documents];
  }

  add(...documents: Document[]): void {
    this.documents.push(...documents);
  }

  async fetchAll(): Promise<Document[]> {
    return [...this.documents];
  }
}
