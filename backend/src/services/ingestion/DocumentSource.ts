import { readFile } from 'node:fs/promises';

/** Where an ingestion run gets its scraped documents from. */
export interface DocumentSource {
  fetchDocuments(): Promise<unknown[]>;
  describe(): string;
}

/**
 * Reads a scraper dump: either a JSON array of raw documents or an object with a
 * `documents` array.
 */
export class JsonFileDocumentSource implements DocumentSource {
  constructor(private readonly filePath: string) {}

  async fetchDocuments(): Promise<unknown[]> {
    const content = await readFile(this.filePath, 'utf-8');
    const data: unknown = JSON.parse(content);

    if (Array.isArray(data)) {
      return data;
    }
    if (typeof data === 'object' && data !== null && 'documents' in data && Array.isArray(data.documents)) {
      return data.documents;
    }
    throw new Error(`${this.filePath} does not contain a document array`);
  }

  describe(): string {
    return this.filePath;
  }
}

export class StaticDocumentSource implements DocumentSource {
  constructor(private readonly documents: readonly unknown[]) {}

  async fetchDocuments(): Promise<unknown[]> {
    return [...this.documents];
  }

  describe(): string {
    return `${this.documents.length} in-memory documents`;
  }
}
