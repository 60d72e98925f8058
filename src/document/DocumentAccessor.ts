import fs from 'fs/promises';
import path from 'path';

/**
 * Read-only access to parsed document pages.
 * Both calls must be idempotent and side-effect-free.
 */
export interface DocumentAccessor {
  getPageCount(documentId: string): Promise<number>;
  /** Page text/structure for a 1-indexed page */
  getPage(documentId: string, pageNumber: number): Promise<string>;
}

/**
 * Pages held in memory, keyed by document id
 */
export class InMemoryDocumentAccessor implements DocumentAccessor {
  private documents: Map<string, string[]>;

  constructor(documents: Record<string, string[]> = {}) {
    this.documents = new Map(Object.entries(documents));
  }

  addDocument(documentId: string, pages: string[]): void {
    this.documents.set(documentId, [...pages]);
  }

  async getPageCount(documentId: string): Promise<number> {
    return this.getPages(documentId).length;
  }

  async getPage(documentId: string, pageNumber: number): Promise<string> {
    const pages = this.getPages(documentId);
    if (!Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > pages.length) {
      throw new RangeError(`Page ${pageNumber} out of range for ${documentId} (1-${pages.length})`);
    }
    return pages[pageNumber - 1];
  }

  private getPages(documentId: string): string[] {
    const pages = this.documents.get(documentId);
    if (!pages) {
      throw new Error(`Unknown document: ${documentId}`);
    }
    return pages;
  }
}

const PAGE_FILE_PATTERN = /^(?:page[-_]?)?(\d+)\.(?:md|txt)$/i;

/**
 * Pages stored on disk as one file per page: `<baseDir>/<documentId>/page-0001.md`
 * (any `page-N`, `page_N` or bare `N` name with .md or .txt is accepted).
 * Pages must be numbered 1..N without gaps.
 */
export class DirectoryDocumentAccessor implements DocumentAccessor {
  private index: Map<string, Map<number, string>> = new Map();

  constructor(private baseDir: string) {}

  async getPageCount(documentId: string): Promise<number> {
    return (await this.loadIndex(documentId)).size;
  }

  async getPage(documentId: string, pageNumber: number): Promise<string> {
    const files = await this.loadIndex(documentId);
    const file = files.get(pageNumber);
    if (!file) {
      throw new RangeError(`Page ${pageNumber} out of range for ${documentId} (1-${files.size})`);
    }
    return fs.readFile(file, 'utf-8');
  }

  private async loadIndex(documentId: string): Promise<Map<number, string>> {
    const cached = this.index.get(documentId);
    if (cached) {
      return cached;
    }

    const dir = path.join(this.baseDir, documentId);
    const entries = await fs.readdir(dir);
    const files = new Map<number, string>();

    for (const entry of entries) {
      const match = entry.match(PAGE_FILE_PATTERN);
      if (!match) continue;
      const pageNumber = parseInt(match[1], 10);
      if (files.has(pageNumber)) {
        throw new Error(`Duplicate page ${pageNumber} in ${dir}`);
      }
      files.set(pageNumber, path.join(dir, entry));
    }

    for (let page = 1; page <= files.size; page++) {
      if (!files.has(page)) {
        throw new Error(`Missing page ${page} in ${dir} (pages must be numbered 1..${files.size})`);
      }
    }

    this.index.set(documentId, files);
    return files;
  }
}
