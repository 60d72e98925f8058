import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DirectoryDocumentAccessor, InMemoryDocumentAccessor } from '../../../src/document/DocumentAccessor.js';

describe('InMemoryDocumentAccessor', () => {
  const accessor = new InMemoryDocumentAccessor({ memo: ['first', 'second'] });

  it('should return the page count and 1-indexed pages', async () => {
    expect(await accessor.getPageCount('memo')).toBe(2);
    expect(await accessor.getPage('memo', 2)).toBe('second');
  });

  it('should reject pages out of range', async () => {
    await expect(accessor.getPage('memo', 3)).rejects.toThrow('Page 3 out of range for memo (1-2)');
    await expect(accessor.getPage('memo', 0)).rejects.toThrow(RangeError);
  });

  it('should reject an unknown document', async () => {
    await expect(accessor.getPageCount('other')).rejects.toThrow('Unknown document: other');
  });

  it('should copy added pages', async () => {
    const pages = ['a'];
    accessor.addDocument('copy', pages);
    pages.push('b');

    expect(await accessor.getPageCount('copy')).toBe(1);
  });
});

describe('DirectoryDocumentAccessor', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pages-'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  async function writePages(documentId: string, files: Record<string, string>): Promise<void> {
    await fs.mkdir(path.join(baseDir, documentId));
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(baseDir, documentId, name), content);
    }
  }

  it('should read numbered page files in any accepted naming', async () => {
    await writePages('report', {
      'page-0001.md': 'one',
      'page_2.txt': 'two',
      '3.md': 'three',
      'README.txt': 'ignored',
    });
    const accessor = new DirectoryDocumentAccessor(baseDir);

    expect(await accessor.getPageCount('report')).toBe(3);
    expect(await accessor.getPage('report', 1)).toBe('one');
    expect(await accessor.getPage('report', 3)).toBe('three');
  });

  it('should reject a gap in page numbers', async () => {
    await writePages('gappy', { 'page-1.md': 'one', 'page-3.md': 'three' });

    await expect(new DirectoryDocumentAccessor(baseDir).getPageCount('gappy')).rejects.toThrow(/Missing page 2/);
  });

  it('should reject two files for the same page', async () => {
    await writePages('twice', { 'page-1.md': 'one', '1.txt': 'also one' });

    await expect(new DirectoryDocumentAccessor(baseDir).getPageCount('twice')).rejects.toThrow(/Duplicate page 1/);
  });

  it('should reject a page past the end', async () => {
    await writePages('short', { 'page-1.md': 'one' });

    await expect(new DirectoryDocumentAccessor(baseDir).getPage('short', 2)).rejects.toThrow(
      'Page 2 out of range for short (1-1)'
    );
  });
});
