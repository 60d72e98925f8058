import fs from 'fs/promises';
import path from 'path';
import type { ConsolidatedRecord } from '../models/extraction.js';
import { createLogger } from '../utils/logger.js';
import type { RecordSink, RecordWriteResult } from './RecordSink.js';

const VERSION_FILE_PATTERN = /^v(\d+)\.json$/;
const MAX_WRITE_ATTEMPTS = 5;

function isAlreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}

/**
 * JSON File Record Sink
 *
 * Writes `<baseDir>/<documentId>/v<N>.json`, one file per version.
 * Files are created exclusively, so an existing version is never overwritten.
 */
export class JsonFileRecordSink implements RecordSink {
  private logger = createLogger('JsonFileRecordSink');

  constructor(private baseDir: string) {}

  async write(documentId: string, record: ConsolidatedRecord): Promise<RecordWriteResult> {
    const directory = this.documentDir(documentId);
    await fs.mkdir(directory, { recursive: true });

    let version = (await this.latestVersion(documentId)) + 1;

    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const filePath = path.join(directory, `v${version}.json`);
      try {
        await fs.writeFile(filePath, JSON.stringify({ version, ...record }, null, 2), { flag: 'wx' });
        this.logger.info('Record written', { documentId, version, filePath });
        return { version };
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
        // Another writer took this version
        version++;
      }
    }

    throw new Error(`Could not claim a version for ${documentId} after ${MAX_WRITE_ATTEMPTS} attempts`);
  }

  /**
   * Highest stored version for a document, 0 when none exists
   */
  async latestVersion(documentId: string): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.documentDir(documentId));
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }

    return entries.reduce((max, entry) => {
      const match = entry.match(VERSION_FILE_PATTERN);
      return match ? Math.max(max, parseInt(match[1], 10)) : max;
    }, 0);
  }

  private documentDir(documentId: string): string {
    if (!documentId || documentId.includes('/') || documentId.includes('\\') || documentId === '.' || documentId === '..') {
      throw new Error(`Invalid document id for file storage: "${documentId}"`);
    }
    return path.join(this.baseDir, documentId);
  }
}
