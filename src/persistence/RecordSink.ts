import type { ConsolidatedRecord } from '../models/extraction.js';

export interface RecordWriteResult {
  version: number;
}

/**
 * Durable store for consolidated records.
 * One write per processing run; a reprocessing run adds the next version
 * and never replaces an earlier one.
 */
export interface RecordSink {
  write(documentId: string, record: ConsolidatedRecord): Promise<RecordWriteResult>;
}
