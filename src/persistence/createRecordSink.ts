import type { EngineConfig } from '../config/engine.js';
import { JsonFileRecordSink } from './JsonFileRecordSink.js';
import { PostgresRecordSink } from './PostgresRecordSink.js';
import type { RecordSink } from './RecordSink.js';

export function createRecordSink(config: Pick<EngineConfig, 'recordSink' | 'recordOutputDir'>): RecordSink {
  return config.recordSink === 'postgres'
    ? new PostgresRecordSink()
    : new JsonFileRecordSink(config.recordOutputDir);
}
