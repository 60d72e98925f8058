import { describe, it, expect } from 'vitest';
import { ExtractionEngine, type ExtractionEngineDependencies } from '../../../src/engine/ExtractionEngine.js';
import type { EngineEvent } from '../../../src/engine/events.js';
import { InMemoryDocumentAccessor } from '../../../src/document/DocumentAccessor.js';
import {
  DiscoveryFailureError,
  DocumentAccessError,
  PersistenceFailureError,
  ScalingMisconfigurationError,
} from '../../../src/errors.js';
import type { RecordSink } from '../../../src/persistence/RecordSink.js';
import {
  InMemoryRecordSink,
  ScriptedDiscoveryAgent,
  ScriptedExtractor,
  makeExtraction,
  makeField,
  makePages,
  untilAborted,
} from '../helpers.js';

function buildEngine(overrides: Partial<ExtractionEngineDependencies> = {}) {
  const events: EngineEvent[] = [];
  const discoveryAgent = new ScriptedDiscoveryAgent(async () => [
    makeField('Party Name', { isRequired: true }),
    makeField('amount'),
  ]);
  const extractor = new ScriptedExtractor(async (assignment) =>
    assignment.agentId === 'agent-01'
      ? [makeExtraction('party_name', 'Acme Corp', 0.9, 'agent-01', assignment.pageRange.startPage, assignment.pageRange.endPage)]
      : []
  );
  const sink = new InMemoryRecordSink();
  const engine = new ExtractionEngine({
    accessor: new InMemoryDocumentAccessor({ contract: makePages(30), empty: [] }),
    discoveryAgent,
    extractor,
    sink,
    config: { discoveryTimeoutMs: 1000, agentTimeoutMs: 1000 },
    onEvent: (event) => events.push(event),
    generateId: () => 'rec-1',
    now: () => new Date('2026-02-01T00:00:00.000Z'),
    ...overrides,
  });
  return { engine, events, discoveryAgent, extractor, sink };
}

describe('ExtractionEngine', () => {
  describe('processDocument', () => {
    it('should discover, extract, consolidate and persist a document', async () => {
      const { engine, sink, extractor } = buildEngine();

      const result = await engine.processDocument('contract');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.version).toBe(1);
      expect(result.record.recordId).toBe('rec-1');
      expect(result.record.status).toBe('complete');
      expect(result.record.fields.party_name.value).toBe('Acme Corp');
      expect(result.record.fields.party_name.sourcePageRanges).toEqual([{ startPage: 1, endPage: 6 }]);
      expect(result.record.metadata.unobservedFields).toEqual(['amount']);
      expect(extractor.calls).toHaveLength(5);
      expect(sink.records.get('contract')).toEqual([result.record]);
    });

    it('should emit lifecycle events in order', async () => {
      const { engine, events } = buildEngine();

      await engine.processDocument('contract');

      expect(events.map((event) => event.type)).toEqual([
        'field-init-complete',
        'agent-scaling-complete',
        'extraction-task-complete',
        'extraction-task-complete',
        'extraction-task-complete',
        'extraction-task-complete',
        'extraction-task-complete',
        'extraction-complete',
      ]);

      const [fieldInit, scaling] = events;
      if (fieldInit.type === 'field-init-complete') {
        expect(fieldInit.discoveryMethod).toBe('single-agent');
        expect(fieldInit.fieldSpecifications.map((field) => field.name)).toEqual(['party_name', 'amount']);
      }
      if (scaling.type === 'agent-scaling-complete') {
        expect(scaling.agentCount).toBe(5);
        expect(scaling.pageRanges[4]).toEqual({ startPage: 25, endPage: 30 });
      }
      const last = events[events.length - 1];
      if (last.type === 'extraction-complete') {
        expect(last).toMatchObject({ recordId: 'rec-1', completionStatus: 'complete', completedAgents: 5, agentCount: 5 });
      }
    });

    it('should store a new version on reprocessing', async () => {
      const { engine } = buildEngine();

      await engine.processDocument('contract');
      const second = await engine.processDocument('contract');

      expect(second.ok && second.version).toBe(2);
    });

    it('should report a discovery failure without dispatching agents', async () => {
      const { engine, extractor } = buildEngine({
        discoveryAgent: new ScriptedDiscoveryAgent(async () => {
          throw new Error('model unavailable');
        }),
      });

      const result = await engine.processDocument('contract');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DiscoveryFailureError);
      expect(extractor.calls).toHaveLength(0);
    });

    it('should fail with PersistenceFailure when the sink rejects', async () => {
      const failingSink: RecordSink = {
        write: async () => {
          throw new Error('disk full');
        },
      };
      const { engine } = buildEngine({ sink: failingSink });

      const result = await engine.processDocument('contract');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(PersistenceFailureError);
      expect(result.error.message).toBe('Record sink rejected write: disk full');
      expect(result.error.code).toBe('PERSISTENCE_FAILURE');
    });

    it('should fail with PersistenceFailure when no sink is configured', async () => {
      const { engine, discoveryAgent } = buildEngine({ sink: undefined });

      const result = await engine.processDocument('contract');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Record sink rejected write: No record sink configured');
      expect(discoveryAgent.calls).toHaveLength(0);
    });

    it('should report an unknown document as a document access failure', async () => {
      const { engine } = buildEngine();

      const result = await engine.processDocument('nope');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DocumentAccessError);
      expect(result.error.message).toBe('Could not read document nope: Unknown document: nope');
    });

    it('should keep going when an event listener throws', async () => {
      const { engine } = buildEngine({
        onEvent: () => {
          throw new Error('listener broke');
        },
      });

      const result = await engine.processDocument('contract');

      expect(result.ok).toBe(true);
    });
  });

  describe('discoverFields', () => {
    it('should return the frozen, normalized field set', async () => {
      const { engine } = buildEngine();

      const fields = await engine.discoverFields('contract');

      expect(fields.map((field) => field.name)).toEqual(['party_name', 'amount']);
      expect(Object.isFrozen(fields)).toBe(true);
    });
  });

  describe('extractStructured', () => {
    it('should normalize caller field names', async () => {
      const { engine, extractor } = buildEngine();

      const record = await engine.extractStructured('contract', [makeField('Party Name')]);

      expect(extractor.calls[0].fieldSpecs.map((field) => field.name)).toEqual(['party_name']);
      expect(record.fields.party_name.value).toBe('Acme Corp');
    });

    it('should give every agent the same frozen field set', async () => {
      const { engine, extractor } = buildEngine();

      await engine.extractStructured('contract', [makeField('amount')]);

      const [first, ...rest] = extractor.calls;
      expect(Object.isFrozen(first.fieldSpecs)).toBe(true);
      rest.forEach((assignment) => expect(assignment.fieldSpecs).toBe(first.fieldSpecs));
    });

    it('should reject a document with no pages', async () => {
      const { engine } = buildEngine();

      await expect(engine.extractStructured('empty', [makeField('amount')])).rejects.toThrow(
        ScalingMisconfigurationError
      );
    });

    it('should return a degraded record when most agents fail', async () => {
      const { engine } = buildEngine({
        extractor: new ScriptedExtractor(async (assignment) => {
          if (assignment.agentId !== 'agent-01') throw new Error('model unavailable');
          return [];
        }),
      });

      const record = await engine.extractStructured('contract', [makeField('amount')]);

      expect(record.status).toBe('degraded');
      expect(record.metadata.completedAgents).toBe(1);
      expect(record.metadata.agentFailures).toHaveLength(4);
    });

    it('should return a partial record when the document deadline passes', async () => {
      const { engine, events } = buildEngine({
        config: { agentTimeoutMs: 5000, documentDeadlineMs: 30 },
        extractor: new ScriptedExtractor((assignment, signal) =>
          assignment.agentId === 'agent-01' ? Promise.resolve([]) : untilAborted(signal)
        ),
      });

      const record = await engine.extractStructured('contract', [makeField('amount')]);

      expect(record.status).toBe('partial');
      expect(record.flags.partial).toBe(true);
      expect(record.metadata.agentFailures.map((failure) => failure.message)).toEqual([
        'Cancelled: Document deadline of 30ms exceeded',
        'Cancelled: Document deadline of 30ms exceeded',
        'Cancelled: Document deadline of 30ms exceeded',
        'Cancelled: Document deadline of 30ms exceeded',
      ]);
      const last = events[events.length - 1];
      expect(last.type === 'extraction-complete' && last.completionStatus).toBe('partial');
    });
  });
});
