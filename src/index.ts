export * from './models/extraction.js';
export * from './errors.js';
export { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from './config/engine.js';
export type { EngineConfig, ModelProvider, RecordSinkKind } from './config/engine.js';

export type { ModelClient, InferenceRequest, InferenceResponse, InvokeOptions } from './clients/ModelClient.js';
export { OpenAIModelClient } from './clients/OpenAIModelClient.js';
export { ClaudeModelClient } from './clients/ClaudeModelClient.js';
export { ProviderFactory } from './clients/ProviderFactory.js';

export type { DocumentAccessor } from './document/DocumentAccessor.js';
export { DirectoryDocumentAccessor, InMemoryDocumentAccessor } from './document/DocumentAccessor.js';

export { DiscoveryCoordinator, planDiscovery } from './discovery/DiscoveryCoordinator.js';
export type { DiscoveryMethod, DiscoveryResult } from './discovery/DiscoveryCoordinator.js';
export { ModelDiscoveryAgent } from './discovery/ModelDiscoveryAgent.js';
export type { DiscoveryAgent, DiscoveryRequest } from './discovery/ModelDiscoveryAgent.js';
export { normalizeFieldName, mergeFieldSets, parseFieldSpecifications } from './discovery/fieldSpecs.js';

export { ScalingPlanner, agentCountFor, partitionPages } from './scaling/ScalingPlanner.js';

export { AgentPool } from './extraction/AgentPool.js';
export type { AgentPoolResult } from './extraction/AgentPool.js';
export { ModelExtractionAgent } from './extraction/ModelExtractionAgent.js';
export type { FieldExtractor } from './extraction/ModelExtractionAgent.js';

export { Consolidator } from './consolidation/Consolidator.js';

export type { RecordSink, RecordWriteResult } from './persistence/RecordSink.js';
export { JsonFileRecordSink } from './persistence/JsonFileRecordSink.js';
export { PostgresRecordSink } from './persistence/PostgresRecordSink.js';
export { createRecordSink } from './persistence/createRecordSink.js';

export { ExtractionEngine } from './engine/ExtractionEngine.js';
export type { ExtractionEngineDependencies, ProcessResult } from './engine/ExtractionEngine.js';
export type { EngineEvent, EngineEventListener } from './engine/events.js';
