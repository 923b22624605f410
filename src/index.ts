// Main entry point for the monitoring summary schema library

// Schema
export * from './schema/types';
export * from './schema/version';
export * from './schema/DefinitionLoader';
export * from './schema/SchemaRegistry';

// Summary records
export * from './summary/types';
export * from './summary/SummaryValidator';

// Coordination store
export * from './store/types';
export * from './store/SummaryRepository';
export * from './store/memory/InMemoryKeyValueStore';

// Rollups
export * from './aggregation/NodeSummaryBuilder';
export * from './aggregation/SystemSummaryAggregator';

// Configuration
export * from './config/MonitoringConfiguration';

// Common modules
export * from './common/errors';
export * from './common/logger';
export * from './common/utils';
