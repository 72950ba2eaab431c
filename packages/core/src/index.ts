// Pipelines
export * from './catalog';

// Library layout & configuration
export * from './library';
export * from './config/settings';

// Records & errors
export * from './contracts';
export * from './errors';

// Database
export * from './db';

// Store
export * from './store/content-store';

// Indexer
export * from './indexer/finder';
export * from './indexer/scanner';

// Planner
export * from './planner/constants';
export * from './planner/category-config';
export * from './planner/rule-scorer';
export * from './planner/categorization-engine';

// Extractors
export * from './extractors/types';
export * from './extractors/extractor-utils';
export * from './extractors/pdf-extractor';

// Agents
export * from './agents/llm-client';
export * from './agents/llm-classifier';
export * from './agents/response-extractor';

// Virtual Tree
export * from './virtual-tree/safe-filename';
export * from './virtual-tree/view-builder';
