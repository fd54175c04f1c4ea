/**
 * @arch patternloom.core.barrel
 */
export { KnowledgeGraph } from './knowledge-graph.js';
export type {
  AddRelationshipResult,
  CatalogReader,
  GraphStats,
  KnowledgeGraphOptions,
  LoadReport,
  SearchResult,
} from './types.js';
