/**
 * @arch patternloom.core.types
 */
import type { Logger } from '../../utils/logger.js';
import type {
  Capability,
  Component,
  Diagnostic,
  Relationship,
  RelationshipType,
} from '../catalog/index.js';

/**
 * Outcome of a catalog load. Partial loads are visible through the counts.
 */
export interface LoadReport {
  componentsLoaded: number;
  componentsSkipped: number;
  relationshipsLoaded: number;
  relationshipsSkipped: number;
  diagnostics: Diagnostic[];
}

export type AddRelationshipResult =
  | { added: true }
  | { added: false; diagnostic: Diagnostic };

export interface SearchResult {
  component: Component;
  score: number;
}

export interface GraphStats {
  components: number;
  relationships: number;
  /** Number of distinct capabilities provided by at least one component */
  capabilityCoverage: number;
  byCapability: Partial<Record<Capability, number>>;
  byRelationshipType: Partial<Record<RelationshipType, number>>;
}

export interface KnowledgeGraphOptions {
  /** Component snapshot (exchange format) */
  componentsPath: string;
  /** Relationship snapshot */
  relationshipsPath: string;
  logger?: Logger;
}

/**
 * Read-only view of the graph used by the weaver, evolver and auditor.
 */
export interface CatalogReader {
  getComponent(name: string): Component | undefined;
  resolveComponent(name: string): Component | undefined;
  getAllComponents(): Component[];
  findByCapability(capability: Capability): Component[];
  getEdge(source: string, target: string): Relationship | undefined;
  getConnections(names: readonly string[]): Relationship[];
}
