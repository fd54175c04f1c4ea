/**
 * @arch patternloom.core.engine
 *
 * In-memory catalog graph: components keyed by name plus directed, typed
 * relationship edges. Owns loading and persisting both snapshots.
 *
 * Mutations are write-through: every addComponent/addRelationship rewrites
 * the full snapshot. The graph does no locking; callers that mutate from
 * several places must serialize "mutate, then persist" themselves.
 */
import { CatalogError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { fileExistsSync, removeFileSync } from '../../utils/file-system.js';
import { loadJsonSync, writeJsonSync } from '../../utils/json.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import {
  CatalogFileSchema,
  RELATIONSHIPS_SCHEMA_VERSION,
  RelationshipsFileSchema,
  componentFromRecord,
  componentKey,
  componentToRecord,
  hasCapability,
  relationshipFromRecord,
  relationshipToRecord,
  type Capability,
  type Component,
  type ComponentRecordOut,
  type Diagnostic,
  type Relationship,
  type RelationshipType,
} from '../catalog/index.js';
import type {
  AddRelationshipResult,
  CatalogReader,
  GraphStats,
  KnowledgeGraphOptions,
  LoadReport,
  SearchResult,
} from './types.js';

const NAME_WEIGHT = 0.5;
const DESCRIPTION_WEIGHT = 0.3;
const CAPABILITY_WEIGHT = 0.2;

export class KnowledgeGraph implements CatalogReader {
  private readonly componentsPath: string;
  private readonly relationshipsPath: string;
  private readonly log: Logger;

  private components = new Map<string, Component>();
  /** source -> target -> edge; one edge per ordered pair */
  private edges = new Map<string, Map<string, Relationship>>();

  constructor(options: KnowledgeGraphOptions) {
    this.componentsPath = options.componentsPath;
    this.relationshipsPath = options.relationshipsPath;
    this.log = options.logger ?? defaultLogger.child('graph');
  }

  get size(): number {
    return this.components.size;
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Replace in-memory state with the persisted snapshots.
   * Missing files give an empty graph; malformed entries are skipped.
   */
  load(): LoadReport {
    this.components = new Map();
    this.edges = new Map();

    const report: LoadReport = {
      componentsLoaded: 0,
      componentsSkipped: 0,
      relationshipsLoaded: 0,
      relationshipsSkipped: 0,
      diagnostics: [],
    };

    this.loadComponents(report);
    this.loadRelationships(report);

    for (const diagnostic of report.diagnostics) {
      this.log.warn(diagnostic.message);
    }
    this.log.debug(
      `Loaded ${report.componentsLoaded} components (${report.componentsSkipped} skipped), ` +
        `${report.relationshipsLoaded} relationships (${report.relationshipsSkipped} skipped)`
    );
    return report;
  }

  private loadComponents(report: LoadReport): void {
    const file = this.componentsPath;
    if (!fileExistsSync(file)) {
      report.diagnostics.push({
        code: ErrorCodes.NOT_FOUND,
        message: `Catalog file not found: ${file}`,
        file,
      });
      return;
    }

    const parsed = CatalogFileSchema.safeParse(this.readSnapshot(file));
    if (!parsed.success) {
      throw new CatalogError(
        ErrorCodes.MALFORMED_FILE,
        `Catalog file ${file} is neither a name-keyed map nor a list of components`,
        { filePath: file }
      );
    }

    const entries: Array<[string | undefined, unknown]> = Array.isArray(parsed.data)
      ? parsed.data.map((raw): [undefined, unknown] => [undefined, raw])
      : Object.entries(parsed.data);

    entries.forEach(([key, raw], index) => {
      const decoded = componentFromRecord(raw, key);
      const label = key ?? `#${index}`;
      if (!decoded.ok) {
        report.componentsSkipped++;
        report.diagnostics.push({
          code: ErrorCodes.MALFORMED_ENTRY,
          message: `Skipped catalog entry ${label} in ${file}: ${decoded.error}`,
          entry: label,
          file,
        });
        return;
      }
      for (const warning of decoded.warnings) {
        report.diagnostics.push({
          code: ErrorCodes.MALFORMED_ENTRY,
          message: warning,
          entry: decoded.value.name,
          file,
        });
      }
      this.components.set(decoded.value.name, decoded.value);
      report.componentsLoaded++;
    });
  }

  private loadRelationships(report: LoadReport): void {
    const file = this.relationshipsPath;
    // No relationship file is the normal state of a fresh catalog
    if (!fileExistsSync(file)) return;

    const parsed = RelationshipsFileSchema.safeParse(this.readSnapshot(file));
    if (!parsed.success) {
      throw new CatalogError(
        ErrorCodes.MALFORMED_FILE,
        `Relationship file ${file} does not contain a relationship list`,
        { filePath: file }
      );
    }
    const records = Array.isArray(parsed.data) ? parsed.data : parsed.data.relationships;

    records.forEach((raw, index) => {
      const decoded = relationshipFromRecord(raw);
      if (!decoded.ok) {
        report.relationshipsSkipped++;
        report.diagnostics.push({
          code: ErrorCodes.MALFORMED_ENTRY,
          message: `Skipped relationship #${index} in ${file}: ${decoded.error}`,
          entry: `#${index}`,
          file,
        });
        return;
      }
      const missing = this.missingEndpoint(decoded.value);
      if (missing) {
        report.relationshipsSkipped++;
        report.diagnostics.push({ ...missing, file });
        return;
      }
      this.setEdge(decoded.value);
      report.relationshipsLoaded++;
    });
  }

  private readSnapshot(file: string): unknown {
    try {
      return loadJsonSync(file);
    } catch (error) {
      throw new CatalogError(
        ErrorCodes.MALFORMED_FILE,
        `Failed to read catalog snapshot ${file}: ${getErrorMessage(error)}`,
        { filePath: file }
      );
    }
  }

  /**
   * Rewrite both snapshots from memory.
   */
  save(): void {
    const catalog: Record<string, ComponentRecordOut> = {};
    for (const [name, component] of this.components) {
      catalog[name] = componentToRecord(component);
    }
    writeJsonSync(this.componentsPath, catalog);
    writeJsonSync(this.relationshipsPath, {
      schema_version: RELATIONSHIPS_SCHEMA_VERSION,
      relationships: this.getRelationships().map(relationshipToRecord),
    });
    this.log.debug(`Saved ${this.components.size} components to ${this.componentsPath}`);
  }

  /**
   * Empty the graph and delete both snapshots.
   */
  clear(): void {
    this.components = new Map();
    this.edges = new Map();
    removeFileSync(this.componentsPath);
    removeFileSync(this.relationshipsPath);
    this.log.info('Catalog cleared');
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Insert or overwrite a component, then persist.
   */
  addComponent(component: Component): void {
    this.components.set(component.name, component);
    this.save();
    this.log.debug(`Added component: ${component.name}`);
  }

  /**
   * Insert or overwrite the directed edge, then persist.
   * An unknown endpoint leaves the graph untouched and is reported.
   */
  addRelationship(relationship: Relationship): AddRelationshipResult {
    const missing = this.missingEndpoint(relationship);
    if (missing) {
      this.log.warn(missing.message);
      return { added: false, diagnostic: missing };
    }
    this.setEdge(relationship);
    this.save();
    this.log.debug(`Added relationship: ${relationship.source} -> ${relationship.target}`);
    return { added: true };
  }

  private setEdge(relationship: Relationship): void {
    let outgoing = this.edges.get(relationship.source);
    if (!outgoing) {
      outgoing = new Map();
      this.edges.set(relationship.source, outgoing);
    }
    outgoing.set(relationship.target, relationship);
  }

  private missingEndpoint(relationship: Relationship): Diagnostic | null {
    for (const [role, name] of [
      ['Source', relationship.source],
      ['Target', relationship.target],
    ] as const) {
      if (!this.components.has(name)) {
        return {
          code: ErrorCodes.NOT_FOUND,
          message: `${role} component '${name}' not found; relationship ${relationship.source} -> ${relationship.target} ignored`,
          entry: `${relationship.source} -> ${relationship.target}`,
        };
      }
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Exact name first, then case-insensitive.
   */
  getComponent(name: string): Component | undefined {
    const exact = this.components.get(name);
    if (exact) return exact;

    const lower = name.toLowerCase();
    for (const [key, component] of this.components) {
      if (key.toLowerCase() === lower) return component;
    }
    return undefined;
  }

  /**
   * Like getComponent, but also treats spaces and underscores as equal,
   * so `"Apache Kafka"` finds `"Apache_Kafka"`.
   */
  resolveComponent(name: string): Component | undefined {
    const direct = this.getComponent(name);
    if (direct) return direct;

    const key = componentKey(name);
    for (const [candidate, component] of this.components) {
      if (componentKey(candidate) === key) return component;
    }
    return undefined;
  }

  getAllComponents(): Component[] {
    return [...this.components.values()];
  }

  /**
   * Components providing the capability, in catalog order. Not ranked.
   */
  findByCapability(capability: Capability): Component[] {
    return this.getAllComponents().filter((component) => hasCapability(component, capability));
  }

  getCompatibleComponents(name: string): string[] {
    return this.outgoing(name, 'compatible_with');
  }

  findAlternatives(name: string): string[] {
    return this.outgoing(name, 'alternative_to');
  }

  private outgoing(name: string, type: RelationshipType): string[] {
    const edges = this.edges.get(name);
    if (!edges) return [];
    return [...edges.values()].filter((edge) => edge.type === type).map((edge) => edge.target);
  }

  getEdge(source: string, target: string): Relationship | undefined {
    return this.edges.get(source)?.get(target);
  }

  hasEdge(source: string, target: string): boolean {
    return this.getEdge(source, target) !== undefined;
  }

  getRelationships(): Relationship[] {
    const all: Relationship[] = [];
    for (const outgoing of this.edges.values()) {
      all.push(...outgoing.values());
    }
    return all;
  }

  /**
   * Every edge between two distinct members of `names`, both directions.
   */
  getConnections(names: readonly string[]): Relationship[] {
    const connections: Relationship[] = [];
    for (const source of names) {
      for (const target of names) {
        if (source === target) continue;
        const edge = this.getEdge(source, target);
        if (edge) connections.push(edge);
      }
    }
    return connections;
  }

  /**
   * Case-insensitive substring search over name, description and capabilities.
   * Zero-score components are left out; a blank query matches nothing.
   */
  search(query: string): SearchResult[] {
    const needle = query.trim().toLowerCase();
    if (needle.length === 0) return [];

    const results: SearchResult[] = [];
    for (const component of this.components.values()) {
      let score = 0;
      if (component.name.toLowerCase().includes(needle)) {
        score += NAME_WEIGHT;
      }
      if (component.description.toLowerCase().includes(needle)) {
        score += DESCRIPTION_WEIGHT;
      }
      // Counted once however many capabilities match
      if (component.capabilities.some((capability) => capability.includes(needle))) {
        score += CAPABILITY_WEIGHT;
      }
      if (score > 0) {
        results.push({ component, score });
      }
    }

    return results.sort((a, b) => b.score - a.score);
  }

  getStats(): GraphStats {
    const byCapability: Partial<Record<Capability, number>> = {};
    for (const component of this.components.values()) {
      for (const capability of component.capabilities) {
        byCapability[capability] = (byCapability[capability] ?? 0) + 1;
      }
    }

    const relationships = this.getRelationships();
    const byRelationshipType: Partial<Record<RelationshipType, number>> = {};
    for (const relationship of relationships) {
      byRelationshipType[relationship.type] = (byRelationshipType[relationship.type] ?? 0) + 1;
    }

    return {
      components: this.components.size,
      relationships: relationships.length,
      capabilityCoverage: Object.keys(byCapability).length,
      byCapability,
      byRelationshipType,
    };
  }
}
