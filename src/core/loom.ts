/**
 * @arch patternloom.core.engine
 *
 * Collaborator-facing surface. A Loom bundles one graph with the weaver,
 * evolver and auditor reading it; each Loom is independent, so tests and
 * callers can hold as many isolated ones as they need.
 */
import { resolvePath } from '../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import {
  createComponent,
  createIntent,
  createRelationship,
  requireCapability,
  type Capability,
  type Component,
  type ComponentInput,
  type IntentInput,
  type RelationshipInput,
} from './catalog/index.js';
import { getDefaultConfig, loadConfig, type Config } from './config/index.js';
import {
  KnowledgeGraph,
  type AddRelationshipResult,
  type LoadReport,
  type SearchResult,
} from './graph/index.js';
import {
  describePattern,
  loadPattern,
  savePattern,
  type Pattern,
  type PatternLoadResult,
  type PatternSummary,
} from './patterns/index.js';
import { PatternWeaver, calculateWeightedScore, type WeaveResult } from './weaver/index.js';
import { PatternEvolver, type EvolutionChain, type EvolutionResult } from './evolver/index.js';
import {
  PatternAuditor,
  type AuditFileResult,
  type AuditFinding,
  type AuditOptions,
} from './auditor/index.js';

export interface LoomOptions {
  projectRoot: string;
  config?: Config;
  logger?: Logger;
}

export interface OpenLoomOptions {
  /** Config file, relative to the project root */
  configPath?: string;
  logger?: Logger;
}

export class Loom {
  readonly projectRoot: string;
  readonly config: Config;
  readonly graph: KnowledgeGraph;

  private readonly weaver: PatternWeaver;
  private readonly evolver: PatternEvolver;
  private readonly auditor: PatternAuditor;

  constructor(options: LoomOptions) {
    this.projectRoot = resolvePath(options.projectRoot);
    this.config = options.config ?? getDefaultConfig();
    const log = options.logger ?? this.configuredLogger();

    this.graph = new KnowledgeGraph({
      componentsPath: this.resolve(this.config.catalog.components),
      relationshipsPath: this.resolve(this.config.catalog.relationships),
      logger: log.child('graph'),
    });
    this.weaver = new PatternWeaver(this.graph, {
      weights: this.config.scoring.weights,
      logger: log.child('weaver'),
    });
    this.evolver = new PatternEvolver(this.graph, { logger: log.child('evolver') });
    this.auditor = new PatternAuditor(this.graph, { logger: log.child('auditor') });
  }

  /**
   * Shared logger narrowed to the configured level. An injected logger
   * keeps its own level.
   */
  private configuredLogger(): Logger {
    const log = defaultLogger.child('loom');
    log.setLevel(this.config.logging.level);
    return log;
  }

  /** Resolve a path against the project root */
  resolve(filePath: string): string {
    return resolvePath(this.projectRoot, filePath);
  }

  // ---------------------------------------------------------------------------
  // Catalog
  // ---------------------------------------------------------------------------

  loadCatalog(): LoadReport {
    return this.graph.load();
  }

  saveCatalog(): void {
    this.graph.save();
  }

  clearCatalog(): void {
    this.graph.clear();
  }

  addComponent(input: ComponentInput): Component {
    const component = createComponent(input);
    this.graph.addComponent(component);
    return component;
  }

  addRelationship(input: RelationshipInput): AddRelationshipResult {
    return this.graph.addRelationship(createRelationship(input));
  }

  /**
   * @throws ConstraintError when the text names no known capability
   */
  findByCapability(capability: Capability | string): Component[] {
    return this.graph.findByCapability(requireCapability(capability));
  }

  search(query: string): SearchResult[] {
    return this.graph.search(query);
  }

  // ---------------------------------------------------------------------------
  // Patterns
  // ---------------------------------------------------------------------------

  /**
   * @throws ConstraintError when the intent requires no capability
   */
  synthesize(input: IntentInput): WeaveResult {
    return this.weaver.weave(createIntent(input));
  }

  evolve(pattern: Pattern, transformation: string): EvolutionResult {
    return this.evolver.evolveWithReport(pattern, transformation);
  }

  evolveAll(pattern: Pattern, transformations: readonly string[]): EvolutionChain {
    return this.evolver.evolveAll(pattern, transformations);
  }

  audit(pattern: Pattern, options: AuditOptions = {}): AuditFinding[] {
    return this.auditor.audit(pattern, options);
  }

  auditFile(filePath: string, options: AuditOptions = {}): Promise<AuditFileResult> {
    return this.auditor.auditFile(this.resolve(filePath), options);
  }

  passes(findings: readonly AuditFinding[]): boolean {
    return this.auditor.passes(findings);
  }

  loadPattern(filePath: string): Promise<PatternLoadResult> {
    return loadPattern(this.resolve(filePath), this.graph);
  }

  savePattern(pattern: Pattern, filePath: string): Promise<void> {
    return savePattern(pattern, this.resolve(filePath));
  }

  describe(pattern: Pattern): PatternSummary {
    return describePattern(pattern, this.graph);
  }

  /** Multi-objective score using the configured weights */
  score(pattern: Pattern): number {
    return calculateWeightedScore(
      pattern.components.map((slot) => slot.component),
      this.config.scoring.weights
    );
  }
}

export function createLoom(options: LoomOptions): Loom {
  return new Loom(options);
}

/**
 * Load the project config, build a Loom and load its catalog.
 */
export async function openLoom(
  projectRoot: string,
  options: OpenLoomOptions = {}
): Promise<{ loom: Loom; report: LoadReport }> {
  const config = await loadConfig(projectRoot, options.configPath);
  const loom = createLoom({ projectRoot, config, logger: options.logger });
  const report = loom.loadCatalog();
  return { loom, report };
}
