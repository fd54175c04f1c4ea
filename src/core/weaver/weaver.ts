/**
 * @arch patternloom.core.engine
 *
 * Turns an intent into ranked candidate patterns. Reads the graph, never
 * writes it.
 */
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { Capability, Component, Intent } from '../catalog/index.js';
import type { CatalogReader } from '../graph/index.js';
import { computeMetrics, type Pattern } from '../patterns/index.js';
import { detectDomain } from './domains.js';
import { calculateWeightedScore } from './scoring.js';
import { DOMAIN_TEMPLATES, fullStackTemplate, minimalTemplate } from './templates.js';
import type {
  PatternTemplate,
  PatternWeaverOptions,
  ScoringWeights,
  TemplateContext,
  WeaveResult,
  WovenPattern,
} from './types.js';

const GENERIC_TEMPLATES: PatternTemplate[] = [fullStackTemplate, minimalTemplate];

export class PatternWeaver {
  private readonly log: Logger;
  private readonly weights?: Partial<ScoringWeights>;

  constructor(
    private readonly graph: CatalogReader,
    options: PatternWeaverOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger.child('weaver');
    this.weights = options.weights;
  }

  weave(intent: Intent): WeaveResult {
    const matches = this.matchCapabilities(intent.requiredCapabilities);
    const matchedCapabilities = [...matches.keys()];
    const missingCapabilities = intent.requiredCapabilities.filter(
      (capability) => !matches.has(capability)
    );
    if (missingCapabilities.length > 0) {
      this.log.debug(`No components for: ${missingCapabilities.join(', ')}`);
    }

    if (matches.size === 0) {
      return { patterns: [], matchedCapabilities, missingCapabilities };
    }

    const context: TemplateContext = { intent, matches };
    const templates: PatternTemplate[] = [];
    const domain = detectDomain(intent.description);
    if (domain) {
      this.log.debug(`Detected domain: ${domain}`);
      templates.push(DOMAIN_TEMPLATES[domain]);
    }
    templates.push(...GENERIC_TEMPLATES);

    const patterns: WovenPattern[] = [];
    for (const template of templates) {
      const pattern = template(context);
      if (pattern) {
        patterns.push(this.rank(pattern));
      }
    }

    // Array sort is stable: ties keep generation order
    patterns.sort((a, b) => b.metrics.confidence - a.metrics.confidence);
    this.log.debug(`Generated ${patterns.length} patterns`);

    return { patterns, matchedCapabilities, missingCapabilities };
  }

  /**
   * Matching components per capability, most popular first.
   * Capabilities without matches are left out.
   */
  matchCapabilities(capabilities: readonly Capability[]): Map<Capability, Component[]> {
    const matches = new Map<Capability, Component[]>();
    for (const capability of capabilities) {
      const found = this.graph.findByCapability(capability);
      if (found.length > 0) {
        matches.set(
          capability,
          [...found].sort((a, b) => b.popularityScore - a.popularityScore)
        );
      }
    }
    return matches;
  }

  private rank(pattern: Pattern): WovenPattern {
    return {
      pattern,
      metrics: computeMetrics(pattern, this.graph),
      score: calculateWeightedScore(
        pattern.components.map((slot) => slot.component),
        this.weights
      ),
    };
  }
}
