/**
 * @arch patternloom.core.engine
 *
 * Applies named transformations to patterns. Input patterns are never
 * modified; each step returns a new pattern plus a before/after report.
 */
import {
  ConstraintError,
  ErrorCodes,
  TransformationError,
} from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { CatalogReader } from '../graph/index.js';
import type { Pattern } from '../patterns/index.js';
import { costOptimize, harden, scaleOut } from './transformations/index.js';
import type {
  EvolutionChain,
  EvolutionResult,
  PatternEvolverOptions,
  Transformation,
  TransformationName,
} from './types.js';

// ---------------------------------------------------------------------------
// Registered transformations
// ---------------------------------------------------------------------------

const ALL_TRANSFORMATIONS: Transformation[] = [scaleOut, harden, costOptimize];

function normalizeKey(name: string): string {
  return name.trim().toLowerCase().replace(/_/g, '-');
}

const BY_NAME = new Map<string, Transformation>();
for (const transformation of ALL_TRANSFORMATIONS) {
  for (const name of [transformation.name, ...transformation.aliases]) {
    BY_NAME.set(normalizeKey(name), transformation);
  }
}

/**
 * Canonical name for a transformation or one of its aliases
 * (`"Scale_Out"` -> `"make-scalable"`); null when unknown.
 */
export function normalizeTransformationName(name: string): TransformationName | null {
  return BY_NAME.get(normalizeKey(name))?.name ?? null;
}

/**
 * Every accepted spelling, canonical names first.
 */
export function listTransformationNames(): string[] {
  return [
    ...ALL_TRANSFORMATIONS.map((t) => t.name),
    ...ALL_TRANSFORMATIONS.flatMap((t) => t.aliases),
  ];
}

// ---------------------------------------------------------------------------
// Evolver
// ---------------------------------------------------------------------------

export class PatternEvolver {
  private readonly log: Logger;

  constructor(
    private readonly graph: CatalogReader,
    options: PatternEvolverOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger.child('evolver');
  }

  evolve(pattern: Pattern, name: string): Pattern {
    return this.evolveWithReport(pattern, name).pattern;
  }

  evolveWithReport(pattern: Pattern, name: string): EvolutionResult {
    return this.run(pattern, this.resolve(name));
  }

  /**
   * Apply transformations in order, each to the previous result.
   * All names are checked before the first one runs.
   */
  evolveAll(pattern: Pattern, names: readonly string[]): EvolutionChain {
    if (names.length === 0) {
      throw new ConstraintError(
        ErrorCodes.EMPTY_EVOLUTIONS,
        'At least one evolution must be requested',
        { pattern: pattern.name }
      );
    }
    const transformations = names.map((name) => this.resolve(name));

    const steps: EvolutionResult[] = [];
    let current = pattern;
    for (const transformation of transformations) {
      const step = this.run(current, transformation);
      steps.push(step);
      current = step.pattern;
    }
    return { pattern: current, steps };
  }

  private resolve(name: string): Transformation {
    const transformation = BY_NAME.get(normalizeKey(name));
    if (!transformation) {
      throw new TransformationError(
        ErrorCodes.UNKNOWN_TRANSFORMATION,
        `Unknown evolution type: '${name}'. Expected one of: ${listTransformationNames().join(', ')}`,
        { name }
      );
    }
    return transformation;
  }

  private run(pattern: Pattern, transformation: Transformation): EvolutionResult {
    const { pattern: evolved, notes } = transformation.apply(pattern, this.graph);
    const before = transformation.measure(pattern, this.graph);
    const after = transformation.measure(evolved, this.graph);

    if (notes.length === 0) {
      this.log.debug(`${transformation.name}: no rule applied to '${pattern.name}'`);
    } else {
      this.log.debug(`${transformation.name}: ${notes.length} change(s) to '${pattern.name}'`);
    }

    return {
      pattern: evolved,
      transformation: transformation.name,
      notes,
      metric: transformation.metric,
      before,
      after,
      delta: transformation.delta(before, after),
    };
  }
}
