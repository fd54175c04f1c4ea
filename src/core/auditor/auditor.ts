/**
 * @arch patternloom.core.engine
 *
 * Runs independent audit checks over a pattern. Nothing is mutated, so
 * auditing the same pattern twice gives the same findings.
 */
import { ErrorCodes, TransformationError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { CatalogReader } from '../graph/index.js';
import { loadPattern, type Pattern } from '../patterns/index.js';
import {
  bestPracticeCheck,
  compatibilityCheck,
  licenseCheck,
  redundancyCheck,
  securityCheck,
} from './checks/index.js';
import type {
  AuditCheck,
  AuditFileResult,
  AuditFinding,
  AuditOptions,
  PatternAuditorOptions,
} from './types.js';
import { isFailingSeverity } from './types.js';

// ---------------------------------------------------------------------------
// All registered checks, in run order
// ---------------------------------------------------------------------------

const ALL_CHECKS: AuditCheck[] = [
  compatibilityCheck,
  licenseCheck,
  securityCheck,
  redundancyCheck,
  bestPracticeCheck,
];

/**
 * True when no finding is an error or critical. Warnings never fail.
 */
export function passes(findings: readonly AuditFinding[]): boolean {
  return !findings.some((finding) => isFailingSeverity(finding.severity));
}

export class PatternAuditor {
  private readonly log: Logger;

  constructor(
    private readonly graph: CatalogReader,
    options: PatternAuditorOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger.child('auditor');
  }

  audit(pattern: Pattern, options: AuditOptions = {}): AuditFinding[] {
    const checks = this.selectChecks(options.checks);
    const findings: AuditFinding[] = [];
    for (const check of checks) {
      findings.push(...check.check({ pattern, graph: this.graph }));
    }
    this.log.debug(`Audited '${pattern.name}': ${findings.length} finding(s)`);
    return findings;
  }

  /**
   * Load a pattern file against the graph, then audit it.
   * Unresolvable components are skipped and returned as diagnostics.
   */
  async auditFile(filePath: string, options: AuditOptions = {}): Promise<AuditFileResult> {
    // Validate check names before touching the file
    this.selectChecks(options.checks);
    const { pattern, diagnostics } = await loadPattern(filePath, this.graph);
    for (const diagnostic of diagnostics) {
      this.log.warn(diagnostic.message);
    }
    return { pattern, findings: this.audit(pattern, options), diagnostics };
  }

  passes(findings: readonly AuditFinding[]): boolean {
    return passes(findings);
  }

  private selectChecks(names?: readonly string[]): AuditCheck[] {
    if (!names) return ALL_CHECKS;

    const wanted = new Set<string>();
    for (const name of names) {
      const key = name.trim().toLowerCase().replace(/_/g, '-');
      if (!ALL_CHECKS.some((check) => check.id === key)) {
        throw new TransformationError(
          ErrorCodes.UNKNOWN_AUDIT_CHECK,
          `Unknown audit check: '${name}'. Expected one of: ${ALL_CHECKS.map((c) => c.id).join(', ')}`,
          { name }
        );
      }
      wanted.add(key);
    }
    return ALL_CHECKS.filter((check) => wanted.has(check.id));
  }
}
