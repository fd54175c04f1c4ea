/**
 * @arch patternloom.test.unit
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { writeFileSync } from 'node:fs';
import { PatternAuditor, passes } from '../../../../src/core/auditor/index.js';
import { Pattern } from '../../../../src/core/patterns/index.js';
import type { KnowledgeGraph } from '../../../../src/core/graph/index.js';
import { ErrorCodes, PatternError, TransformationError } from '../../../../src/utils/errors.js';
import { createSilentLogger } from '../../../../src/utils/logger.js';
import { createTempDir, loadFixtureGraph, removeTempDir } from '../../../helpers/graph.js';

describe('PatternAuditor', () => {
  let dir: string;
  let graph: KnowledgeGraph;
  let auditor: PatternAuditor;

  beforeEach(() => {
    dir = createTempDir();
    graph = loadFixtureGraph(dir);
    auditor = new PatternAuditor(graph, { logger: createSilentLogger() });
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function build(name: string, componentNames: string[]): Pattern {
    const pattern = new Pattern({ name });
    for (const componentName of componentNames) {
      const component = graph.getComponent(componentName);
      if (!component) throw new Error(`fixture missing ${componentName}`);
      pattern.addComponent(component, componentName);
    }
    return pattern;
  }

  it('should report exactly one error for a lone web framework', () => {
    const findings = auditor.audit(build('API', ['FastAPI']));

    expect(findings).toEqual([
      {
        category: 'security',
        severity: 'error',
        components: ['FastAPI'],
        message: 'Missing authentication component in web application',
        recommendation: 'Add an authentication service (Keycloak, Ory Kratos, etc.)',
        evidence: 'Web framework present without authentication',
      },
    ]);
    expect(passes(findings)).toBe(false);
  });

  it('should find nothing in a well-formed stack', () => {
    const findings = auditor.audit(
      build('Healthy', ['Django', 'PostgreSQL', 'Redis', 'Keycloak', 'Prometheus'])
    );

    expect(findings).toEqual([]);
    expect(auditor.passes(findings)).toBe(true);
  });

  it('should run every check in the standard order', () => {
    const findings = auditor.audit(build('Legacy', ['Express', 'SQLAlchemy', 'MySQL', 'Grafana']));

    expect(findings.map((f) => [f.category, f.severity, f.message.split(':')[0]])).toEqual([
      ['compatibility', 'error', 'Incompatible components'],
      ['license', 'warning', 'Restrictive license detected'],
      ['license', 'warning', 'Potential GPL license contamination risk'],
      ['security', 'warning', 'Low average security score'],
      ['security', 'error', 'Missing authentication component in web application'],
      ['redundancy', 'info', 'Multiple databases detected'],
      ['best-practice', 'info', 'Database present without caching layer'],
    ]);

    expect(findings[0]).toMatchObject({
      components: ['Express', 'SQLAlchemy'],
      message: 'Incompatible components: Express and SQLAlchemy',
      evidence: 'different runtimes',
    });
    expect(findings[1]).toMatchObject({
      components: ['Grafana'],
      message: 'Restrictive license detected: AGPL',
      evidence: 'Affects: Grafana',
    });
    expect(findings[2]).toMatchObject({
      components: ['Express', 'SQLAlchemy', 'MySQL', 'Grafana'],
      evidence: 'Mixed licenses: MIT, GPL, AGPL',
    });
    expect(findings[3]).toMatchObject({
      components: ['Express'],
      evidence: 'Components: Express (0.60)',
    });
    expect(findings[5]).toMatchObject({
      components: ['SQLAlchemy', 'MySQL'],
      message: 'Multiple databases detected: 2',
    });
    expect(findings[6]?.evidence).toBe('Database components: SQLAlchemy, MySQL');
  });

  it('should warn about weak compatibility edges', () => {
    const findings = auditor.audit(build('Cached API', ['FastAPI', 'Redis']), {
      checks: ['compatibility'],
    });

    expect(findings).toEqual([
      {
        category: 'compatibility',
        severity: 'warning',
        components: ['FastAPI', 'Redis'],
        message: 'Low compatibility confidence (0.60) between FastAPI and Redis',
        recommendation: 'Consider alternative pairings or verify integration',
        evidence: 'community integration',
      },
    ]);
    expect(passes(findings)).toBe(true);
  });

  it('should flag capabilities provided twice', () => {
    const findings = auditor.audit(build('Queues', ['RabbitMQ', 'Apache_Kafka']), {
      checks: ['redundancy'],
    });

    expect(findings).toEqual([
      {
        category: 'redundancy',
        severity: 'warning',
        components: ['RabbitMQ', 'Apache_Kafka'],
        message: 'Multiple components providing same capability: message_queue',
        recommendation: 'Consider consolidating message_queue functionality',
        evidence: 'Provided by: RabbitMQ, Apache_Kafka',
      },
    ]);
  });

  it('should suggest monitoring for larger patterns without it', () => {
    const findings = auditor.audit(build('Stack', ['Django', 'Redis', 'Keycloak']), {
      checks: ['best-practice'],
    });

    expect(findings).toEqual([
      {
        category: 'best-practice',
        severity: 'info',
        components: [],
        message: 'No monitoring/observability components',
        recommendation: 'Add monitoring (Prometheus) and visualization (Grafana)',
        evidence: 'Current components: Django, Redis, Keycloak',
      },
    ]);
  });

  it('should return the same findings on repeated audits', () => {
    const pattern = build('Legacy', ['Express', 'SQLAlchemy', 'MySQL', 'Grafana']);

    const first = auditor.audit(pattern);
    const second = auditor.audit(pattern);

    expect(second).toEqual(first);
    expect(pattern.componentNames()).toEqual(['Express', 'SQLAlchemy', 'MySQL', 'Grafana']);
  });

  it('should find nothing in an empty pattern', () => {
    expect(auditor.audit(new Pattern({ name: 'Empty' }))).toEqual([]);
  });

  describe('check selection', () => {
    it('should accept underscores and any case, keeping the standard order', () => {
      const findings = auditor.audit(build('Legacy', ['Express', 'SQLAlchemy', 'MySQL', 'Grafana']), {
        checks: ['best_practice', 'SECURITY'],
      });

      expect(findings.map((f) => f.category)).toEqual([
        'security',
        'security',
        'best-practice',
      ]);
    });

    it('should reject unknown check names', () => {
      const pattern = build('API', ['FastAPI']);

      expect(() => auditor.audit(pattern, { checks: ['speed'] })).toThrow(TransformationError);
      expect(() => auditor.audit(pattern, { checks: ['speed'] })).toThrow(
        "Unknown audit check: 'speed'. Expected one of: compatibility, license, security, redundancy, best-practice"
      );
    });
  });

  describe('auditFile', () => {
    it('should skip unknown components and report them', async () => {
      const file = join(dir, 'pattern.json');
      writeFileSync(
        file,
        JSON.stringify({
          name: 'Saved',
          description: 'From disk',
          components: [
            { name: 'fastapi', role: 'API' },
            { name: 'Nonexistent', role: 'Mystery' },
          ],
          tags: [],
        })
      );

      const result = await auditor.auditFile(file);

      expect(result.pattern.componentNames()).toEqual(['FastAPI']);
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0]).toMatchObject({
        code: ErrorCodes.NOT_FOUND,
        entry: 'Nonexistent',
      });
      expect(result.findings.map((f) => f.message)).toEqual([
        'Missing authentication component in web application',
      ]);
    });

    it('should throw for a missing file', async () => {
      await expect(auditor.auditFile(join(dir, 'absent.json'))).rejects.toBeInstanceOf(PatternError);
    });

    it('should validate check names before reading the file', async () => {
      await expect(
        auditor.auditFile(join(dir, 'absent.json'), { checks: ['nope'] })
      ).rejects.toBeInstanceOf(TransformationError);
    });
  });
});
