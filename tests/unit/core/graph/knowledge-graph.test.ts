/**
 * @arch patternloom.test.unit
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createComponent, createRelationship } from '../../../../src/core/catalog/index.js';
import { CatalogError, ErrorCodes } from '../../../../src/utils/errors.js';
import {
  createEmptyGraph,
  createTempDir,
  createTestGraph,
  loadFixtureGraph,
  removeTempDir,
} from '../../../helpers/graph.js';

describe('KnowledgeGraph', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe('load', () => {
    it('should load the fixture catalog', () => {
      const graph = createEmptyGraph(dir);
      loadFixtureGraph(dir);

      const report = graph.load();

      expect(report).toEqual({
        componentsLoaded: 18,
        componentsSkipped: 0,
        relationshipsLoaded: 7,
        relationshipsSkipped: 0,
        diagnostics: [],
      });
      expect(graph.size).toBe(18);
    });

    it('should report a missing catalog and start empty', () => {
      const graph = createEmptyGraph(dir);

      const report = graph.load();

      expect(report.componentsLoaded).toBe(0);
      expect(report.diagnostics).toEqual([
        {
          code: ErrorCodes.NOT_FOUND,
          message: `Catalog file not found: ${join(dir, 'catalog.json')}`,
          file: join(dir, 'catalog.json'),
        },
      ]);
    });

    it('should accept the list form', () => {
      writeFileSync(
        join(dir, 'catalog.json'),
        JSON.stringify([{ name: 'Redis', capabilities: ['cache'] }])
      );
      const graph = createEmptyGraph(dir);

      expect(graph.load().componentsLoaded).toBe(1);
      expect(graph.getComponent('Redis')?.capabilities).toEqual(['cache']);
    });

    it('should skip malformed entries and keep the rest', () => {
      writeFileSync(
        join(dir, 'catalog.json'),
        JSON.stringify({
          Redis: { capabilities: ['cache'] },
          Broken: { security_score: 3 },
          Odd: 'not an object',
        })
      );
      const graph = createEmptyGraph(dir);

      const report = graph.load();

      expect(report.componentsLoaded).toBe(1);
      expect(report.componentsSkipped).toBe(2);
      expect(report.diagnostics.map((d) => d.entry)).toEqual(['Broken', 'Odd']);
      expect(report.diagnostics[0]?.message).toContain('Skipped catalog entry Broken in');
    });

    it('should skip relationships with unknown endpoints', () => {
      writeFileSync(join(dir, 'catalog.json'), JSON.stringify({ A: {}, B: {} }));
      writeFileSync(
        join(dir, 'relationships.json'),
        JSON.stringify({
          schema_version: 1,
          relationships: [
            { source: 'A', target: 'B', type: 'uses' },
            { source: 'A', target: 'Ghost', type: 'uses' },
            { source: 'A', target: 'B', type: 'teleports' },
          ],
        })
      );
      const graph = createEmptyGraph(dir);

      const report = graph.load();

      expect(report.relationshipsLoaded).toBe(1);
      expect(report.relationshipsSkipped).toBe(2);
      expect(report.diagnostics[0]).toMatchObject({
        code: ErrorCodes.NOT_FOUND,
        message: "Target component 'Ghost' not found; relationship A -> Ghost ignored",
      });
      expect(report.diagnostics[1]?.code).toBe(ErrorCodes.MALFORMED_ENTRY);
    });

    it('should accept a bare relationship list', () => {
      writeFileSync(join(dir, 'catalog.json'), JSON.stringify({ A: {}, B: {} }));
      writeFileSync(
        join(dir, 'relationships.json'),
        JSON.stringify([{ source: 'A', target: 'B', relationship_type: 'depends_on' }])
      );
      const graph = createEmptyGraph(dir);
      graph.load();

      expect(graph.getEdge('A', 'B')?.type).toBe('depends_on');
    });

    it('should throw CatalogError for unparseable JSON', () => {
      writeFileSync(join(dir, 'catalog.json'), '{');
      const graph = createEmptyGraph(dir);

      expect(() => graph.load()).toThrow(CatalogError);
    });

    it('should throw CatalogError for a scalar catalog', () => {
      writeFileSync(join(dir, 'catalog.json'), '42');
      const graph = createEmptyGraph(dir);

      expect(() => graph.load()).toThrow('is neither a name-keyed map nor a list of components');
    });

    it('should replace previous in-memory state', () => {
      const graph = createTestGraph(dir, [{ name: 'A' }]);
      writeFileSync(join(dir, 'catalog.json'), JSON.stringify({ B: {} }));

      graph.load();

      expect(graph.getAllComponents().map((c) => c.name)).toEqual(['B']);
    });
  });

  describe('persistence', () => {
    it('should write through on addComponent', () => {
      const graph = createEmptyGraph(dir);

      graph.addComponent(createComponent({ name: 'Redis', capabilities: ['cache'] }));

      const written: unknown = JSON.parse(readFileSync(join(dir, 'catalog.json'), 'utf-8'));
      expect(written).toMatchObject({ Redis: { capabilities: ['cache'], github_url: null } });
    });

    it('should round-trip through a fresh graph', () => {
      createTestGraph(
        dir,
        [{ name: 'A', popularityScore: 0.3 }, { name: 'B' }],
        [{ source: 'A', target: 'B', type: 'compatible_with', strength: 0.4, evidence: 'docs' }]
      );

      const reloaded = createEmptyGraph(dir);
      reloaded.load();

      expect(reloaded.getComponent('A')?.popularityScore).toBe(0.3);
      expect(reloaded.getEdge('A', 'B')).toEqual({
        source: 'A',
        target: 'B',
        type: 'compatible_with',
        strength: 0.4,
        evidence: 'docs',
      });
    });

    it('should write the versioned relationship format', () => {
      createTestGraph(dir, [{ name: 'A' }, { name: 'B' }], [
        { source: 'A', target: 'B', type: 'uses' },
      ]);

      const written: unknown = JSON.parse(readFileSync(join(dir, 'relationships.json'), 'utf-8'));
      expect(written).toEqual({
        schema_version: 1,
        relationships: [{ source: 'A', target: 'B', type: 'uses', strength: 1, evidence: null }],
      });
    });

    it('should delete both snapshots on clear', () => {
      const graph = createTestGraph(dir, [{ name: 'A' }]);

      graph.clear();

      expect(graph.size).toBe(0);
      expect(existsSync(join(dir, 'catalog.json'))).toBe(false);
      expect(existsSync(join(dir, 'relationships.json'))).toBe(false);
    });
  });

  describe('addComponent / addRelationship', () => {
    it('should overwrite a component with the same name', () => {
      const graph = createTestGraph(dir, [{ name: 'A', description: 'old' }]);

      graph.addComponent(createComponent({ name: 'A', description: 'new' }));

      expect(graph.size).toBe(1);
      expect(graph.getComponent('A')?.description).toBe('new');
    });

    it('should keep one edge per ordered pair', () => {
      const graph = createTestGraph(dir, [{ name: 'A' }, { name: 'B' }], [
        { source: 'A', target: 'B', type: 'uses' },
        { source: 'A', target: 'B', type: 'depends_on', strength: 0.5 },
      ]);

      expect(graph.getRelationships()).toEqual([
        { source: 'A', target: 'B', type: 'depends_on', strength: 0.5, evidence: undefined },
      ]);
    });

    it('should keep both directions as separate edges', () => {
      const graph = createTestGraph(dir, [{ name: 'A' }, { name: 'B' }], [
        { source: 'A', target: 'B', type: 'uses' },
        { source: 'B', target: 'A', type: 'compatible_with' },
      ]);

      expect(graph.getRelationships()).toHaveLength(2);
    });

    it('should refuse an edge to an unknown component', () => {
      const graph = createTestGraph(dir, [{ name: 'A' }]);

      const result = graph.addRelationship(
        createRelationship({ source: 'Ghost', target: 'A', type: 'uses' })
      );

      expect(result).toEqual({
        added: false,
        diagnostic: {
          code: ErrorCodes.NOT_FOUND,
          message: "Source component 'Ghost' not found; relationship Ghost -> A ignored",
          entry: 'Ghost -> A',
        },
      });
      expect(graph.getRelationships()).toEqual([]);
    });
  });

  describe('queries', () => {
    it('should look up names exactly, then case-insensitively', () => {
      const graph = loadFixtureGraph(dir);

      expect(graph.getComponent('Redis')?.name).toBe('Redis');
      expect(graph.getComponent('redis')?.name).toBe('Redis');
      expect(graph.getComponent('Apache Kafka')).toBeUndefined();
      expect(graph.resolveComponent('apache kafka')?.name).toBe('Apache_Kafka');
      expect(graph.resolveComponent('Nope')).toBeUndefined();
    });

    it('should find components by capability in catalog order', () => {
      const graph = loadFixtureGraph(dir);

      expect(graph.findByCapability('web_framework').map((c) => c.name)).toEqual([
        'Django',
        'FastAPI',
        'Express',
      ]);
      expect(graph.findByCapability('vector_db')).toEqual([]);
    });

    it('should follow typed outgoing edges', () => {
      const graph = loadFixtureGraph(dir);

      expect(graph.getCompatibleComponents('FastAPI')).toEqual(['PostgreSQL', 'Redis']);
      expect(graph.findAlternatives('Elasticsearch')).toEqual(['Apache_Solr']);
      expect(graph.findAlternatives('Apache_Solr')).toEqual([]);
    });

    it('should list connections among a set of names in both directions', () => {
      const graph = loadFixtureGraph(dir);

      const connections = graph.getConnections(['FastAPI', 'PostgreSQL', 'Django']);

      expect(connections.map((e) => `${e.source}->${e.target}`)).toEqual([
        'FastAPI->PostgreSQL',
        'PostgreSQL->FastAPI',
        'Django->PostgreSQL',
      ]);
    });
  });

  describe('search', () => {
    it('should weight name, description and capability matches', () => {
      const graph = createTestGraph(dir, [
        { name: 'CacheBox', description: 'cache server', capabilities: ['cache'] },
        { name: 'Other', description: 'a cache' },
        { name: 'Plain', capabilities: ['cache'] },
        { name: 'Unrelated' },
      ]);

      const results = graph.search('CACHE');

      expect(results.map((r) => r.component.name)).toEqual(['CacheBox', 'Other', 'Plain']);
      expect(results[0]?.score).toBeCloseTo(1.0);
      expect(results[1]?.score).toBeCloseTo(0.3);
      expect(results[2]?.score).toBeCloseTo(0.2);
    });

    it('should return nothing for a blank query', () => {
      const graph = loadFixtureGraph(dir);

      expect(graph.search('   ')).toEqual([]);
    });
  });

  describe('getStats', () => {
    it('should count components, edges and capabilities', () => {
      const graph = loadFixtureGraph(dir);

      const stats = graph.getStats();

      expect(stats.components).toBe(18);
      expect(stats.relationships).toBe(7);
      expect(stats.byCapability.web_framework).toBe(3);
      expect(stats.byCapability.database).toBe(4);
      expect(stats.byRelationshipType).toEqual({
        compatible_with: 4,
        incompatible_with: 1,
        alternative_to: 2,
      });
      expect(stats.capabilityCoverage).toBe(12);
    });
  });
});
