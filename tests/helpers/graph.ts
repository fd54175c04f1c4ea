/**
 * @arch patternloom.test.helper
 *
 * Temp-dir graphs for tests. Nothing here touches the real project catalog.
 */
import { copyFileSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  createComponent,
  createRelationship,
  type ComponentInput,
  type RelationshipInput,
} from '../../src/core/catalog/index.js';
import { KnowledgeGraph } from '../../src/core/graph/index.js';
import { createSilentLogger } from '../../src/utils/logger.js';

export const FIXTURE_CATALOG = fileURLToPath(new URL('../fixtures/catalog.json', import.meta.url));
export const FIXTURE_RELATIONSHIPS = fileURLToPath(
  new URL('../fixtures/relationships.json', import.meta.url)
);

export function createTempDir(prefix = 'patternloom-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Empty graph whose snapshots live in `dir`.
 */
export function createEmptyGraph(dir: string): KnowledgeGraph {
  return new KnowledgeGraph({
    componentsPath: join(dir, 'catalog.json'),
    relationshipsPath: join(dir, 'relationships.json'),
    logger: createSilentLogger(),
  });
}

/**
 * Graph holding exactly the given components and relationships.
 */
export function createTestGraph(
  dir: string,
  components: ComponentInput[],
  relationships: RelationshipInput[] = []
): KnowledgeGraph {
  const graph = createEmptyGraph(dir);
  for (const input of components) {
    graph.addComponent(createComponent(input));
  }
  for (const input of relationships) {
    const result = graph.addRelationship(createRelationship(input));
    if (!result.added) {
      throw new Error(result.diagnostic.message);
    }
  }
  return graph;
}

/**
 * Graph loaded from the shared fixture catalog (18 components, 7 relationships).
 */
export function loadFixtureGraph(dir: string): KnowledgeGraph {
  copyFileSync(FIXTURE_CATALOG, join(dir, 'catalog.json'));
  copyFileSync(FIXTURE_RELATIONSHIPS, join(dir, 'relationships.json'));
  const graph = createEmptyGraph(dir);
  graph.load();
  return graph;
}
