/**
 * @arch patternloom.core.domain
 *
 * make-scalable: cache and message queue for web applications.
 */
import type { Component } from '../../catalog/index.js';
import type { CatalogReader } from '../../graph/index.js';
import { computeMetrics, type Pattern } from '../../patterns/index.js';
import { PREFERRED_CACHE, PREFERRED_QUEUES } from '../tables.js';
import type { Transformation } from '../types.js';
import { best } from './helpers.js';

function pickCache(graph: CatalogReader): Component | undefined {
  return graph.resolveComponent(PREFERRED_CACHE) ?? best(graph.findByCapability('cache'), 'popularityScore');
}

function pickQueue(graph: CatalogReader): { component: Component; role: string } | undefined {
  const queue = graph.resolveComponent(PREFERRED_QUEUES.queue);
  if (queue) return { component: queue, role: 'Message Queue for Async Processing' };
  const streaming = graph.resolveComponent(PREFERRED_QUEUES.streaming);
  if (streaming) return { component: streaming, role: 'Event Streaming Platform' };
  const fallback = best(graph.findByCapability('message_queue'), 'popularityScore');
  return fallback ? { component: fallback, role: 'Message Queue for Async Processing' } : undefined;
}

export const scaleOut: Transformation = {
  name: 'make-scalable',
  aliases: ['scale-out'],
  metric: 'complexity',

  apply(source: Pattern, graph: CatalogReader) {
    const pattern = source.clone({
      name: `${source.name} (Scalable)`,
      description: `${source.description} - Enhanced for scalability`,
    });
    const notes: string[] = [];

    // Conditions read the source so one rule's addition cannot trigger another
    const hasDatabase = source.hasCapability('database');
    const hasWeb = source.hasCapability('web_framework');

    if (hasDatabase) {
      notes.push('Database scalability enhanced');
    }

    if (hasDatabase && hasWeb && !source.hasCapability('cache')) {
      const cache = pickCache(graph);
      if (cache && !pattern.hasComponent(cache.name)) {
        pattern.addComponent(cache, 'Cache & Session Storage');
        notes.push(`Added ${cache.name} caching layer for performance`);
      }
    }

    if (hasWeb && !source.hasCapability('message_queue')) {
      const queue = pickQueue(graph);
      if (queue && !pattern.hasComponent(queue.component.name)) {
        pattern.addComponent(queue.component, queue.role);
        notes.push(`Added ${queue.component.name} for async processing`);
      }
    }

    if (notes.length > 0) {
      pattern.description += `. Applied: ${notes.join(', ')}`;
      pattern.addTags('scalable', 'evolved');
      pattern.addNotes(...notes);
    }
    return { pattern, notes };
  },

  measure(pattern, graph) {
    return computeMetrics(pattern, graph).complexity;
  },

  delta(before, after) {
    return after - before;
  },
};
