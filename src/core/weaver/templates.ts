/**
 * @arch patternloom.core.domain
 *
 * Pattern templates. Domain templates run only for their detected domain;
 * the full-stack and minimal templates run for every intent. No template
 * places the same component twice.
 */
import { componentKey, type Capability, type Component } from '../catalog/index.js';
import { Pattern } from '../patterns/index.js';
import type { Domain } from './domains.js';
import { roleForCapability } from './roles.js';
import type { CapabilityMatches, PatternTemplate } from './types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * First candidate matching the earliest preferred name.
 */
export function pickByName(
  candidates: readonly Component[],
  ...names: string[]
): Component | undefined {
  for (const name of names) {
    const key = componentKey(name);
    const found = candidates.find((candidate) => componentKey(candidate.name) === key);
    if (found) return found;
  }
  return undefined;
}

function matchesFor(matches: CapabilityMatches, capability: Capability): readonly Component[] {
  return matches.get(capability) ?? [];
}

function top(matches: CapabilityMatches, capability: Capability): Component | undefined {
  return matchesFor(matches, capability)[0];
}

// ---------------------------------------------------------------------------
// Domain templates
// ---------------------------------------------------------------------------

export const cmsTemplate: PatternTemplate = ({ intent, matches }) => {
  const frameworks = matchesFor(matches, 'web_framework');
  const databases = matchesFor(matches, 'database');
  const framework = pickByName(frameworks, 'Django', 'FastAPI') ?? frameworks[0];
  const postgres = pickByName(databases, 'PostgreSQL');
  const database =
    postgres && postgres !== framework
      ? postgres
      : databases.find((candidate) => candidate !== framework);
  if (!framework || !database) return null;

  const pattern = new Pattern({
    name: 'Modern Content Management System',
    description: 'Complete CMS with authentication, media storage, and search',
    intent,
    tags: ['cms', 'content', 'publishing', 'media'],
  });
  pattern.addComponent(framework, 'CMS Framework');
  pattern.addComponent(database, 'Content Database');

  const auth = top(matches, 'authentication');
  if (auth && !pattern.hasComponent(auth.name)) {
    pattern.addComponent(auth, 'Authentication & User Management');
  }
  const storage = top(matches, 'storage');
  if (storage && !pattern.hasComponent(storage.name)) {
    pattern.addComponent(storage, 'Media & File Storage');
  }
  const search = top(matches, 'search');
  if (search && !pattern.hasComponent(search.name)) {
    pattern.addComponent(search, 'Content Search Engine');
  }
  const redis = pickByName(matchesFor(matches, 'cache'), 'Redis');
  if (redis && !pattern.hasComponent(redis.name)) {
    pattern.addComponent(redis, 'Content Cache');
  }

  return pattern;
};

export const ecommerceTemplate: PatternTemplate = ({ intent, matches }) => {
  const framework = top(matches, 'web_framework');
  const database = matchesFor(matches, 'database').find((candidate) => candidate !== framework);
  if (!framework || !database) return null;

  const pattern = new Pattern({
    name: 'E-commerce Platform',
    description: 'Scalable online store with inventory, cart, orders, and payments',
    intent,
    tags: ['ecommerce', 'store', 'retail', 'payments'],
  });
  pattern.addComponent(framework, 'Store Frontend & API');
  pattern.addComponent(database, 'Product & Order Database');

  const cache = top(matches, 'cache');
  if (cache && !pattern.hasComponent(cache.name)) {
    pattern.addComponent(cache, 'Session & Catalog Cache');
  }
  const queue = top(matches, 'message_queue');
  if (queue && !pattern.hasComponent(queue.name)) {
    pattern.addComponent(queue, 'Order Processing Queue');
  }
  const monitoring = top(matches, 'monitoring');
  if (monitoring && !pattern.hasComponent(monitoring.name)) {
    pattern.addComponent(monitoring, 'Store Analytics');
  }

  return pattern;
};

export const analyticsTemplate: PatternTemplate = ({ intent, matches }) => {
  const pattern = new Pattern({
    name: 'Real-time Analytics Dashboard',
    description: 'Data processing pipeline with visualization and monitoring',
    intent,
    tags: ['analytics', 'dashboard', 'metrics', 'visualization'],
  });

  const kafka = pickByName(matchesFor(matches, 'message_queue'), 'Apache_Kafka', 'Kafka');
  if (kafka) pattern.addComponent(kafka, 'Data Ingestion Pipeline');
  const databases = matchesFor(matches, 'database');
  const database = pickByName(databases, 'MongoDB') ?? databases[0];
  if (database && !pattern.hasComponent(database.name)) {
    pattern.addComponent(database, 'Analytics Data Store');
  }
  const grafana = pickByName(matchesFor(matches, 'monitoring'), 'Grafana');
  if (grafana && !pattern.hasComponent(grafana.name)) {
    pattern.addComponent(grafana, 'Dashboard & Visualization');
  }

  return pattern.size > 0 ? pattern : null;
};

export const DOMAIN_TEMPLATES: Readonly<Record<Domain, PatternTemplate>> = {
  cms: cmsTemplate,
  ecommerce: ecommerceTemplate,
  analytics: analyticsTemplate,
};

// ---------------------------------------------------------------------------
// Generic templates
// ---------------------------------------------------------------------------

/**
 * FastAPI + PostgreSQL when both matched, else the top framework with the
 * top database that is not the same component.
 */
export const fullStackTemplate: PatternTemplate = ({ intent, matches }) => {
  const frameworks = matchesFor(matches, 'web_framework');
  const databases = matchesFor(matches, 'database');
  const fastapi = pickByName(frameworks, 'FastAPI');
  const postgres = pickByName(databases, 'PostgreSQL');

  let pattern: Pattern;
  if (fastapi && postgres) {
    pattern = new Pattern({
      name: 'Full Stack Python API',
      description: 'Production-ready web API with PostgreSQL database',
      intent,
      tags: ['production', 'python', 'api', 'database'],
    });
    pattern.addComponent(fastapi, 'API Framework');
    pattern.addComponent(postgres, 'Primary Database');
  } else {
    const framework = frameworks[0];
    const database = databases.find((candidate) => candidate !== framework);
    if (!framework || !database) return null;
    pattern = new Pattern({
      name: 'Full Stack Web Application',
      description: `Web application on ${framework.name} backed by ${database.name}`,
      intent,
      tags: ['production', 'web', 'database'],
    });
    pattern.addComponent(framework, 'Web Framework');
    pattern.addComponent(database, 'Primary Database');
  }

  const caches = matchesFor(matches, 'cache');
  const cache = pickByName(caches, 'Redis') ?? caches[0];
  if (cache && !pattern.hasComponent(cache.name)) {
    pattern.addComponent(cache, 'Cache & Session Store');
  }
  const orm = pickByName(databases, 'SQLAlchemy');
  if (orm && !pattern.hasComponent(orm.name)) {
    pattern.addComponent(orm, 'ORM & Data Layer');
  }

  return pattern;
};

/**
 * The top component of every matched capability, in request order.
 * A component already placed for an earlier capability is not repeated.
 */
export const minimalTemplate: PatternTemplate = ({ intent, matches }) => {
  const pattern = new Pattern({
    name: 'Minimal Viable Architecture',
    description: 'Minimal components to satisfy all requirements',
    intent,
    tags: ['minimal', 'simple', 'beginner'],
  });

  for (const [capability, components] of matches) {
    const best = components[0];
    if (best && !pattern.hasComponent(best.name)) {
      pattern.addComponent(best, roleForCapability(capability));
    }
  }

  return pattern.size > 0 ? pattern : null;
};
