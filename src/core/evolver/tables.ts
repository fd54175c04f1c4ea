/**
 * @arch patternloom.core.domain
 *
 * Fixed component tables used by the transformations. Names are looked up
 * through the graph, so spelling variants of catalog names still match.
 */

/** Component -> higher-security replacement. */
export const SECURITY_UPGRADES: Readonly<Record<string, string>> = {
  FastAPI: 'Django',
  MySQL: 'PostgreSQL',
  RabbitMQ: 'Apache_Kafka',
};

/** Heavier component -> lighter replacement. */
export const COST_DOWNGRADES: Readonly<Record<string, string>> = {
  Apache_Kafka: 'RabbitMQ',
  Elasticsearch: 'PostgreSQL',
  Keycloak: 'Ory_Kratos',
  Grafana: 'Prometheus',
};

/** Source-available component -> permissively licensed replacement. */
export const PERMISSIVE_ALTERNATIVES: Readonly<Record<string, string>> = {
  MongoDB: 'PostgreSQL',
  Elasticsearch: 'Apache_Solr',
  MySQL: 'PostgreSQL',
};

/** Components penalized by the cost heuristic. */
export const RESOURCE_INTENSIVE_COMPONENTS: readonly string[] = [
  'Apache_Kafka',
  'Elasticsearch',
  'Keycloak',
  'Apache_Spark',
];

export const PREFERRED_CACHE = 'Redis';
export const PREFERRED_QUEUES = { queue: 'RabbitMQ', streaming: 'Apache_Kafka' } as const;
export const MONITORING_COMPONENTS = { metrics: 'Prometheus', visualization: 'Grafana' } as const;

/**
 * Lookup in a name table, tolerant of case and space/underscore variants.
 */
export function lookupTable(
  table: Readonly<Record<string, string>>,
  name: string,
  keyOf: (name: string) => string
): string | undefined {
  const key = keyOf(name);
  for (const [from, to] of Object.entries(table)) {
    if (keyOf(from) === key) return to;
  }
  return undefined;
}
