/**
 * @arch patternloom.core.domain
 *
 * Closed capability and relationship vocabularies with case-insensitive
 * resolution at the parsing boundary.
 */
import { ConstraintError, ErrorCodes } from '../../utils/errors.js';

export const CAPABILITIES = [
  // Commerce
  'payment',
  'billing',
  'subscription',
  'invoicing',
  // Messaging to people
  'email',
  'notification',
  'sms',
  'push',
  // Edge
  'load_balancer',
  'reverse_proxy',
  'cdn',
  // Web & API
  'web_framework',
  'api_gateway',
  'graphql',
  // Data storage
  'database',
  'cache',
  'storage',
  'object_storage',
  'search',
  'data_warehouse',
  // Messaging & streaming
  'message_queue',
  'streaming',
  'event_bus',
  // Security & identity
  'authentication',
  'authorization',
  'secrets',
  'high_security',
  // Observability
  'monitoring',
  'logging',
  'tracing',
  'metrics',
  // AI/ML
  'ai_model',
  'ml_framework',
  'ml_platform',
  'vector_db',
  // Infrastructure
  'container',
  'orchestration',
  'service_mesh',
  'infrastructure',
  'ci_cd',
  // Frontend
  'frontend',
  'ui_framework',
  'mobile',
  // Integration
  'message_broker',
  'esb',
  'workflow',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export const RELATIONSHIP_TYPES = [
  'uses',
  'compatible_with',
  'similar_to',
  'depends_on',
  'alternative_to',
  'extends',
  'incompatible_with',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

const CAPABILITY_SET: ReadonlySet<string> = new Set(CAPABILITIES);
const RELATIONSHIP_TYPE_SET: ReadonlySet<string> = new Set(RELATIONSHIP_TYPES);

/**
 * Lowercase and fold `-` and whitespace into `_`.
 */
function toTag(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function isCapability(value: string): value is Capability {
  return CAPABILITY_SET.has(value);
}

export function isRelationshipType(value: string): value is RelationshipType {
  return RELATIONSHIP_TYPE_SET.has(value);
}

/**
 * Resolve free text against the capability set.
 * `"Web Framework"`, `"web-framework"` and `"WEB_FRAMEWORK"` all resolve.
 */
export function parseCapability(value: string): Capability | null {
  const tag = toTag(value);
  return isCapability(tag) ? tag : null;
}

/**
 * Like parseCapability, but unknown input is a boundary error.
 */
export function requireCapability(value: string): Capability {
  const capability = parseCapability(value);
  if (!capability) {
    throw new ConstraintError(
      ErrorCodes.UNKNOWN_CAPABILITY,
      `Unknown capability: '${value}'`,
      { value, valid: [...CAPABILITIES] }
    );
  }
  return capability;
}

export function parseRelationshipType(value: string): RelationshipType | null {
  const tag = toTag(value);
  return isRelationshipType(tag) ? tag : null;
}

/**
 * Deduplicate capabilities, keeping first-seen order.
 */
export function uniqueCapabilities(capabilities: Iterable<Capability>): Capability[] {
  return [...new Set(capabilities)];
}

/**
 * `"web_framework"` -> `"Web Framework"`.
 */
export function titleCaseCapability(capability: Capability): string {
  return capability
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
