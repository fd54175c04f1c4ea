/**
 * @arch patternloom.core.domain
 */
import { titleCaseCapability, type Capability } from '../catalog/index.js';

/** Role labels used by the minimal viable pattern. */
export const MINIMAL_ROLES: Readonly<Partial<Record<Capability, string>>> = {
  web_framework: 'Application Framework',
  database: 'Data Storage',
  cache: 'Cache Layer',
  message_queue: 'Message Queue',
  ai_model: 'AI/ML Framework',
  authentication: 'Authentication',
  storage: 'File Storage',
  monitoring: 'Monitoring',
  search: 'Search Engine',
  load_balancer: 'Load Balancer',
  email: 'Email Service',
  object_storage: 'Object Storage',
  payment: 'Payment Processor',
  cdn: 'CDN',
};

/**
 * Fixed label, or the title-cased capability (`vector_db` -> `Vector Db`).
 */
export function roleForCapability(capability: Capability): string {
  return MINIMAL_ROLES[capability] ?? titleCaseCapability(capability);
}
