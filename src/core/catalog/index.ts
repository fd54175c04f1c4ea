/**
 * @arch patternloom.core.barrel
 *
 * Catalog model exports.
 */
export * from './types.js';
export * from './capabilities.js';
export * from './component.js';
export * from './licenses.js';
export * from './serializer.js';
export {
  ComponentRecordSchema,
  CatalogFileSchema,
  RelationshipRecordSchema,
  RelationshipsFileSchema,
  RELATIONSHIPS_SCHEMA_VERSION,
} from './schema.js';
