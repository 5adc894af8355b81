/**
 * Model Layer Exports
 *
 * Public API of the model layer: declare, validate, load, serialize,
 * dump and describe entity types.
 */

export * from './schema.contract.js';
export * from './schema.errors.js';
export * from './resolution.context.js';
export * from './schema.validator.js';
export * from './schema.serializer.js';
export * from './schema.loader.js';
export * from './schema.exporter.js';

export { isModelInstance, entityOf, baseDirOf } from './schema.instance.js';
