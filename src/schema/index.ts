/**
 * Entity schemas and the nodes built from them
 */

export {
  defineEntitySchema,
  schemaField,
  extendsSchema,
  ENTITY_SCHEMA,
  SchemaRegistry,
  type DerivationRecipe,
  type FieldDescriptor,
  type EntitySchema,
  type EntitySchemaInput,
} from './entity-schema.js';
export { StructuredFieldNode, type StructuredNodeOptions } from './structured-node.js';
