/**
 * Domain schema model — barrel export
 */
export {
  ATTRIBUTE_DATA_TYPES,
  ATTRIBUTE_MUTABILITIES,
  ATTRIBUTE_RETURNED,
  ATTRIBUTE_UNIQUENESS,
  ScimAttribute,
  simpleAttribute,
  complexAttribute,
} from './scim-attribute';
export type {
  AttributeDataType,
  AttributeMutability,
  AttributeReturned,
  AttributeUniqueness,
  AttributeDefinition,
  SimpleAttributeParams,
  StringAttributeParams,
  ReferenceAttributeParams,
  BinaryAttributeParams,
  BooleanAttributeParams,
  NumberAttributeParams,
  DateTimeAttributeParams,
  ComplexAttributeParams,
} from './scim-attribute';

export {
  ScimSchema,
  SCIM_CORE_USER_SCHEMA_ID,
  SCIM_CORE_GROUP_SCHEMA_ID,
  SCIM_ENTERPRISE_USER_SCHEMA_ID,
} from './scim-schema';
export type { ScimSchemaParams, PatchOperationType } from './scim-schema';

export { parseSchemaDescription } from './schema-description';
export type { AttributeDescription, SchemaDescription } from './schema-description';

export { USER_SCHEMA, GROUP_SCHEMA, ENTERPRISE_USER_SCHEMA } from './core-schemas';

export {
  decodeScimJson,
  toScimValue,
  toCanonical,
  scimMap,
} from './scim-value';
export type { ScimValue, ScimMapValue, CanonicalValue, ScimAttributeMap } from './scim-value';
