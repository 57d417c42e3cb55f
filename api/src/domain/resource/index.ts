export {
  ScimResourceType,
  SCIM_RESOURCE_TYPE_SCHEMA,
  COMMON_ATTRIBUTE_EXTERNAL_ID,
} from './scim-resource-type';
export type { ScimResourceTypeParams, ResourceTypeDescription } from './scim-resource-type';

export {
  SchemaResolutionCache,
  isDynamicExtension,
  extensionSchemaId,
} from './schema-resolution-cache';
export type {
  SchemaLoader,
  SchemaExtension,
  StaticSchemaExtension,
  DynamicSchemaExtension,
} from './schema-resolution-cache';
