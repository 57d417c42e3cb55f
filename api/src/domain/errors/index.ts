export {
  ScimErrorKind,
  ScimValidationError,
  invalidSyntax,
  invalidValue,
  invalidPath,
  invalidFilter,
  mutabilityViolation,
  duplicateAttribute,
  invalidAttributeValue,
} from './scim-validation-error';
export type { ScimErrorObject } from './scim-validation-error';

export { SchemaDefinitionError } from './schema-definition-error';
