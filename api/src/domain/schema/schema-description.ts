/**
 * Schema description documents (RFC 7643 §7).
 *
 * `ScimSchema.toDescription()` / `ScimAttribute.toDescription()` produce these
 * documents for the /Schemas discovery endpoint; `parseSchemaDescription()`
 * goes the other way so schemas can be shipped as JSON and loaded at startup.
 */

import { z } from 'zod';

import { SchemaDefinitionError } from '../errors/schema-definition-error';
import {
  ATTRIBUTE_DATA_TYPES,
  ATTRIBUTE_MUTABILITIES,
  ATTRIBUTE_RETURNED,
  ATTRIBUTE_UNIQUENESS,
  ScimAttribute,
  complexAttribute,
  type AttributeDataType,
  type AttributeMutability,
  type AttributeReturned,
  type AttributeUniqueness,
} from './scim-attribute';
import { ScimSchema } from './scim-schema';

// ─── Document shapes ─────────────────────────────────────────────────────────

export interface AttributeDescription {
  name: string;
  type: AttributeDataType;
  multiValued: boolean;
  description: string;
  required: boolean;
  mutability: AttributeMutability;
  returned: AttributeReturned;
  /** Only when non-empty */
  canonicalValues?: string[];
  /** Only when non-empty */
  referenceTypes?: string[];
  /** Only for complex attributes */
  subAttributes?: AttributeDescription[];
  /** Omitted for boolean and complex attributes */
  caseExact?: boolean;
  /** Omitted for boolean and complex attributes */
  uniqueness?: AttributeUniqueness;
}

export interface SchemaDescription {
  id: string;
  name: string;
  description: string;
  attributes: AttributeDescription[];
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

const baseAttributeDocument = z.object({
  name: z.string(),
  type: z.enum(ATTRIBUTE_DATA_TYPES),
  multiValued: z.boolean(),
  description: z.string().optional(),
  required: z.boolean(),
  mutability: z.enum(ATTRIBUTE_MUTABILITIES),
  returned: z.enum(ATTRIBUTE_RETURNED),
  caseExact: z.boolean().optional(),
  uniqueness: z.enum(ATTRIBUTE_UNIQUENESS).optional(),
  canonicalValues: z.array(z.string()).optional(),
  referenceTypes: z.array(z.string()).optional(),
});

// Sub-attributes cannot nest further (RFC 7643 §2.3.8), so two levels suffice
const attributeDocument = baseAttributeDocument.extend({
  subAttributes: z.array(baseAttributeDocument).optional(),
});

const schemaDocument = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  description: z.string().optional(),
  attributes: z.array(attributeDocument),
});

type BaseAttributeDocument = z.infer<typeof baseAttributeDocument>;
type AttributeDocument = z.infer<typeof attributeDocument>;

function toSimpleAttribute(doc: BaseAttributeDocument): ScimAttribute {
  return new ScimAttribute({
    name: doc.name,
    type: doc.type,
    description: doc.description ?? '',
    multiValued: doc.multiValued,
    required: doc.required,
    caseExact: doc.caseExact ?? false,
    mutability: doc.mutability,
    returned: doc.returned,
    uniqueness: doc.uniqueness ?? 'none',
    canonicalValues: doc.canonicalValues,
    referenceTypes: doc.referenceTypes,
  });
}

function toAttribute(doc: AttributeDocument): ScimAttribute {
  if (doc.type !== 'complex') {
    if (doc.subAttributes && doc.subAttributes.length > 0) {
      throw new SchemaDefinitionError(
        `Attribute "${doc.name}" of type ${doc.type} cannot have sub-attributes.`,
      );
    }
    return toSimpleAttribute(doc);
  }

  return complexAttribute({
    name: doc.name,
    description: doc.description,
    multiValued: doc.multiValued,
    required: doc.required,
    mutability: doc.mutability,
    returned: doc.returned,
    uniqueness: doc.uniqueness,
    subAttributes: (doc.subAttributes ?? []).map(toSimpleAttribute),
  });
}

/**
 * Build a ScimSchema from its description document.
 *
 * @throws SchemaDefinitionError - the document is malformed or describes an
 *   invalid attribute set
 */
export function parseSchemaDescription(document: unknown): ScimSchema {
  const result = schemaDocument.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SchemaDefinitionError(`Invalid schema description: ${issues}`);
  }

  const doc = result.data;
  return new ScimSchema({
    id: doc.id,
    name: doc.name,
    description: doc.description,
    attributes: doc.attributes.map(toAttribute),
  });
}
