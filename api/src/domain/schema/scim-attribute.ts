/**
 * SCIM Attribute Definitions
 *
 * An immutable description of one schema attribute (RFC 7643 §7) together
 * with the per-value validation that turns a submitted ScimValue into its
 * canonical form.
 *
 * Validation rules, in order:
 *   - absent (missing or null): error if required, otherwise no value
 *   - readOnly: the submitted value is dropped, never validated
 *   - multi-valued: a list (each element validated singularly) or the legacy
 *     map representation (keys matched against sub-attributes)
 *   - singular: dispatched on the data type
 *
 * Two client-compatibility workarounds live here:
 *   - boolean attributes accept the strings "true" / "false" in any case
 *     (Microsoft Entra ID sends "True" / "False")
 *   - a complex attribute named "manager" accepts a bare string id
 *     (Entra ID sends `"value": "274"` for the enterprise manager)
 *
 * @see RFC 7643 §2.3 — Attribute Data Types
 */

import { SchemaDefinitionError } from '../errors/schema-definition-error';
import { invalidAttributeValue } from '../errors/scim-validation-error';
import { isXsdDateTime } from './date-time';
import type { AttributeDescription } from './schema-description';
import {
  INT64_MAX,
  INT64_MIN,
  indexEntriesCaseInsensitive,
  isAbsent,
  isIntegerToken,
  toCanonicalInteger,
  type CanonicalValue,
  type ScimMapValue,
  type ScimValue,
} from './scim-value';

// ─── Characteristics ─────────────────────────────────────────────────────────

export const ATTRIBUTE_DATA_TYPES = [
  'string', 'boolean', 'decimal', 'integer', 'dateTime', 'reference', 'binary', 'complex',
] as const;
export const ATTRIBUTE_MUTABILITIES = ['readOnly', 'readWrite', 'immutable', 'writeOnly'] as const;
export const ATTRIBUTE_RETURNED = ['always', 'never', 'default', 'request'] as const;
export const ATTRIBUTE_UNIQUENESS = ['none', 'server', 'global'] as const;

export type AttributeDataType = typeof ATTRIBUTE_DATA_TYPES[number];
export type AttributeMutability = typeof ATTRIBUTE_MUTABILITIES[number];
export type AttributeReturned = typeof ATTRIBUTE_RETURNED[number];
export type AttributeUniqueness = typeof ATTRIBUTE_UNIQUENESS[number];

/** Fully resolved attribute characteristics, as accepted by the ScimAttribute constructor */
export interface AttributeDefinition {
  name: string;
  type: AttributeDataType;
  description: string;
  multiValued: boolean;
  required: boolean;
  caseExact: boolean;
  mutability: AttributeMutability;
  returned: AttributeReturned;
  uniqueness: AttributeUniqueness;
  canonicalValues?: readonly string[];
  referenceTypes?: readonly string[];
  subAttributes?: readonly ScimAttribute[];
}

// ─── Factory parameters ──────────────────────────────────────────────────────

interface CommonAttributeParams {
  name: string;
  description?: string;
  multiValued?: boolean;
  required?: boolean;
  mutability?: AttributeMutability;
  returned?: AttributeReturned;
}

export interface StringAttributeParams extends CommonAttributeParams {
  type: 'string';
  caseExact?: boolean;
  canonicalValues?: string[];
  uniqueness?: AttributeUniqueness;
}

export interface ReferenceAttributeParams extends CommonAttributeParams {
  type: 'reference';
  /** e.g. "User", "Group", "external", "uri" */
  referenceTypes: string[];
  caseExact?: boolean;
  uniqueness?: AttributeUniqueness;
}

export interface BinaryAttributeParams extends CommonAttributeParams {
  type: 'binary';
  caseExact?: boolean;
}

export interface BooleanAttributeParams extends CommonAttributeParams {
  type: 'boolean';
}

export interface NumberAttributeParams extends CommonAttributeParams {
  type: 'decimal' | 'integer';
  uniqueness?: AttributeUniqueness;
}

export interface DateTimeAttributeParams extends CommonAttributeParams {
  type: 'dateTime';
}

export type SimpleAttributeParams =
  | StringAttributeParams
  | ReferenceAttributeParams
  | BinaryAttributeParams
  | BooleanAttributeParams
  | NumberAttributeParams
  | DateTimeAttributeParams;

export interface ComplexAttributeParams extends CommonAttributeParams {
  subAttributes: ScimAttribute[];
  uniqueness?: AttributeUniqueness;
}

// ─── Validation patterns ─────────────────────────────────────────────────────

/** RFC 7643 §2.1: ATTRNAME = ALPHA *(nameChar); "$ref" is the one exception */
const ATTRIBUTE_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

/** RFC 4648 base64, canonical padding */
const BASE64_PATTERN = /^([A-Za-z0-9+/]{4})*([A-Za-z0-9+/]{3}=|[A-Za-z0-9+/]{2}==)?$/;


// ─── Attribute ───────────────────────────────────────────────────────────────

export class ScimAttribute {
  readonly name: string;
  readonly type: AttributeDataType;
  readonly description: string;
  readonly multiValued: boolean;
  readonly required: boolean;
  readonly caseExact: boolean;
  readonly mutability: AttributeMutability;
  readonly returned: AttributeReturned;
  readonly uniqueness: AttributeUniqueness;
  readonly canonicalValues: readonly string[] | undefined;
  readonly referenceTypes: readonly string[] | undefined;
  readonly subAttributes: readonly ScimAttribute[];

  private readonly subAttributeIndex: ReadonlyMap<string, ScimAttribute>;

  /**
   * @throws SchemaDefinitionError - invalid name, or sub-attribute names that
   *   collide case-insensitively
   */
  constructor(definition: AttributeDefinition) {
    if (definition.name !== '$ref' && !ATTRIBUTE_NAME_PATTERN.test(definition.name)) {
      throw new SchemaDefinitionError(`Invalid attribute name "${definition.name}".`);
    }

    const subAttributes = definition.subAttributes ?? [];
    if (definition.type !== 'complex' && subAttributes.length > 0) {
      throw new SchemaDefinitionError(
        `Attribute "${definition.name}" of type ${definition.type} cannot have sub-attributes.`,
      );
    }

    const index = new Map<string, ScimAttribute>();
    subAttributes.forEach((sub, i) => {
      const folded = sub.name.toLowerCase();
      const existing = index.get(folded);
      if (existing) {
        const j = subAttributes.indexOf(existing);
        throw new SchemaDefinitionError(
          `Duplicate name "${folded}" for sub-attributes ${j} and ${i} of "${definition.name}".`,
        );
      }
      index.set(folded, sub);
    });

    this.name = definition.name;
    this.type = definition.type;
    this.description = definition.description;
    this.multiValued = definition.multiValued;
    this.required = definition.required;
    this.caseExact = definition.caseExact;
    this.mutability = definition.mutability;
    this.returned = definition.returned;
    this.uniqueness = definition.uniqueness;
    this.canonicalValues = definition.canonicalValues ? Object.freeze([...definition.canonicalValues]) : undefined;
    this.referenceTypes = definition.referenceTypes ? Object.freeze([...definition.referenceTypes]) : undefined;
    this.subAttributes = Object.freeze([...subAttributes]);
    this.subAttributeIndex = index;
    Object.freeze(this);
  }

  hasSubAttributes(): boolean {
    return this.type === 'complex' && this.subAttributes.length > 0;
  }

  /** Case-insensitive sub-attribute lookup */
  findSubAttribute(name: string): ScimAttribute | undefined {
    return this.subAttributeIndex.get(name.toLowerCase());
  }

  /**
   * Validate a submitted value and return its canonical form.
   *
   * @returns the canonical value, or `undefined` when the attribute produces
   *   no value (not supplied, or readOnly)
   * @throws ScimValidationError (invalidValue)
   */
  validate(value: ScimValue | undefined): CanonicalValue | undefined {
    if (isAbsent(value)) {
      if (this.required) {
        throw invalidAttributeValue('Required attribute was not supplied.', this.name);
      }
      return undefined;
    }

    // readOnly: the attribute SHALL NOT be modified by the client
    if (this.mutability === 'readOnly') {
      return undefined;
    }

    if (!this.multiValued) {
      return this.validateSingular(value);
    }

    switch (value.kind) {
      case 'list':
        if (this.required && value.items.length === 0) {
          throw invalidAttributeValue('Multi-valued attribute was empty.', this.name);
        }
        return value.items.map(item => this.validateSingular(item));

      case 'map':
        if (this.required && value.entries.size === 0) {
          throw invalidAttributeValue('Multi-valued attribute was empty.', this.name);
        }
        return this.validateLegacyMap(value);

      default:
        throw invalidAttributeValue('Multi-valued attribute was not an array.', this.name);
    }
  }

  toDescription(): AttributeDescription {
    const description: AttributeDescription = {
      name: this.name,
      type: this.type,
      multiValued: this.multiValued,
      description: this.description,
      required: this.required,
      mutability: this.mutability,
      returned: this.returned,
    };

    if (this.canonicalValues && this.canonicalValues.length > 0) {
      description.canonicalValues = [...this.canonicalValues];
    }
    if (this.referenceTypes && this.referenceTypes.length > 0) {
      description.referenceTypes = [...this.referenceTypes];
    }
    if (this.hasSubAttributes()) {
      description.subAttributes = this.subAttributes.map(sub => sub.toDescription());
    }
    if (this.type !== 'complex' && this.type !== 'boolean') {
      description.caseExact = this.caseExact;
      description.uniqueness = this.uniqueness;
    }

    return description;
  }

  // ─── Singular values ─────────────────────────────────────────────────

  private validateSingular(value: ScimValue): CanonicalValue {
    switch (this.type) {
      case 'binary':
        if (value.kind !== 'string') {
          throw invalidAttributeValue('Binary attribute not the right type.', this.name);
        }
        if (!BASE64_PATTERN.test(value.value)) {
          throw invalidAttributeValue('Attribute contains illegal characters for type: binary.', this.name);
        }
        return value.value;

      case 'boolean':
        return this.validateBoolean(value);

      case 'complex':
        if (value.kind === 'map') {
          return this.validateComplex(value);
        }
        if (value.kind === 'string' && this.name.toLowerCase() === 'manager') {
          return value.value;
        }
        throw invalidAttributeValue('Complex attribute does not have the right structure.', this.name);

      case 'dateTime':
        if (value.kind !== 'string') {
          throw invalidAttributeValue('Date time attribute does not have the right type.', this.name);
        }
        if (!isXsdDateTime(value.value)) {
          throw invalidAttributeValue(
            'Date time attribute value is not in the right format - please supply date time in YYYY-MM-DDTHH:mm:ssZ format.',
            this.name,
          );
        }
        return value.value;

      case 'decimal': {
        if (value.kind !== 'number') {
          throw invalidAttributeValue('Decimal attribute value submitted with wrong type.', this.name);
        }
        const parsed = Number(value.token);
        if (!Number.isFinite(parsed)) {
          throw invalidAttributeValue('Decimal attribute value failed to parse as a decimal.', this.name);
        }
        return parsed;
      }

      case 'integer': {
        if (value.kind !== 'number' || !isIntegerToken(value.token)) {
          throw invalidAttributeValue('Integer attribute value failed to parse as an integer.', this.name);
        }
        const parsed = BigInt(value.token);
        if (parsed < INT64_MIN || parsed > INT64_MAX) {
          throw invalidAttributeValue('Integer attribute value is out of range.', this.name);
        }
        return toCanonicalInteger(parsed);
      }

      case 'reference':
        if (value.kind !== 'string') {
          throw invalidAttributeValue('Reference attribute value is not of the right type.', this.name);
        }
        return value.value;

      case 'string':
        if (value.kind !== 'string') {
          throw invalidAttributeValue('String attribute value is not of the right type.', this.name);
        }
        return value.value;

      default:
        throw invalidAttributeValue('Unrecognized attribute type.', this.name);
    }
  }

  private validateBoolean(value: ScimValue): boolean {
    if (value.kind === 'boolean') {
      return value.value;
    }
    if (value.kind === 'string') {
      const lower = value.value.toLowerCase();
      if (lower === 'true') return true;
      if (lower === 'false') return false;
    }
    throw invalidAttributeValue('Boolean attribute not the right type.', this.name);
  }

  /** Only sub-attributes known to the schema survive; each key may appear once */
  private validateComplex(value: ScimMapValue): { [key: string]: CanonicalValue } {
    const index = indexEntriesCaseInsensitive(value);
    const result: { [key: string]: CanonicalValue } = {};

    for (const sub of this.subAttributes) {
      const hits = index.get(sub.name.toLowerCase()) ?? [];
      if (hits.length > 1) {
        throw invalidAttributeValue(
          `Duplicate attribute found inside of the complex attribute. Duplicate attribute name: ${sub.name}.`,
          this.name,
        );
      }

      const canonical = sub.validate(hits[0]?.[1]);
      if (canonical !== undefined) {
        result[sub.name] = canonical;
      }
    }

    return result;
  }

  /**
   * Multi-valued attributes submitted as a single object instead of a list
   * (older clients). Keys that match no sub-attribute are dropped.
   */
  private validateLegacyMap(value: ScimMapValue): { [key: string]: CanonicalValue } {
    const result: { [key: string]: CanonicalValue } = {};
    const seen = new Set<string>();

    for (const [key, item] of value.entries) {
      const sub = this.findSubAttribute(key);
      if (!sub) {
        continue;
      }
      if (seen.has(sub.name)) {
        throw invalidAttributeValue(
          `Duplicate attribute found inside of the multi-valued attribute. Duplicate attribute name: ${sub.name}.`,
          this.name,
        );
      }
      seen.add(sub.name);

      const canonical = sub.validate(item);
      if (canonical !== undefined) {
        result[sub.name] = canonical;
      }
    }

    return result;
  }
}

// ─── Factories ───────────────────────────────────────────────────────────────

function commonDefaults(params: CommonAttributeParams) {
  return {
    name: params.name,
    description: params.description ?? '',
    multiValued: params.multiValued ?? false,
    required: params.required ?? false,
    mutability: params.mutability ?? 'readWrite',
    returned: params.returned ?? 'default',
  } satisfies Partial<AttributeDefinition>;
}

/** Build a non-complex attribute */
export function simpleAttribute(params: SimpleAttributeParams): ScimAttribute {
  const common = commonDefaults(params);

  switch (params.type) {
    case 'string':
      return new ScimAttribute({
        ...common,
        type: 'string',
        caseExact: params.caseExact ?? false,
        uniqueness: params.uniqueness ?? 'none',
        canonicalValues: params.canonicalValues,
      });
    case 'reference':
      return new ScimAttribute({
        ...common,
        type: 'reference',
        caseExact: params.caseExact ?? false,
        uniqueness: params.uniqueness ?? 'none',
        referenceTypes: params.referenceTypes,
      });
    case 'binary':
      return new ScimAttribute({
        ...common,
        type: 'binary',
        caseExact: params.caseExact ?? false,
        uniqueness: 'none',
      });
    case 'decimal':
    case 'integer':
      return new ScimAttribute({
        ...common,
        type: params.type,
        caseExact: false,
        uniqueness: params.uniqueness ?? 'none',
      });
    case 'boolean':
    case 'dateTime':
      return new ScimAttribute({
        ...common,
        type: params.type,
        caseExact: false,
        uniqueness: 'none',
      });
  }
}

/**
 * Build a complex attribute.
 *
 * @throws SchemaDefinitionError - a sub-attribute is itself complex, or two
 *   sub-attribute names collide case-insensitively
 */
export function complexAttribute(params: ComplexAttributeParams): ScimAttribute {
  const nested = params.subAttributes.find(sub => sub.type === 'complex');
  if (nested) {
    throw new SchemaDefinitionError(
      `Complex attribute "${params.name}" cannot contain complex sub-attribute "${nested.name}".`,
    );
  }

  return new ScimAttribute({
    ...commonDefaults(params),
    type: 'complex',
    caseExact: false,
    uniqueness: params.uniqueness ?? 'none',
    subAttributes: params.subAttributes,
  });
}
