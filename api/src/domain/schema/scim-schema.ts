/**
 * SCIM Schema
 *
 * An ordered attribute set plus schema metadata (RFC 7643 §7). Validates
 * whole resources (POST / PUT) and the value of a single PATCH operation.
 *
 * Attribute names are matched case-insensitively (RFC 7643 §2.1) through a
 * lower-cased index built once at construction.
 */

import {
  duplicateAttribute,
  invalidSyntax,
  invalidValue,
  mutabilityViolation,
} from '../errors/scim-validation-error';
import type { ScimAttribute } from './scim-attribute';
import type { SchemaDescription } from './schema-description';
import {
  indexEntriesCaseInsensitive,
  type ScimAttributeMap,
  type ScimMapValue,
  type ScimValue,
} from './scim-value';

export const SCIM_CORE_USER_SCHEMA_ID = 'urn:ietf:params:scim:schemas:core:2.0:User';
export const SCIM_CORE_GROUP_SCHEMA_ID = 'urn:ietf:params:scim:schemas:core:2.0:Group';
export const SCIM_ENTERPRISE_USER_SCHEMA_ID = 'urn:ietf:params:scim:schemas:extension:enterprise:2.0:User';

/** PATCH operation verbs (RFC 7644 §3.5.2), lower case */
export type PatchOperationType = 'add' | 'replace' | 'remove';

export interface ScimSchemaParams {
  id: string;
  name?: string;
  description?: string;
  attributes: ScimAttribute[];
}

/**
 * Immutable attributes can only be added; readOnly attributes cannot be
 * patched at all.
 */
function cannotBePatched(op: PatchOperationType, attribute: ScimAttribute): boolean {
  if (attribute.mutability === 'readOnly') {
    return true;
  }
  return attribute.mutability === 'immutable' && (op === 'replace' || op === 'remove');
}

export class ScimSchema {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly attributes: readonly ScimAttribute[];

  private readonly attributeIndex: ReadonlyMap<string, ScimAttribute>;

  constructor(params: ScimSchemaParams) {
    this.id = params.id;
    this.name = params.name ?? '';
    this.description = params.description ?? '';
    this.attributes = Object.freeze([...params.attributes]);

    // Duplicate top-level names are the caller's concern; the first one wins lookups
    const index = new Map<string, ScimAttribute>();
    for (const attribute of this.attributes) {
      const folded = attribute.name.toLowerCase();
      if (!index.has(folded)) {
        index.set(folded, attribute);
      }
    }
    this.attributeIndex = index;
    Object.freeze(this);
  }

  findAttribute(name: string): ScimAttribute | undefined {
    return this.attributeIndex.get(name.toLowerCase());
  }

  /** A copy of this schema with extra attributes appended */
  withAttributes(extra: ScimAttribute[]): ScimSchema {
    return new ScimSchema({
      id: this.id,
      name: this.name,
      description: this.description,
      attributes: [...this.attributes, ...extra],
    });
  }

  /**
   * Validate a resource without mutability checks.
   * Used for POST and PUT bodies, where attributes MAY be (re)defined.
   */
  validate(resource: ScimValue): ScimAttributeMap {
    return this.validateResource(resource, false);
  }

  /** Validate a resource, rejecting any value supplied for an immutable attribute */
  validateMutability(resource: ScimValue): ScimAttributeMap {
    return this.validateResource(resource, true);
  }

  /**
   * Validate the value map of a single PATCH operation.
   *
   * Keys resolve against attribute names, or, for extension schemas, against
   * the fully qualified `<schema id>:<attribute name>` form.
   *
   * @throws ScimValidationError (invalidValue) - unknown attribute, an
   *   attribute whose mutability forbids `op`, or an invalid value
   */
  validatePatchOperation(
    op: PatchOperationType,
    valueMap: ScimMapValue,
    isExtension: boolean,
  ): ScimAttributeMap {
    const result: ScimAttributeMap = {};

    for (const [key, value] of valueMap.entries) {
      const attribute = this.resolvePatchAttribute(key, isExtension);

      if (!attribute) {
        throw invalidValue(
          `Attribute ${key} does not exist in the schema, and therefore cannot be patched.`,
        );
      }
      if (cannotBePatched(op, attribute)) {
        throw invalidValue(
          `Attribute ${attribute.name} is ${attribute.mutability} in the schema, and therefore cannot be patched with operation "${op}".`,
        );
      }

      const canonical = attribute.validate(value);
      if (canonical !== undefined) {
        result[key] = canonical;
      }
    }

    return result;
  }

  /** PATCH value validation against a base (non-extension) schema */
  validatePatchOperationValue(op: PatchOperationType, valueMap: ScimMapValue): ScimAttributeMap {
    return this.validatePatchOperation(op, valueMap, false);
  }

  toDescription(): SchemaDescription {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      attributes: this.attributes.map(attribute => attribute.toDescription()),
    };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private resolvePatchAttribute(key: string, isExtension: boolean): ScimAttribute | undefined {
    const direct = this.findAttribute(key);
    if (direct || !isExtension) {
      return direct;
    }

    const prefix = `${this.id.toLowerCase()}:`;
    const folded = key.toLowerCase();
    return folded.startsWith(prefix) ? this.findAttribute(folded.slice(prefix.length)) : undefined;
  }

  private validateResource(resource: ScimValue, checkMutability: boolean): ScimAttributeMap {
    if (resource.kind !== 'map') {
      throw invalidSyntax();
    }

    const index = indexEntriesCaseInsensitive(resource);
    const result: ScimAttributeMap = {};

    for (const attribute of this.attributes) {
      const hits = index.get(attribute.name.toLowerCase()) ?? [];
      if (hits.length > 1) {
        throw duplicateAttribute(attribute.name);
      }

      // An immutable attribute SHALL NOT be updated
      if (checkMutability && hits.length === 1 && attribute.mutability === 'immutable') {
        throw mutabilityViolation(attribute.name);
      }

      const canonical = attribute.validate(hits[0]?.[1]);
      if (canonical !== undefined) {
        result[attribute.name] = canonical;
      }
    }

    return result;
  }
}
