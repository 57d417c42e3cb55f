/**
 * SCIM Resource Type
 *
 * Composes a base schema, the common `externalId` attribute and any number
 * of schema extensions (static, or loaded per request) into the validator
 * used for POST / PUT bodies and PATCH operation values.
 *
 * Pure domain class. The request context is opaque and only handed to
 * dynamic schema loaders.
 *
 * @see RFC 7643 §6 — ResourceType Schema
 */

import {
  duplicateAttribute,
  invalidSyntax,
  invalidValue,
} from '../errors/scim-validation-error';
import type { PatchOperationType, ResolvedPatchPath } from '../patch/patch-types';
import { simpleAttribute } from '../schema/scim-attribute';
import type { ScimSchema } from '../schema/scim-schema';
import {
  decodeScimJson,
  indexEntriesCaseInsensitive,
  isAbsent,
  scimMap,
  scimNull,
  type ScimAttributeMap,
  type ScimMapValue,
  type ScimValue,
} from '../schema/scim-value';
import {
  SchemaResolutionCache,
  extensionSchemaId,
  isDynamicExtension,
  type SchemaExtension,
} from './schema-resolution-cache';

export const SCIM_RESOURCE_TYPE_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:ResourceType';

/** RFC 7643 §3.1 common attribute, defined by every resource type */
export const COMMON_ATTRIBUTE_EXTERNAL_ID = 'externalId';

export interface ScimResourceTypeParams<TContext> {
  /** Defaults to `name` */
  id?: string;
  name: string;
  description?: string;
  /** Endpoint relative to the service base URL, e.g. "/Users" */
  endpoint: string;
  schema: ScimSchema;
  schemaExtensions?: SchemaExtension<TContext>[];
}

export interface ResourceTypeDescription {
  schemas: string[];
  id: string;
  name: string;
  description: string;
  endpoint: string;
  schema: string;
  schemaExtensions: Array<{ schema: string; required: boolean }>;
}

export class ScimResourceType<TContext = void> {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly endpoint: string;
  readonly schema: ScimSchema;
  readonly schemaExtensions: readonly SchemaExtension<TContext>[];

  /** Base schema plus the common externalId attribute */
  readonly schemaWithCommon: ScimSchema;

  constructor(params: ScimResourceTypeParams<TContext>) {
    this.id = params.id ?? params.name;
    this.name = params.name;
    this.description = params.description ?? '';
    this.endpoint = params.endpoint;
    this.schema = params.schema;
    this.schemaExtensions = Object.freeze([...(params.schemaExtensions ?? [])]);
    this.schemaWithCommon = params.schema.withAttributes([
      simpleAttribute({
        type: 'string',
        name: COMMON_ATTRIBUTE_EXTERNAL_ID,
        caseExact: true,
        mutability: 'readWrite',
        uniqueness: 'none',
      }),
    ]);
  }

  /** A fresh per-call cache; pass it to every method used while handling one request */
  createResolutionCache(context: TContext): SchemaResolutionCache<TContext> {
    return new SchemaResolutionCache(context);
  }

  /** Resolve every extension schema (dynamic ones through their loader) */
  getSchemaExtensions(cache: SchemaResolutionCache<TContext>): ScimSchema[] {
    return this.schemaExtensions.map(extension => cache.resolve(extension));
  }

  findExtension(schemaUri: string): SchemaExtension<TContext> | undefined {
    const folded = schemaUri.toLowerCase();
    return this.schemaExtensions.find(extension => extensionSchemaId(extension).toLowerCase() === folded);
  }

  // ─── Full resource validation ────────────────────────────────────────

  /**
   * Validate a POST / PUT body. Attributes MAY be (re)defined.
   *
   * @throws ScimValidationError
   */
  validate(raw: string | Buffer, context: TContext): ScimAttributeMap {
    return this.validateDocument(decodeScimJson(raw), this.createResolutionCache(context), false);
  }

  /**
   * Validate a replacement body, rejecting any value for an immutable
   * attribute.
   *
   * @throws ScimValidationError
   */
  validateReplace(raw: string | Buffer, context: TContext): ScimAttributeMap {
    return this.validateDocument(decodeScimJson(raw), this.createResolutionCache(context), true);
  }

  /** Validate an already decoded document; extension payloads are merged under their URI */
  validateDocument(
    document: ScimValue,
    cache: SchemaResolutionCache<TContext>,
    checkMutability: boolean,
  ): ScimAttributeMap {
    if (document.kind !== 'map') {
      throw invalidSyntax();
    }

    const attributes = checkMutability
      ? this.schemaWithCommon.validateMutability(document)
      : this.schemaWithCommon.validate(document);

    const index = indexEntriesCaseInsensitive(document);
    for (const extension of this.schemaExtensions) {
      const schemaId = extensionSchemaId(extension);
      const hits = index.get(schemaId.toLowerCase()) ?? [];
      if (hits.length > 1) {
        throw duplicateAttribute(schemaId);
      }

      const payload = hits[0]?.[1];
      if (isAbsent(payload)) {
        if (extension.required) {
          throw invalidValue(`Missing extension name: ${this.extensionLabel(extension)}, Extension ID: ${schemaId}`);
        }
        continue;
      }

      const schema = cache.resolve(extension);
      attributes[schemaId] = checkMutability ? schema.validateMutability(payload) : schema.validate(payload);
    }

    return attributes;
  }

  // ─── PATCH operation values ──────────────────────────────────────────

  /**
   * Validate the value of one path-resolved PATCH operation.
   *
   * The value is wrapped as `{ attr: value }` or `{ attr: { sub: value } }`
   * and checked against the targeted extension schema (when the path carried
   * a known extension URI) or the base schema.
   *
   * @returns the validated map, keyed by the same attribute name
   * @throws ScimValidationError (invalidValue)
   */
  validateOperationValue(
    op: PatchOperationType,
    path: ResolvedPatchPath,
    value: ScimValue | undefined,
    cache: SchemaResolutionCache<TContext>,
  ): ScimAttributeMap {
    const valueMap = buildOperationValueMap(path, value);

    if (path.schemaUri) {
      const extension = this.findExtension(path.schemaUri);
      if (extension) {
        return cache.resolve(extension).validatePatchOperation(op, valueMap, true);
      }
    }

    return this.schemaWithCommon.validatePatchOperationValue(op, valueMap);
  }

  toDescription(): ResourceTypeDescription {
    return {
      schemas: [SCIM_RESOURCE_TYPE_SCHEMA],
      id: this.id,
      name: this.name,
      description: this.description,
      endpoint: this.endpoint,
      schema: this.schema.id,
      schemaExtensions: this.schemaExtensions.map(extension => ({
        schema: extensionSchemaId(extension),
        required: extension.required,
      })),
    };
  }

  private extensionLabel(extension: SchemaExtension<TContext>): string {
    return isDynamicExtension(extension) ? extension.schemaId : extension.schema.name || extension.schema.id;
  }
}

function buildOperationValueMap(path: ResolvedPatchPath, value: ScimValue | undefined): ScimMapValue {
  const inner = value ?? scimNull();
  if (!path.subAttributeName) {
    return scimMap([[path.attributeName, inner]]);
  }
  return scimMap([[path.attributeName, scimMap([[path.subAttributeName, inner]])]]);
}
