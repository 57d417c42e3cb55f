/**
 * SCIM PATCH Path Resolver
 *
 * Default PatchPathResolver for the path forms clients send in practice
 * (RFC 7644 §3.5.2 / §3.10):
 *   - Simple attribute paths:       "displayName"
 *   - Sub-attribute paths:          "name.givenName"
 *   - ValuePath filter expressions: "emails[type eq \"work\"]", "emails[type eq \"work\"].value"
 *   - URN-prefixed paths:           "urn:ietf:params:scim:schemas:extension:enterprise:2.0:User:manager"
 *
 * The filter inside the brackets is kept as an opaque string; evaluating it
 * against stored resources is the caller's concern.
 */

import type {
  PatchPathResolver,
  PatchPathSchemas,
  ResolvedPatchPath,
} from './patch-types';
import type { ScimSchema } from '../schema/scim-schema';

export class PatchPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PatchPathError';
  }
}

// attr, attr.sub, attr[filter], attr[filter].sub
const ATTRIBUTE_PATH_PATTERN = /^([A-Za-z][\w-]*)(?:\[(.+)\])?(?:\.([A-Za-z$][\w$-]*))?$/;

export class ScimPatchPathResolver implements PatchPathResolver {
  resolve(path: string, schemas: PatchPathSchemas): ResolvedPatchPath {
    if (!path) {
      throw new PatchPathError('Path must not be empty.');
    }

    const { schema, schemaUri, attributePath } = this.splitSchemaUri(path, schemas);

    const match = ATTRIBUTE_PATH_PATTERN.exec(attributePath);
    if (!match) {
      throw new PatchPathError(`Path "${path}" is not a valid attribute path.`);
    }
    const [, attributeName, valueFilter, subAttributeName] = match;

    const attribute = schema.findAttribute(attributeName);
    if (!attribute) {
      throw new PatchPathError(`Attribute "${attributeName}" is not defined in schema "${schema.id}".`);
    }

    const resolved: ResolvedPatchPath = { attributeName: attribute.name };
    if (schemaUri) {
      resolved.schemaUri = schemaUri;
    }

    if (valueFilter !== undefined) {
      if (!attribute.multiValued || attribute.type !== 'complex') {
        throw new PatchPathError(
          `Value filter is only allowed on multi-valued complex attributes, "${attribute.name}" is not one.`,
        );
      }
      if (!valueFilter.trim()) {
        throw new PatchPathError(`Value filter of path "${path}" is empty.`);
      }
      resolved.valueFilter = valueFilter.trim();
    }

    if (subAttributeName !== undefined) {
      const sub = attribute.findSubAttribute(subAttributeName);
      if (!sub) {
        throw new PatchPathError(
          `Sub-attribute "${subAttributeName}" is not defined for attribute "${attribute.name}".`,
        );
      }
      resolved.subAttributeName = sub.name;
    }

    return resolved;
  }

  /**
   * Strip a leading schema URI. The longest matching schema id wins, so an
   * extension whose URI extends the base URI is still found.
   */
  private splitSchemaUri(
    path: string,
    schemas: PatchPathSchemas,
  ): { schema: ScimSchema; schemaUri?: string; attributePath: string } {
    if (!path.toLowerCase().startsWith('urn:')) {
      return { schema: schemas.base, attributePath: path };
    }

    const folded = path.toLowerCase();
    const candidates = [schemas.base, ...schemas.extensions]
      .filter(schema => folded.startsWith(`${schema.id.toLowerCase()}:`))
      .sort((a, b) => b.id.length - a.id.length);

    const schema = candidates[0];
    if (!schema) {
      throw new PatchPathError(`Path "${path}" references an unknown schema.`);
    }

    const attributePath = path.slice(schema.id.length + 1);
    if (!attributePath) {
      throw new PatchPathError(`Path "${path}" does not name an attribute of schema "${schema.id}".`);
    }

    return { schema, schemaUri: schema.id, attributePath };
  }
}
