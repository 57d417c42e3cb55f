/**
 * Domain-Layer PATCH Types
 *
 * Pure domain types for SCIM PATCH validation, with zero framework/DB imports.
 * These types are the contract between the request decoder, the external
 * path resolver and the resource type that validates operation values.
 *
 * @see RFC 7644 §3.5.2 for PATCH operation semantics
 */

import type { PatchOperationType, ScimSchema } from '../schema/scim-schema';
import type { CanonicalValue, ScimValue } from '../schema/scim-value';

export type { PatchOperationType } from '../schema/scim-schema';

// ─── Request DTO ─────────────────────────────────────────────────────────────

/** A single PATCH operation as decoded from the request body */
export interface PatchOperationDto {
  /** The operation verb as sent by the client (any case) */
  op: string;
  /** Attribute path; empty when the client sent none */
  path: string;
  /** The value to apply; undefined when the client sent none */
  value: ScimValue | undefined;
}

// ─── Path resolution (external collaborator) ─────────────────────────────────

/** A structured PATCH target produced by a PatchPathResolver */
export interface ResolvedPatchPath {
  /** Top-level attribute, e.g. "emails" or "manager" */
  attributeName: string;
  /** e.g. "givenName" in `name.givenName` or "value" in `emails[type eq "work"].value` */
  subAttributeName?: string;
  /** Extension schema URI when the path was URN-prefixed */
  schemaUri?: string;
  /** Opaque value filter body, e.g. `type eq "work"` */
  valueFilter?: string;
}

/** The schemas a path may be resolved against */
export interface PatchPathSchemas {
  base: ScimSchema;
  extensions: readonly ScimSchema[];
}

export interface PatchPathResolver {
  /**
   * @throws Error - when the path is syntactically or semantically invalid;
   *   the message is reported back to the client
   */
  resolve(path: string, schemas: PatchPathSchemas): ResolvedPatchPath;
}

// ─── Validated output ────────────────────────────────────────────────────────

export interface ValidatedPatchOperation {
  op: PatchOperationType;
  /** The path as sent by the client ('' when none) */
  rawPath: string;
  /** Present whenever a path was sent */
  path?: ResolvedPatchPath;
  /** Canonical value (e.g. "True" coerced to true); undefined when none was sent */
  value: CanonicalValue | undefined;
}

export interface ValidatedPatchRequest {
  schemas: string[];
  /** Same order as the request */
  operations: ValidatedPatchOperation[];
}
