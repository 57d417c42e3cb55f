/**
 * PATCH Request Validator
 *
 * Pure domain class that turns a raw PATCH body into an ordered list of
 * validated operations. Zero NestJS / DB dependencies: takes bytes and a
 * request context in, returns plain data out.
 *
 * Responsibilities:
 *   - Body decoding ({ schemas, Operations: [{ op, path, value }] })
 *   - Operation verb check (add / replace / remove)
 *   - Path resolution through the injected PatchPathResolver
 *   - Value validation against the resource type's schemas, writing the
 *     canonical value back into the operation ("True" → true)
 *
 * Evaluation stops at the first invalid operation; the caller never sees a
 * partially validated request.
 *
 * @see RFC 7644 §3.5.2 — Modifying with PATCH
 */

import {
  ScimValidationError,
  invalidFilter,
  invalidPath,
  invalidSyntax,
  invalidValue,
} from '../errors/scim-validation-error';
import type { ScimResourceType } from '../resource/scim-resource-type';
import type { SchemaResolutionCache } from '../resource/schema-resolution-cache';
import {
  decodeScimJson,
  isCanonicalRecord,
  toCanonical,
  type CanonicalValue,
  type ScimAttributeMap,
  type ScimValue,
} from '../schema/scim-value';
import { ScimPatchPathResolver } from './patch-path-resolver';
import type {
  PatchOperationDto,
  PatchOperationType,
  PatchPathResolver,
  PatchPathSchemas,
  ResolvedPatchPath,
  ValidatedPatchOperation,
  ValidatedPatchRequest,
} from './patch-types';

const PATCH_OPERATIONS: readonly PatchOperationType[] = ['add', 'replace', 'remove'];

function isPatchOperationType(op: string): op is PatchOperationType {
  return PATCH_OPERATIONS.some(candidate => candidate === op);
}

// ─── Body decoding ───────────────────────────────────────────────────────────

interface DecodedPatchBody {
  schemas: string[];
  operations: PatchOperationDto[];
}

/** Field lookup ignoring case, as JSON field names are matched on decode */
function field(entries: ReadonlyMap<string, ScimValue>, name: string): ScimValue | undefined {
  const folded = name.toLowerCase();
  for (const [key, value] of entries) {
    if (key.toLowerCase() === folded) {
      return value;
    }
  }
  return undefined;
}

function optionalString(value: ScimValue | undefined, description: string): string {
  if (value === undefined || value.kind === 'null') {
    return '';
  }
  if (value.kind !== 'string') {
    throw invalidSyntax(`Failed to parse request body: ${description} must be a string.`);
  }
  return value.value;
}

export function decodePatchBody(document: ScimValue): DecodedPatchBody {
  if (document.kind !== 'map') {
    throw invalidSyntax('Failed to parse request body.');
  }

  const schemas: string[] = [];
  const rawSchemas = field(document.entries, 'schemas');
  if (rawSchemas && rawSchemas.kind !== 'null') {
    if (rawSchemas.kind !== 'list') {
      throw invalidSyntax('Failed to parse request body: "schemas" must be an array.');
    }
    for (const item of rawSchemas.items) {
      schemas.push(optionalString(item, '"schemas" entry'));
    }
  }

  const operations: PatchOperationDto[] = [];
  const rawOperations = field(document.entries, 'Operations');
  if (rawOperations && rawOperations.kind !== 'null') {
    if (rawOperations.kind !== 'list') {
      throw invalidSyntax('Failed to parse request body: "Operations" must be an array.');
    }
    for (const item of rawOperations.items) {
      if (item.kind !== 'map') {
        throw invalidSyntax('Failed to parse request body: every operation must be an object.');
      }
      operations.push({
        op: optionalString(field(item.entries, 'op'), '"op"'),
        path: optionalString(field(item.entries, 'path'), '"path"'),
        value: field(item.entries, 'value'),
      });
    }
  }

  return { schemas, operations };
}

// ─── Validator ───────────────────────────────────────────────────────────────

export class PatchRequestValidator<TContext = void> {
  constructor(
    private readonly resourceType: ScimResourceType<TContext>,
    private readonly pathResolver: PatchPathResolver = new ScimPatchPathResolver(),
  ) {}

  /**
   * Decode and validate a PATCH body.
   *
   * @throws ScimValidationError - first failure aborts the whole request
   */
  validate(raw: string | Buffer, context: TContext): ValidatedPatchRequest {
    return this.validateDocument(decodeScimJson(raw), context);
  }

  validateDocument(document: ScimValue, context: TContext): ValidatedPatchRequest {
    const body = decodePatchBody(document);

    // The body MUST contain "Operations" with one or more PATCH operations
    if (body.operations.length < 1) {
      throw invalidValue('Zero operations found in request body.');
    }

    const cache = this.resourceType.createResolutionCache(context);
    let pathSchemas: PatchPathSchemas | undefined;
    const schemasForPaths = (): PatchPathSchemas => {
      pathSchemas ??= {
        base: this.resourceType.schemaWithCommon,
        extensions: this.resourceType.getSchemaExtensions(cache),
      };
      return pathSchemas;
    };

    const operations: ValidatedPatchOperation[] = [];
    body.operations.forEach((dto, i) => {
      operations.push(this.validateOperation(dto, i + 1, schemasForPaths, cache));
    });

    return { schemas: body.schemas, operations };
  }

  private validateOperation(
    dto: PatchOperationDto,
    index: number,
    schemasForPaths: () => PatchPathSchemas,
    cache: SchemaResolutionCache<TContext>,
  ): ValidatedPatchOperation {
    const op = dto.op.toLowerCase();
    if (!isPatchOperationType(op)) {
      throw invalidFilter(`Operation number: ${index}, has an unrecognized operation type.`);
    }

    // add / replace without a path merge the value into the resource as a whole
    if (op !== 'remove' && dto.path === '') {
      return {
        op,
        rawPath: dto.path,
        value: dto.value === undefined ? undefined : toCanonical(dto.value),
      };
    }

    const schemas = schemasForPaths();
    let path: ResolvedPatchPath;
    try {
      path = this.pathResolver.resolve(dto.path, schemas);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw invalidPath(`Operation number: ${index}, has failed validation. ${reason}`);
    }

    let validated: ScimAttributeMap;
    try {
      validated = this.resourceType.validateOperationValue(op, path, dto.value, cache);
    } catch (err) {
      if (err instanceof ScimValidationError) {
        throw invalidValue(`Operation number: ${index}, has failed validation. ${err.detail}`);
      }
      throw err;
    }

    return {
      op,
      rawPath: dto.path,
      path,
      value: dto.value === undefined ? undefined : extractOperationValue(path, validated),
    };
  }
}

/**
 * Read the canonical value back out of the validated map, by the same
 * attribute / sub-attribute keys used to build it.
 */
export function extractOperationValue(path: ResolvedPatchPath, validated: ScimAttributeMap): CanonicalValue {
  const top = validated[path.attributeName] ?? null;
  if (!path.subAttributeName) {
    return top;
  }
  if (!isCanonicalRecord(top)) {
    return null;
  }

  const folded = path.subAttributeName.toLowerCase();
  const key = Object.keys(top).find(k => k.toLowerCase() === folded);
  return key === undefined ? null : top[key];
}
