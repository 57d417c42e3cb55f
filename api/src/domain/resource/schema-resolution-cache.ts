import { SchemaDefinitionError } from '../errors/schema-definition-error';
import type { ScimSchema } from '../schema/scim-schema';

/** Loads an extension schema for the current request (e.g. from tenant config) */
export type SchemaLoader<TContext> = (context: TContext) => ScimSchema;

export interface StaticSchemaExtension {
  schema: ScimSchema;
  /** A resource of this type MUST include the extension when true */
  required: boolean;
}

export interface DynamicSchemaExtension<TContext> {
  /** URI the extension payload is nested under */
  schemaId: string;
  required: boolean;
  loadSchema: SchemaLoader<TContext>;
}

export type SchemaExtension<TContext> = StaticSchemaExtension | DynamicSchemaExtension<TContext>;

export function isDynamicExtension<TContext>(
  extension: SchemaExtension<TContext>,
): extension is DynamicSchemaExtension<TContext> {
  return 'loadSchema' in extension;
}

export function extensionSchemaId<TContext>(extension: SchemaExtension<TContext>): string {
  return isDynamicExtension(extension) ? extension.schemaId : extension.schema.id;
}

/**
 * Per-call memo of resolved extension schemas.
 *
 * Create one per validation call and drop it afterwards: a dynamic loader then
 * runs at most once per schema URI for that call, however many times path
 * resolution and value validation ask for the schema.
 *
 * A loaded schema must carry the URI it was configured under, since paths
 * resolved against it are matched back to the extension by that id.
 */
export class SchemaResolutionCache<TContext> {
  private readonly resolved = new Map<string, ScimSchema>();

  constructor(readonly context: TContext) {}

  resolve(extension: SchemaExtension<TContext>): ScimSchema {
    if (!isDynamicExtension(extension)) {
      return extension.schema;
    }

    const key = extension.schemaId.toLowerCase();
    const cached = this.resolved.get(key);
    if (cached) {
      return cached;
    }

    const schema = extension.loadSchema(this.context);
    if (schema.id.toLowerCase() !== key) {
      throw new SchemaDefinitionError(
        `Loaded schema "${schema.id}" does not match extension schema id "${extension.schemaId}".`,
      );
    }
    this.resolved.set(key, schema);
    return schema;
  }
}
