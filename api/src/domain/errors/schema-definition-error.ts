/**
 * Raised while building attributes or schemas (startup / configuration time).
 *
 * Unlike ScimValidationError this is not a client error: it means the service
 * was configured with an invalid schema and should refuse to start.
 */
export class SchemaDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}
