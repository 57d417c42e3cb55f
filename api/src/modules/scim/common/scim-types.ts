import type { IncomingHttpHeaders } from 'node:http';

export interface ScimListResponse<T> {
  schemas: string[];
  totalResults: number;
  itemsPerPage: number;
  startIndex: number;
  Resources: T[];
}

/**
 * What a dynamic schema loader gets to see of the current request.
 * An express Request satisfies it.
 */
export interface ScimRequestContext {
  headers: IncomingHttpHeaders;
}
