/**
 * Domain PATCH validation — barrel export
 */
export { PatchRequestValidator, decodePatchBody, extractOperationValue } from './patch-request-validator';
export { ScimPatchPathResolver, PatchPathError } from './patch-path-resolver';

export type {
  PatchOperationDto,
  ResolvedPatchPath,
  PatchPathSchemas,
  PatchPathResolver,
  ValidatedPatchOperation,
  ValidatedPatchRequest,
} from './patch-types';
