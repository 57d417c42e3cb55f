import type { PatchPathResolver } from '../../domain/patch/patch-types';
import type { ScimResourceType } from '../../domain/resource/scim-resource-type';
import type { LogLevel } from '../logging/log-levels';
import type { ScimRequestContext } from './common/scim-types';
import type { ServiceProviderConfigOptions } from './common/service-provider-config';

export const SCIM_MODULE_OPTIONS = 'SCIM_MODULE_OPTIONS';

export interface ScimModuleOptions {
  /** Resource types served; dynamic extension loaders receive the request */
  resourceTypes: ScimResourceType<ScimRequestContext>[];
  /** Replaces the built-in ScimPatchPathResolver */
  pathResolver?: PatchPathResolver;
  /** Falls back to SCIM_LOG_LEVEL, then info */
  logLevel?: LogLevel;
  /** Served at /ServiceProviderConfig */
  serviceProviderConfig?: ServiceProviderConfigOptions;
}
