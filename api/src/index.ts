import 'reflect-metadata';

export * from './domain';

export { ScimModule } from './modules/scim/scim.module';
export { SCIM_MODULE_OPTIONS } from './modules/scim/scim-module-options';
export type { ScimModuleOptions } from './modules/scim/scim-module-options';
export { ScimValidationService } from './modules/scim/services/scim-validation.service';
export type { ScimRequestBody } from './modules/scim/services/scim-validation.service';
export { ScimDiscoveryService } from './modules/scim/services/scim-discovery.service';
export { ScimDiscoveryController } from './modules/scim/controllers/scim-discovery.controller';
export { ScimContentTypeInterceptor } from './modules/scim/interceptors/scim-content-type.interceptor';
export { createScimError, toScimHttpException } from './modules/scim/common/scim-errors';
export type { ScimErrorOptions } from './modules/scim/common/scim-errors';
export {
  SCIM_CONTENT_TYPE,
  SCIM_ERROR_SCHEMA,
  SCIM_LIST_RESPONSE_SCHEMA,
  SCIM_PATCH_SCHEMA,
  SCIM_SERVICE_PROVIDER_CONFIG_SCHEMA,
} from './modules/scim/common/scim-constants';
export { DEFAULT_MAX_RESULTS, toServiceProviderConfigDocument } from './modules/scim/common/service-provider-config';
export type {
  AuthenticationScheme,
  AuthenticationSchemeType,
  ServiceProviderConfigDocument,
  ServiceProviderConfigOptions,
} from './modules/scim/common/service-provider-config';
export type { ScimListResponse, ScimRequestContext } from './modules/scim/common/scim-types';

export { ScimLogger, SCIM_LOGGER_OPTIONS } from './modules/logging/scim-logger.service';
export type { ScimLoggerOptions, LogData } from './modules/logging/scim-logger.service';
export { LogLevel, LogCategory, parseLogLevel } from './modules/logging/log-levels';
