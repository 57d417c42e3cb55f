import { DynamicModule, Module } from '@nestjs/common';

import { SCIM_LOGGER_OPTIONS, ScimLogger, type ScimLoggerOptions } from '../logging/scim-logger.service';
import { ScimDiscoveryController } from './controllers/scim-discovery.controller';
import { ScimContentTypeInterceptor } from './interceptors/scim-content-type.interceptor';
import { SCIM_MODULE_OPTIONS, type ScimModuleOptions } from './scim-module-options';
import { ScimDiscoveryService } from './services/scim-discovery.service';
import { ScimValidationService } from './services/scim-validation.service';

@Module({})
export class ScimModule {
  static forRoot(options: ScimModuleOptions): DynamicModule {
    const loggerOptions: ScimLoggerOptions = { level: options.logLevel };

    return {
      module: ScimModule,
      controllers: [ScimDiscoveryController],
      providers: [
        { provide: SCIM_MODULE_OPTIONS, useValue: options },
        { provide: SCIM_LOGGER_OPTIONS, useValue: loggerOptions },
        ScimLogger,
        ScimContentTypeInterceptor,
        ScimValidationService,
        ScimDiscoveryService,
      ],
      exports: [ScimValidationService, ScimDiscoveryService, ScimLogger],
    };
  }
}
