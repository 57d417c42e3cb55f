import { Controller, Get, Param, Req, UseInterceptors } from '@nestjs/common';

import type { ResourceTypeDescription } from '../../../domain/resource/scim-resource-type';
import type { SchemaDescription } from '../../../domain/schema/schema-description';
import type { ScimListResponse, ScimRequestContext } from '../common/scim-types';
import type { ServiceProviderConfigDocument } from '../common/service-provider-config';
import { ScimContentTypeInterceptor } from '../interceptors/scim-content-type.interceptor';
import { ScimDiscoveryService } from '../services/scim-discovery.service';

@Controller()
@UseInterceptors(ScimContentTypeInterceptor)
export class ScimDiscoveryController {
  constructor(private readonly discovery: ScimDiscoveryService) {}

  @Get('ServiceProviderConfig')
  getServiceProviderConfig(): ServiceProviderConfigDocument {
    return this.discovery.getServiceProviderConfig();
  }

  @Get('Schemas')
  listSchemas(@Req() request: ScimRequestContext): ScimListResponse<SchemaDescription> {
    return this.discovery.listSchemas(request);
  }

  @Get('Schemas/:id')
  getSchema(@Param('id') id: string, @Req() request: ScimRequestContext): SchemaDescription {
    return this.discovery.getSchema(id, request);
  }

  @Get('ResourceTypes')
  listResourceTypes(): ScimListResponse<ResourceTypeDescription> {
    return this.discovery.listResourceTypes();
  }

  @Get('ResourceTypes/:id')
  getResourceType(@Param('id') id: string): ResourceTypeDescription {
    return this.discovery.getResourceType(id);
  }
}
