import { Inject, Injectable } from '@nestjs/common';

import {
  SchemaResolutionCache,
  extensionSchemaId,
} from '../../../domain/resource/schema-resolution-cache';
import type { ResourceTypeDescription } from '../../../domain/resource/scim-resource-type';
import type { SchemaDescription } from '../../../domain/schema/schema-description';
import type { ScimSchema } from '../../../domain/schema/scim-schema';
import { LogCategory } from '../../logging/log-levels';
import { ScimLogger } from '../../logging/scim-logger.service';
import { SCIM_LIST_RESPONSE_SCHEMA } from '../common/scim-constants';
import { createScimError } from '../common/scim-errors';
import type { ScimListResponse, ScimRequestContext } from '../common/scim-types';
import {
  toServiceProviderConfigDocument,
  type ServiceProviderConfigDocument,
} from '../common/service-provider-config';
import { SCIM_MODULE_OPTIONS, type ScimModuleOptions } from '../scim-module-options';

/**
 * /ServiceProviderConfig, /Schemas and /ResourceTypes (RFC 7644 §4).
 *
 * Schemas are collected from every resource type, base schema first then its
 * extensions; an id seen before is skipped. Dynamic extensions are loaded
 * with the request context, once per URI per call.
 */
@Injectable()
export class ScimDiscoveryService {
  constructor(
    @Inject(SCIM_MODULE_OPTIONS)
    private readonly options: ScimModuleOptions,
    private readonly logger: ScimLogger,
  ) {}

  getServiceProviderConfig(): ServiceProviderConfigDocument {
    return toServiceProviderConfigDocument(this.options.serviceProviderConfig);
  }

  listSchemas(context: ScimRequestContext): ScimListResponse<SchemaDescription> {
    const schemas = this.collectSchemas(context).map(schema => schema.toDescription());
    this.logger.debug(LogCategory.SCIM_DISCOVERY, 'List schemas', { totalResults: schemas.length });
    return toListResponse(schemas);
  }

  getSchema(id: string, context: ScimRequestContext): SchemaDescription {
    const schema = this.collectSchemas(context).find(candidate => candidate.id === id);
    if (!schema) {
      this.logger.debug(LogCategory.SCIM_DISCOVERY, 'Schema not found', { id });
      throw createScimError({ status: 404, scimType: 'noTarget', detail: `Resource ${id} not found.` });
    }
    return schema.toDescription();
  }

  listResourceTypes(): ScimListResponse<ResourceTypeDescription> {
    const resourceTypes = this.options.resourceTypes.map(resourceType => resourceType.toDescription());
    this.logger.debug(LogCategory.SCIM_DISCOVERY, 'List resource types', { totalResults: resourceTypes.length });
    return toListResponse(resourceTypes);
  }

  getResourceType(id: string): ResourceTypeDescription {
    const resourceType = this.options.resourceTypes.find(candidate => candidate.id === id);
    if (!resourceType) {
      this.logger.debug(LogCategory.SCIM_DISCOVERY, 'Resource type not found', { id });
      throw createScimError({ status: 404, scimType: 'noTarget', detail: `Resource ${id} not found.` });
    }
    return resourceType.toDescription();
  }

  private collectSchemas(context: ScimRequestContext): ScimSchema[] {
    const cache = new SchemaResolutionCache(context);
    const seen = new Set<string>();
    const schemas: ScimSchema[] = [];

    for (const resourceType of this.options.resourceTypes) {
      if (!seen.has(resourceType.schema.id)) {
        seen.add(resourceType.schema.id);
        schemas.push(resourceType.schema);
      }
      for (const extension of resourceType.schemaExtensions) {
        const id = extensionSchemaId(extension);
        if (!seen.has(id)) {
          seen.add(id);
          schemas.push(cache.resolve(extension));
        }
      }
    }

    return schemas;
  }
}

function toListResponse<T>(resources: T[]): ScimListResponse<T> {
  return {
    schemas: [SCIM_LIST_RESPONSE_SCHEMA],
    totalResults: resources.length,
    itemsPerPage: resources.length,
    startIndex: 1,
    Resources: resources,
  };
}
