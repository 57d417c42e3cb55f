import { HttpException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { ScimResourceType } from '../../../domain/resource/scim-resource-type';
import { simpleAttribute } from '../../../domain/schema/scim-attribute';
import {
  SCIM_CORE_GROUP_SCHEMA_ID,
  SCIM_CORE_USER_SCHEMA_ID,
  SCIM_ENTERPRISE_USER_SCHEMA_ID,
  ScimSchema,
} from '../../../domain/schema/scim-schema';
import { groupResourceType, userResourceType } from '../../../../test/helpers/fixtures';
import { LogLevel } from '../../logging/log-levels';
import { SCIM_LOGGER_OPTIONS, ScimLogger } from '../../logging/scim-logger.service';
import type { ScimRequestContext } from '../common/scim-types';
import { SCIM_MODULE_OPTIONS } from '../scim-module-options';
import { ScimDiscoveryService } from './scim-discovery.service';

const DEVICE_EXTENSION_ID = 'urn:example:params:scim:schemas:extension:Device';

function deviceResourceType(
  name: string,
  loadSchema: (context: ScimRequestContext) => ScimSchema,
): ScimResourceType<ScimRequestContext> {
  return new ScimResourceType<ScimRequestContext>({
    name,
    endpoint: `/${name}s`,
    schema: new ScimSchema({
      id: `urn:example:params:scim:schemas:${name}`,
      name,
      attributes: [simpleAttribute({ type: 'string', name: 'serial' })],
    }),
    schemaExtensions: [{ schemaId: DEVICE_EXTENSION_ID, required: false, loadSchema }],
  });
}

function tenantSchema(context: ScimRequestContext): ScimSchema {
  return new ScimSchema({
    id: DEVICE_EXTENSION_ID,
    name: `Device extension for ${String(context.headers['x-tenant'])}`,
    attributes: [simpleAttribute({ type: 'string', name: 'assetTag' })],
  });
}

function catchHttpError(fn: () => unknown): HttpException {
  try {
    fn();
  } catch (err) {
    if (err instanceof HttpException) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected an HttpException');
}

describe('ScimDiscoveryService', () => {
  let service: ScimDiscoveryService;
  let loader: jest.Mock<ScimSchema, [ScimRequestContext]>;
  const context: ScimRequestContext = { headers: { 'x-tenant': 'tenant-a' } };

  beforeEach(async () => {
    loader = jest.fn(tenantSchema);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ScimDiscoveryService,
        ScimLogger,
        {
          provide: SCIM_MODULE_OPTIONS,
          useValue: {
            resourceTypes: [
              userResourceType<ScimRequestContext>(),
              groupResourceType<ScimRequestContext>(),
              deviceResourceType('Router', loader),
              deviceResourceType('Switch', loader),
            ],
          },
        },
        { provide: SCIM_LOGGER_OPTIONS, useValue: { level: LogLevel.OFF } },
      ],
    }).compile();

    service = module.get(ScimDiscoveryService);
  });

  describe('getServiceProviderConfig', () => {
    it('should serve the default configuration when none is set', () => {
      const config = service.getServiceProviderConfig();
      expect(config.schemas).toEqual(['urn:ietf:params:scim:schemas:core:2.0:ServiceProviderConfig']);
      expect(config.patch).toEqual({ supported: true });
      expect(config.filter).toEqual({ supported: false, maxResults: 100 });
      expect(config.documentationUri).toBeUndefined();
    });
  });

  describe('listSchemas', () => {
    it('should list every schema once, base schemas before their extensions', () => {
      const response = service.listSchemas(context);

      expect(response.schemas).toEqual(['urn:ietf:params:scim:api:messages:2.0:ListResponse']);
      expect(response.totalResults).toBe(6);
      expect(response.itemsPerPage).toBe(6);
      expect(response.startIndex).toBe(1);
      expect(response.Resources.map(schema => schema.id)).toEqual([
        SCIM_CORE_USER_SCHEMA_ID,
        SCIM_ENTERPRISE_USER_SCHEMA_ID,
        SCIM_CORE_GROUP_SCHEMA_ID,
        'urn:example:params:scim:schemas:Router',
        DEVICE_EXTENSION_ID,
        'urn:example:params:scim:schemas:Switch',
      ]);
    });

    it('should load a shared dynamic extension once with the request context', () => {
      const response = service.listSchemas(context);

      expect(loader).toHaveBeenCalledTimes(1);
      expect(loader).toHaveBeenCalledWith(context);
      expect(response.Resources[4].name).toBe('Device extension for tenant-a');
    });

    it('should not describe the synthesized externalId attribute', () => {
      const [user] = service.listSchemas(context).Resources;
      expect(user.attributes.some(attribute => attribute.name === 'externalId')).toBe(false);
    });
  });

  describe('getSchema', () => {
    it('should return a schema by id', () => {
      expect(service.getSchema(SCIM_CORE_GROUP_SCHEMA_ID, context).name).toBe('Group');
    });

    it('should resolve a dynamic extension for the caller', () => {
      const schema = service.getSchema(DEVICE_EXTENSION_ID, { headers: { 'x-tenant': 'tenant-b' } });
      expect(schema.name).toBe('Device extension for tenant-b');
    });

    it('should throw 404 noTarget for an unknown id', () => {
      const err = catchHttpError(() => service.getSchema('urn:example:unknown', context));
      expect(err.getStatus()).toBe(404);
      expect(err.getResponse()).toEqual({
        schemas: ['urn:ietf:params:scim:api:messages:2.0:Error'],
        detail: 'Resource urn:example:unknown not found.',
        scimType: 'noTarget',
        status: '404',
      });
    });
  });

  describe('resource types', () => {
    it('should list every resource type', () => {
      const response = service.listResourceTypes();
      expect(response.totalResults).toBe(4);
      expect(response.Resources.map(resourceType => resourceType.endpoint)).toEqual([
        '/Users',
        '/Groups',
        '/Routers',
        '/Switchs',
      ]);
    });

    it('should return a resource type by id', () => {
      expect(service.getResourceType('Router')).toEqual({
        schemas: ['urn:ietf:params:scim:schemas:core:2.0:ResourceType'],
        id: 'Router',
        name: 'Router',
        description: '',
        endpoint: '/Routers',
        schema: 'urn:example:params:scim:schemas:Router',
        schemaExtensions: [{ schema: DEVICE_EXTENSION_ID, required: false }],
      });
    });

    it('should match ids exactly', () => {
      expect(catchHttpError(() => service.getResourceType('router')).getStatus()).toBe(404);
    });
  });
});
