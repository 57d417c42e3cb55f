import { Inject, Injectable } from '@nestjs/common';

import { ScimValidationError } from '../../../domain/errors/scim-validation-error';
import { PatchRequestValidator } from '../../../domain/patch/patch-request-validator';
import type { ValidatedPatchRequest } from '../../../domain/patch/patch-types';
import type { ScimResourceType } from '../../../domain/resource/scim-resource-type';
import {
  decodeScimJson,
  toScimValue,
  type ScimAttributeMap,
  type ScimValue,
} from '../../../domain/schema/scim-value';
import { LogCategory } from '../../logging/log-levels';
import { ScimLogger } from '../../logging/scim-logger.service';
import { createScimError, toScimHttpException } from '../common/scim-errors';
import type { ScimRequestContext } from '../common/scim-types';
import { SCIM_MODULE_OPTIONS, type ScimModuleOptions } from '../scim-module-options';

/** Raw bytes, or a body the HTTP layer already parsed */
export type ScimRequestBody = string | Buffer | Record<string, unknown>;

/**
 * Validates POST / PUT / PATCH bodies against the configured resource types
 * and turns domain failures into SCIM error responses.
 */
@Injectable()
export class ScimValidationService {
  private readonly patchValidators = new Map<string, PatchRequestValidator<ScimRequestContext>>();

  constructor(
    @Inject(SCIM_MODULE_OPTIONS)
    private readonly options: ScimModuleOptions,
    private readonly logger: ScimLogger,
  ) {}

  /** Look a resource type up by id, name or endpoint (case-insensitive) */
  getResourceType(identifier: string): ScimResourceType<ScimRequestContext> {
    const folded = identifier.toLowerCase();
    const resourceType = this.options.resourceTypes.find(
      candidate =>
        candidate.id.toLowerCase() === folded ||
        candidate.name.toLowerCase() === folded ||
        candidate.endpoint.toLowerCase() === folded,
    );
    if (!resourceType) {
      throw createScimError({ status: 404, scimType: 'noTarget', detail: `Resource type ${identifier} not found.` });
    }
    return resourceType;
  }

  validateCreate(resourceTypeId: string, body: ScimRequestBody, context: ScimRequestContext): ScimAttributeMap {
    const resourceType = this.getResourceType(resourceTypeId);
    this.logger.debug(LogCategory.SCIM_VALIDATION, 'Validate create', { resourceType: resourceType.id });

    return this.translate(LogCategory.SCIM_VALIDATION, resourceType, () =>
      resourceType.validateDocument(decodeBody(body), resourceType.createResolutionCache(context), false),
    );
  }

  validateReplace(resourceTypeId: string, body: ScimRequestBody, context: ScimRequestContext): ScimAttributeMap {
    const resourceType = this.getResourceType(resourceTypeId);
    this.logger.debug(LogCategory.SCIM_VALIDATION, 'Validate replace', { resourceType: resourceType.id });

    return this.translate(LogCategory.SCIM_VALIDATION, resourceType, () =>
      resourceType.validateDocument(decodeBody(body), resourceType.createResolutionCache(context), true),
    );
  }

  validatePatch(resourceTypeId: string, body: ScimRequestBody, context: ScimRequestContext): ValidatedPatchRequest {
    const resourceType = this.getResourceType(resourceTypeId);
    const validator = this.patchValidatorFor(resourceType);

    const result = this.translate(LogCategory.SCIM_PATCH, resourceType, () =>
      validator.validateDocument(decodeBody(body), context),
    );

    this.logger.info(LogCategory.SCIM_PATCH, 'Patch validated', {
      resourceType: resourceType.id,
      opCount: result.operations.length,
    });
    this.logger.trace(LogCategory.SCIM_PATCH, 'Patch operations', {
      operations: result.operations.map(op => ({ op: op.op, path: op.rawPath })),
    });
    return result;
  }

  private patchValidatorFor(resourceType: ScimResourceType<ScimRequestContext>): PatchRequestValidator<ScimRequestContext> {
    let validator = this.patchValidators.get(resourceType.id);
    if (!validator) {
      validator = this.options.pathResolver
        ? new PatchRequestValidator(resourceType, this.options.pathResolver)
        : new PatchRequestValidator(resourceType);
      this.patchValidators.set(resourceType.id, validator);
    }
    return validator;
  }

  private translate<T>(
    category: LogCategory,
    resourceType: ScimResourceType<ScimRequestContext>,
    validate: () => T,
  ): T {
    try {
      return validate();
    } catch (err) {
      if (err instanceof ScimValidationError) {
        this.logger.info(category, 'Request rejected', {
          resourceType: resourceType.id,
          scimType: err.scimType,
          detail: err.detail,
        });
        throw toScimHttpException(err);
      }
      this.logger.error(category, 'Validation failed unexpectedly', {
        resourceType: resourceType.id,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }
}

function decodeBody(body: ScimRequestBody): ScimValue {
  return typeof body === 'string' || Buffer.isBuffer(body) ? decodeScimJson(body) : toScimValue(body);
}
