import { HttpException } from '@nestjs/common';

import type { ScimValidationError } from '../../../domain/errors/scim-validation-error';
import { SCIM_ERROR_SCHEMA } from './scim-constants';

export interface ScimErrorOptions {
  status: number;
  detail: string;
  scimType?: string;
}

export function createScimError({ status, detail, scimType }: ScimErrorOptions): HttpException {
  return new HttpException(
    {
      schemas: [SCIM_ERROR_SCHEMA],
      detail,
      scimType,
      // RFC 7644 §3.12: "status" MUST be a string (the HTTP status code as text)
      status: String(status)
    },
    status
  );
}

/** Wrap a domain validation failure in the SCIM error envelope */
export function toScimHttpException(error: ScimValidationError): HttpException {
  return createScimError({ status: error.status, detail: error.detail, scimType: error.scimType });
}
