import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import type { Response } from 'express';

import { SCIM_CONTENT_TYPE } from '../common/scim-constants';

/**
 * Sets `Content-Type: application/scim+json` on every successful discovery
 * response.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7644#section-3.1
 */
@Injectable()
export class ScimContentTypeInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(
      tap(() => {
        const response = context.switchToHttp().getResponse<Response>();
        if (!response.headersSent) {
          response.setHeader('Content-Type', SCIM_CONTENT_TYPE);
        }
      })
    );
  }
}
