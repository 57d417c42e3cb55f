import { ScimContentTypeInterceptor } from './scim-content-type.interceptor';
import { ExecutionContext, CallHandler } from '@nestjs/common';
import { of } from 'rxjs';

function mockContext(headersSent: boolean, setHeader: jest.Mock): ExecutionContext {
  return {
    switchToHttp: () => ({
      getResponse: () => ({ headersSent, setHeader }),
    }),
  } as unknown as ExecutionContext;
}

describe('ScimContentTypeInterceptor', () => {
  let interceptor: ScimContentTypeInterceptor;

  beforeEach(() => {
    interceptor = new ScimContentTypeInterceptor();
  });

  it('should set Content-Type header to application/scim+json', (done) => {
    const setHeader = jest.fn();
    const handler: CallHandler = {
      handle: () => of({ id: 'urn:ietf:params:scim:schemas:core:2.0:User', name: 'User' }),
    };

    interceptor.intercept(mockContext(false, setHeader), handler).subscribe({
      next: () => {
        expect(setHeader).toHaveBeenCalledWith('Content-Type', 'application/scim+json; charset=utf-8');
      },
      complete: () => done(),
    });
  });

  it('should not set header if response already sent', (done) => {
    const setHeader = jest.fn();
    const handler: CallHandler = { handle: () => of({ id: 'User' }) };

    interceptor.intercept(mockContext(true, setHeader), handler).subscribe({
      next: () => {
        expect(setHeader).not.toHaveBeenCalled();
      },
      complete: () => done(),
    });
  });

  it('should pass list responses through unchanged', (done) => {
    const setHeader = jest.fn();
    const listResponse = {
      schemas: ['urn:ietf:params:scim:api:messages:2.0:ListResponse'],
      totalResults: 1,
      itemsPerPage: 1,
      startIndex: 1,
      Resources: [{ id: 'Group', name: 'Group', endpoint: '/Groups' }],
    };
    const handler: CallHandler = { handle: () => of(listResponse) };

    interceptor.intercept(mockContext(false, setHeader), handler).subscribe({
      next: (result) => {
        expect(result).toEqual(listResponse);
        expect(setHeader).toHaveBeenCalledTimes(1);
      },
      complete: () => done(),
    });
  });
});
