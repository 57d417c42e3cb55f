/**
 * ServiceProviderConfig (RFC 7643 §5).
 *
 * Only the capabilities a deployment can actually change are configurable;
 * PATCH is always supported, bulk / sort / etag / changePassword never are.
 */

import { SCIM_SERVICE_PROVIDER_CONFIG_SCHEMA } from './scim-constants';

export type AuthenticationSchemeType = 'oauth' | 'oauth2' | 'oauthbearertoken' | 'httpbasic' | 'httpdigest';

export interface AuthenticationScheme {
  type: AuthenticationSchemeType;
  name: string;
  description: string;
  specUri?: string;
  documentationUri?: string;
  primary?: boolean;
}

export interface ServiceProviderConfigOptions {
  documentationUri?: string;
  authenticationSchemes?: AuthenticationScheme[];
  /** Upper bound on resources returned per page; defaults to 100 */
  maxResults?: number;
  supportFiltering?: boolean;
}

interface Supported {
  supported: boolean;
}

export interface ServiceProviderConfigDocument {
  schemas: string[];
  documentationUri?: string;
  patch: Supported;
  bulk: Supported & { maxOperations: number; maxPayloadSize: number };
  filter: Supported & { maxResults: number };
  changePassword: Supported;
  sort: Supported;
  etag: Supported;
  authenticationSchemes: AuthenticationScheme[];
}

export const DEFAULT_MAX_RESULTS = 100;

export function toServiceProviderConfigDocument(
  options: ServiceProviderConfigOptions = {},
): ServiceProviderConfigDocument {
  const maxResults =
    options.maxResults !== undefined && options.maxResults > 0 ? options.maxResults : DEFAULT_MAX_RESULTS;

  return {
    schemas: [SCIM_SERVICE_PROVIDER_CONFIG_SCHEMA],
    ...(options.documentationUri ? { documentationUri: options.documentationUri } : {}),
    patch: { supported: true },
    bulk: { supported: false, maxOperations: 1000, maxPayloadSize: 1048576 },
    filter: { supported: options.supportFiltering ?? false, maxResults },
    changePassword: { supported: false },
    sort: { supported: false },
    etag: { supported: false },
    authenticationSchemes: [...(options.authenticationSchemes ?? [])],
  };
}
