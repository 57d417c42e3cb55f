/**
 * Core SCIM schemas bundled with the engine (RFC 7643 §8.7.1).
 *
 * The definitions are kept as schema description documents and loaded
 * through the same parser used for externally supplied schemas.
 */

import enterpriseUserDocument from './definitions/enterprise-user.schema.json';
import groupDocument from './definitions/group.schema.json';
import userDocument from './definitions/user.schema.json';
import { parseSchemaDescription } from './schema-description';
import type { ScimSchema } from './scim-schema';

export const USER_SCHEMA: ScimSchema = parseSchemaDescription(userDocument);

export const GROUP_SCHEMA: ScimSchema = parseSchemaDescription(groupDocument);

export const ENTERPRISE_USER_SCHEMA: ScimSchema = parseSchemaDescription(enterpriseUserDocument);
