/**
 * Fixture factories for specs.
 *
 * Every factory returns a fresh object with unique values (using a counter)
 * and accepts an `overrides` spread so individual tests can tweak fields.
 * `json()` turns a fixture into the raw body the validators decode.
 */

import { ENTERPRISE_USER_SCHEMA, GROUP_SCHEMA, USER_SCHEMA } from '../../src/domain/schema/core-schemas';
import { ScimResourceType } from '../../src/domain/resource/scim-resource-type';
import {
  SCIM_CORE_GROUP_SCHEMA_ID,
  SCIM_CORE_USER_SCHEMA_ID,
  SCIM_ENTERPRISE_USER_SCHEMA_ID,
} from '../../src/domain/schema/scim-schema';

let counter = 0;

function nextId(): number {
  return ++counter;
}

/** Reset the counter between test suites if needed. */
export function resetFixtureCounter(): void {
  counter = 0;
}

export function json(body: unknown): string {
  return JSON.stringify(body);
}

// ────────────────────── Resource types ──────────────────────

export function userResourceType<TContext = void>(enterpriseRequired = false): ScimResourceType<TContext> {
  return new ScimResourceType<TContext>({
    id: 'User',
    name: 'User',
    description: 'User Account',
    endpoint: '/Users',
    schema: USER_SCHEMA,
    schemaExtensions: [{ schema: ENTERPRISE_USER_SCHEMA, required: enterpriseRequired }],
  });
}

export function groupResourceType<TContext = void>(): ScimResourceType<TContext> {
  return new ScimResourceType<TContext>({
    id: 'Group',
    name: 'Group',
    description: 'Group',
    endpoint: '/Groups',
    schema: GROUP_SCHEMA,
  });
}

// ────────────────────── Users ──────────────────────

export interface UserFixture {
  schemas: string[];
  userName: string;
  externalId?: string;
  active?: unknown;
  name?: { givenName?: string; familyName?: string };
  emails?: Array<{ value: string; type?: string; primary?: unknown }>;
  [key: string]: unknown;
}

export function validUser(overrides: Partial<UserFixture> = {}): UserFixture {
  const n = nextId();
  return {
    schemas: [SCIM_CORE_USER_SCHEMA_ID],
    userName: `user${n}@example.com`,
    externalId: `ext-user-${n}`,
    active: true,
    name: { givenName: 'Test', familyName: `User${n}` },
    emails: [{ value: `user${n}@example.com`, type: 'work', primary: true }],
    ...overrides,
  };
}

export function enterpriseUser(overrides: Partial<UserFixture> = {}): UserFixture {
  return validUser({
    schemas: [SCIM_CORE_USER_SCHEMA_ID, SCIM_ENTERPRISE_USER_SCHEMA_ID],
    [SCIM_ENTERPRISE_USER_SCHEMA_ID]: {
      employeeNumber: '701984',
      department: 'Tour Operations',
      manager: { value: 'mgr-1' },
    },
    ...overrides,
  });
}

// ────────────────────── Groups ──────────────────────

export interface GroupFixture {
  schemas: string[];
  displayName: string;
  externalId?: string;
  members?: Array<{ value: string; display?: string; type?: string }>;
  [key: string]: unknown;
}

export function validGroup(overrides: Partial<GroupFixture> = {}): GroupFixture {
  const n = nextId();
  return {
    schemas: [SCIM_CORE_GROUP_SCHEMA_ID],
    displayName: `Group ${n}`,
    ...overrides,
  };
}

// ────────────────────── PATCH Operations ──────────────────────

export interface PatchFixture {
  schemas: string[];
  Operations: Array<{ op: string; path?: string; value?: unknown }>;
}

export function patchOp(
  operations: Array<{ op: string; path?: string; value?: unknown }>,
): PatchFixture {
  return {
    schemas: ['urn:ietf:params:scim:api:messages:2.0:PatchOp'],
    Operations: operations,
  };
}

export function deactivateUserPatch(): PatchFixture {
  return patchOp([{ op: 'replace', path: 'active', value: false }]);
}

export function addMemberPatch(userId: string): PatchFixture {
  return patchOp([{ op: 'add', path: 'members', value: [{ value: userId }] }]);
}

export function removeMemberPatch(userId: string): PatchFixture {
  return patchOp([{ op: 'remove', path: `members[value eq "${userId}"]` }]);
}
