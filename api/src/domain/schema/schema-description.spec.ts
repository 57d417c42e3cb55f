import { SchemaDefinitionError } from '../errors/schema-definition-error';
import { ENTERPRISE_USER_SCHEMA, GROUP_SCHEMA, USER_SCHEMA } from './core-schemas';
import { parseSchemaDescription } from './schema-description';
import {
  SCIM_CORE_GROUP_SCHEMA_ID,
  SCIM_CORE_USER_SCHEMA_ID,
  SCIM_ENTERPRISE_USER_SCHEMA_ID,
  type ScimSchema,
} from './scim-schema';

function attributeDocument(overrides: Record<string, unknown> = {}) {
  return {
    name: 'title',
    type: 'string',
    multiValued: false,
    description: 'The title',
    required: false,
    caseExact: false,
    mutability: 'readWrite',
    returned: 'default',
    uniqueness: 'none',
    ...overrides,
  };
}

describe('schema description documents', () => {
  describe('bundled core schemas', () => {
    it('should load the RFC 7643 schemas', () => {
      expect(USER_SCHEMA.id).toBe(SCIM_CORE_USER_SCHEMA_ID);
      expect(USER_SCHEMA.name).toBe('User');
      expect(GROUP_SCHEMA.id).toBe(SCIM_CORE_GROUP_SCHEMA_ID);
      expect(ENTERPRISE_USER_SCHEMA.id).toBe(SCIM_ENTERPRISE_USER_SCHEMA_ID);
    });

    it('should carry the User attribute characteristics', () => {
      const userName = USER_SCHEMA.findAttribute('userName');
      expect(userName?.required).toBe(true);
      expect(userName?.uniqueness).toBe('server');

      const password = USER_SCHEMA.findAttribute('password');
      expect(password?.mutability).toBe('writeOnly');
      expect(password?.returned).toBe('never');

      expect(USER_SCHEMA.findAttribute('groups')?.mutability).toBe('readOnly');
      expect(USER_SCHEMA.findAttribute('emails')?.multiValued).toBe(true);
      expect(USER_SCHEMA.findAttribute('active')?.type).toBe('boolean');
    });

    it('should describe Group members with immutable value and readOnly display', () => {
      const members = GROUP_SCHEMA.findAttribute('members');
      expect(members?.findSubAttribute('value')?.mutability).toBe('immutable');
      expect(members?.findSubAttribute('display')?.mutability).toBe('readOnly');
      expect(members?.findSubAttribute('$ref')?.type).toBe('reference');
    });

    it('should describe the enterprise manager as a complex attribute', () => {
      const manager = ENTERPRISE_USER_SCHEMA.findAttribute('manager');
      expect(manager?.type).toBe('complex');
      expect(manager?.subAttributes.map(sub => sub.name)).toEqual(['value', '$ref', 'displayName']);
    });
  });

  describe('round trip', () => {
    it.each<[string, ScimSchema]>([
      ['User', USER_SCHEMA],
      ['Group', GROUP_SCHEMA],
      ['EnterpriseUser', ENTERPRISE_USER_SCHEMA],
    ])('should reproduce the %s schema', (_label, schema) => {
      const description = schema.toDescription();
      const reparsed = parseSchemaDescription(description);

      expect(reparsed.toDescription()).toEqual(description);
      reparsed.attributes.forEach((attribute, i) => {
        const original = schema.attributes[i];
        expect(attribute.name).toBe(original.name);
        expect(attribute.type).toBe(original.type);
        expect(attribute.multiValued).toBe(original.multiValued);
        expect(attribute.mutability).toBe(original.mutability);
        expect(attribute.returned).toBe(original.returned);
      });
    });

    it('should survive a JSON round trip', () => {
      const text = JSON.stringify(USER_SCHEMA.toDescription());
      expect(parseSchemaDescription(JSON.parse(text)).toDescription()).toEqual(USER_SCHEMA.toDescription());
    });
  });

  describe('parseSchemaDescription', () => {
    it('should build attributes with defaults for omitted optional fields', () => {
      const schema = parseSchemaDescription({
        id: 'urn:example:Thing',
        attributes: [attributeDocument({ description: undefined, caseExact: undefined, uniqueness: undefined })],
      });
      const title = schema.findAttribute('title');
      expect(schema.name).toBe('');
      expect(title?.description).toBe('');
      expect(title?.caseExact).toBe(false);
      expect(title?.uniqueness).toBe('none');
    });

    it('should reject a document that is not an object', () => {
      expect(() => parseSchemaDescription('User')).toThrow(SchemaDefinitionError);
    });

    it('should reject an empty id', () => {
      expect(() => parseSchemaDescription({ id: '', attributes: [] })).toThrow(/^Invalid schema description: id: /);
    });

    it('should name the path of an invalid field', () => {
      expect(() =>
        parseSchemaDescription({ id: 'urn:example:Thing', attributes: [attributeDocument({ type: 'text' })] }),
      ).toThrow(/attributes\.0\.type: /);
    });

    it('should reject sub-attributes on a simple attribute', () => {
      expect(() =>
        parseSchemaDescription({
          id: 'urn:example:Thing',
          attributes: [attributeDocument({ subAttributes: [attributeDocument({ name: 'value' })] })],
        }),
      ).toThrow('Attribute "title" of type string cannot have sub-attributes.');
    });

    it('should reject a complex attribute nested in a complex attribute', () => {
      expect(() =>
        parseSchemaDescription({
          id: 'urn:example:Thing',
          attributes: [
            attributeDocument({
              name: 'outer',
              type: 'complex',
              subAttributes: [attributeDocument({ name: 'inner', type: 'complex' })],
            }),
          ],
        }),
      ).toThrow(SchemaDefinitionError);
    });

    it('should reject duplicate sub-attribute names', () => {
      expect(() =>
        parseSchemaDescription({
          id: 'urn:example:Thing',
          attributes: [
            attributeDocument({
              name: 'outer',
              type: 'complex',
              subAttributes: [attributeDocument({ name: 'value' }), attributeDocument({ name: 'VALUE' })],
            }),
          ],
        }),
      ).toThrow('Duplicate name "value" for sub-attributes 0 and 1 of "outer".');
    });
  });
});
