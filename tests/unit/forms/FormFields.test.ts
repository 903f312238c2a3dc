import { describe, it, expect } from '@jest/globals';
import { getFormFields, isSecretKey, maskSecrets, SECRET_MASK } from '../../../src/forms/FormFields.js';
import { parseSchemaDocument } from '../../../src/schema/SchemaDocument.js';
import { readShippedSchema } from '../../helpers/schemas.js';

describe('getFormFields', () => {
  it('should list the connection fields in propertyOrder', () => {
    const fields = getFormFields(parseSchemaDocument(readShippedSchema('configSchema.json')));

    expect(fields.map((f) => f.key)).toEqual(['hostname', 'port', 'user', '#pass', '#private_key']);
    expect(fields.map((f) => f.widget)).toEqual(['text', 'number', 'text', 'password', 'textarea']);
    expect(fields.map((f) => f.secret)).toEqual([false, false, false, true, true]);
    expect(fields.every((f) => f.required)).toBe(true);
  });

  it('should describe the port field', () => {
    const fields = getFormFields(parseSchemaDocument(readShippedSchema('configSchema.json')));
    expect(fields[1]).toEqual({
      key: 'port',
      title: 'Port',
      description: undefined,
      type: 'integer',
      required: true,
      defaultValue: 22,
      propertyOrder: 2,
      secret: false,
      widget: 'number',
    });
  });

  it('should put unordered fields last in declaration order', () => {
    const document = parseSchemaDocument({
      type: 'object',
      properties: {
        z: { type: 'boolean' },
        a: { type: 'string', propertyOrder: 2 },
        b: { type: 'number', propertyOrder: 1 },
        c: { type: 'string' },
      },
    });
    const fields = getFormFields(document);

    expect(fields.map((f) => f.key)).toEqual(['b', 'a', 'z', 'c']);
    expect(fields[2]?.widget).toBe('checkbox');
    expect(fields[2]?.title).toBe('z');
    expect(fields[2]?.required).toBe(false);
  });
});

describe('secrets', () => {
  it('should treat #-prefixed keys as secrets', () => {
    expect(isSecretKey('#pass')).toBe(true);
    expect(isSecretKey('pass')).toBe(false);
  });

  it('should mask non-empty secrets, nested ones included', () => {
    expect(
      maskSecrets({
        user: 'writer',
        '#pass': 'test-secret',
        '#private_key': '',
        nested: { '#token': 'test-token', host: 'sftp.example.com' },
        list: ['#not-a-key'],
      })
    ).toEqual({
      user: 'writer',
      '#pass': SECRET_MASK,
      '#private_key': '',
      nested: { '#token': '*****', host: 'sftp.example.com' },
      list: ['#not-a-key'],
    });
  });
});
