import type { JSONSchema } from '~/types';
import assert from 'node:assert/strict';
import { invalid, valid } from '~/combinators';
import { Schema, validate } from '~/schema';

const errors = (...messages: string[]) => ({ valid: false, errors: messages });
const VALID = { valid: true };

describe('validate', () => {
  describe('numbers', () => {
    const schema: JSONSchema = { type: 'integer', minimum: 0 };

    it('should accept an integer above the minimum', () => {
      assert.deepEqual(validate(5, schema), VALID);
    });

    it('should reject an integer below the minimum', () => {
      assert.deepEqual(validate(-1, schema), errors('Value must be >= 0'));
    });

    it('should reject a fractional number and report every violation', () => {
      assert.deepEqual(validate(-1.5, schema), errors('Value must be of type: integer', 'Value must be >= 0'));
    });

    it('should switch to a strict comparison with exclusiveMinimum', () => {
      assert.deepEqual(validate(0, { minimum: 0, exclusiveMinimum: true }), errors('Value must be > 0'));
      assert.deepEqual(validate(3, { maximum: 3, exclusiveMaximum: true }), errors('Value must be < 3'));
      assert.deepEqual(validate(3, { maximum: 3, exclusiveMaximum: false }), VALID);
    });

    it('should validate multipleOf', () => {
      assert.deepEqual(validate(7.5, { multipleOf: 2.5 }), VALID);
      assert.deepEqual(validate(7, { multipleOf: 2.5 }), errors('Value must be multiple of 2.5'));
    });
  });

  describe('strings', () => {
    it('should report violations in keyword order', () => {
      const schema: JSONSchema = { type: 'string', minLength: 3, pattern: '^\\d+$' };
      assert.deepEqual(validate('ab', schema), errors('String length must be >= 3', 'String must match pattern: ^\\d+$'));
    });

    it('should fail on a pattern that is not a valid regular expression', () => {
      assert.deepEqual(validate('a', { pattern: '(' }), errors('Invalid regular expression: ('));
    });
  });

  describe('type', () => {
    it('should reject every value for an unknown type', () => {
      assert.deepEqual(validate('x', { type: 'foo' }), errors('Value must be of type: (none)'));
      assert.deepEqual(validate(null, { type: 'foo' }), errors('Value must be of type: (none)'));
    });

    it('should accept any of a list of types', () => {
      assert.deepEqual(validate(null, { type: ['string', 'null'] }), VALID);
      assert.deepEqual(validate(1, { type: ['string', 'null'] }), errors('Value must be of type: string, null'));
    });
  });

  describe('keywords that do not apply', () => {
    it('should pass values of another kind', () => {
      const schema: JSONSchema = { minLength: 10, maxItems: 0, required: ['a'], minimum: 100 };
      assert.deepEqual(validate(true, schema), VALID);
      assert.deepEqual(validate(null, schema), VALID);
      assert.deepEqual(validate('short', { ...schema, minLength: 1 }), VALID);
    });

    it('should accept everything with an empty schema', () => {
      assert.deepEqual(validate({ any: ['thing'] }, {}), VALID);
    });
  });

  describe('boolean schemas', () => {
    it('should accept everything with true and nothing with false', () => {
      assert.deepEqual(validate(1, true), VALID);
      assert.deepEqual(validate(1, false), errors('Value is not permitted by a false schema'));
    });

    it('should apply boolean sub-schemas', () => {
      assert.deepEqual(validate({ a: 1 }, { properties: { a: false } }), errors('Value is not permitted by a false schema'));
      assert.deepEqual(validate({ b: 1 }, { properties: { a: false } }), VALID);
    });
  });

  describe('enum', () => {
    it('should match structurally equal values', () => {
      const schema: JSONSchema = { enum: [{ a: [1, 2] }, 'x'] };
      assert.deepEqual(validate({ a: [1, 2] }, schema), VALID);
      assert.deepEqual(validate({ a: [2, 1] }, schema), errors('Value must be one of: {"a":[1,2]}, "x"'));
    });

    it('should treat negative zero as equal to zero', () => {
      assert.deepEqual(validate(JSON.parse('-0'), { enum: [0] }), VALID);
      assert.deepEqual(validate(JSON.parse('{"n":-0}'), { enum: [{ n: 0 }] }), VALID);
    });
  });

  describe('arrays', () => {
    it('should validate every item against a single schema', () => {
      assert.deepEqual(validate([1, 'a', 2], { items: { type: 'number' } }), errors('Value must be of type: number'));
    });

    it('should allow extra items when additionalItems is absent', () => {
      assert.deepEqual(validate(['a', 1], { items: [{ type: 'string' }] }), VALID);
    });

    it('should reject extra items when additionalItems is false', () => {
      const schema: JSONSchema = { items: [{ type: 'string' }], additionalItems: false };
      assert.deepEqual(validate(['a', 1], schema), errors('Additional item at index 1 is not permitted in this array'));
    });

    it('should validate extra items against an additionalItems schema', () => {
      const schema: JSONSchema = { items: [{ type: 'string' }], additionalItems: { type: 'boolean' } };
      assert.deepEqual(validate(['a', true, 2], schema), errors('Value must be of type: boolean'));
    });

    it('should only check uniqueness when uniqueItems is true', () => {
      assert.deepEqual(validate([1, 1], { uniqueItems: false }), VALID);
      assert.deepEqual(validate([1, 1], { uniqueItems: true }), errors('Duplicate items not allowed (index 1 equals index 0)'));
    });

    it('should count zero and negative zero as duplicates', () => {
      assert.deepEqual(validate(JSON.parse('[0,-0]'), { uniqueItems: true }), errors('Duplicate items not allowed (index 1 equals index 0)'));
    });
  });

  describe('objects', () => {
    const schema: JSONSchema = {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' }
      }
    };

    it('should accept an object with the required property', () => {
      assert.deepEqual(validate({ name: 'a' }, schema), VALID);
    });

    it('should reject an object missing a required property', () => {
      assert.deepEqual(validate({}, schema), errors('Missing required property: name'));
    });

    it('should validate declared properties', () => {
      assert.deepEqual(validate({ name: 1 }, schema), errors('Value must be of type: string'));
    });

    it('should reject any property when additionalProperties is false on its own', () => {
      assert.deepEqual(validate({ a: 1 }, { additionalProperties: false }), errors("Additional property 'a' is not permitted in this object"));
    });

    it('should validate undeclared properties against additionalProperties', () => {
      const props: JSONSchema = {
        properties: { a: {} },
        patternProperties: { '^x-': { type: 'number' } },
        additionalProperties: { type: 'string' }
      };

      assert.deepEqual(validate({ a: 1, b: 'ok', 'x-c': 3 }, props), VALID);
      assert.deepEqual(validate({ a: 1, b: 2, 'x-c': 'no' }, props), errors(
        'Value must be of type: string',
        'Value must be of type: number'
      ));
    });

    it('should validate minProperties and maxProperties', () => {
      assert.deepEqual(validate({}, { minProperties: 1 }), errors('Object must have >= 1 properties'));
      assert.deepEqual(validate({ a: 1, b: 2 }, { maxProperties: 1 }), errors('Object must have <= 1 properties'));
    });

    it('should validate both forms of dependencies', () => {
      const deps: JSONSchema = {
        dependencies: {
          credit_card: ['billing_address'],
          name: { required: ['age'] }
        }
      };

      assert.deepEqual(validate({ credit_card: 1, billing_address: 'x', name: 'n', age: 3 }, deps), VALID);
      assert.deepEqual(validate({ credit_card: 1, name: 'n' }, deps), errors(
        "Property 'credit_card' is missing its dependency 'billing_address'",
        'Missing required property: age'
      ));
    });
  });

  describe('composition', () => {
    it('should report every failing allOf sub-schema', () => {
      const schema: JSONSchema = { allOf: [{ minimum: 1 }, { maximum: 3 }, { multipleOf: 2 }] };
      assert.deepEqual(validate(2, schema), VALID);
      assert.deepEqual(validate(5, schema), errors('Value must be <= 3', 'Value must be multiple of 2'));
    });

    it('should collect the messages of every anyOf branch', () => {
      const schema: JSONSchema = { anyOf: [{ type: 'string' }, { type: 'number', minimum: 5 }] };
      assert.deepEqual(validate(7, schema), VALID);
      assert.deepEqual(validate(3, schema), errors('Value must be of type: string', 'Value must be >= 5'));
    });

    it('should accept exactly one oneOf branch', () => {
      const schema: JSONSchema = { oneOf: [{ type: 'string' }, { type: 'number' }] };
      assert.deepEqual(validate('x', schema), VALID);
      assert.deepEqual(validate(true, schema), errors(
        'Value must match exactly one schema in oneOf',
        'Value must be of type: string',
        'Value must be of type: number'
      ));
    });

    it('should reject a value matching more than one oneOf branch', () => {
      const schema: JSONSchema = { oneOf: [{ type: 'number' }, { type: 'integer' }] };
      assert.deepEqual(validate(1, schema), errors('Value matches more than one schema in oneOf (matched 2)'));
      assert.deepEqual(validate(1.5, schema), VALID);
    });

    it('should negate with not', () => {
      const schema: JSONSchema = { not: { required: ['a', 'b'] } };
      assert.deepEqual(validate({ a: 1 }, schema), VALID);
      assert.deepEqual(validate({ a: 1, b: 2 }, schema), errors('Value must not match the schema in not'));
    });
  });

  describe('format', () => {
    it('should validate ipv4 addresses', () => {
      assert.deepEqual(validate('192.168.0.1', { format: 'ipv4' }), VALID);
      assert.deepEqual(validate('not-an-ip', { format: 'ipv4' }), errors('Value must be a valid IPv4 address'));
    });

    it('should validate ipv6 addresses', () => {
      assert.deepEqual(validate('fe80::1', { format: 'ipv6' }), VALID);
      assert.deepEqual(validate('fe80:::1', { format: 'ipv6' }), errors('Value must be a valid IPv6 address'));
    });

    it('should reject every value for an unsupported format', () => {
      assert.deepEqual(validate('a@b.c', { format: 'email' }), errors("Format 'email' is not supported"));
      assert.deepEqual(validate(1, { format: 'toString' }), errors("Format 'toString' is not supported"));
    });

    it('should use formats passed in the options', () => {
      const formats = {
        even: (value: unknown) => (typeof value === 'number' && value % 2 === 0 ? valid(value) : invalid('Value must be even')(value))
      };

      assert.deepEqual(validate(4, { format: 'even' }, { formats }), VALID);
      assert.deepEqual(validate(3, { format: 'even' }, { formats }), errors('Value must be even'));
      assert.deepEqual(validate('nope', { format: 'ipv4' }, { formats: { ipv4: valid } }), VALID);
    });
  });

  describe('$ref', () => {
    it('should resolve a pointer into the root document', () => {
      const schema = { $ref: '#/defs/x', defs: { x: { type: 'boolean' } } };
      assert.deepEqual(validate(true, schema), VALID);
      assert.deepEqual(validate(1, schema), errors('Value must be of type: boolean'));
    });

    it('should resolve a reference into an array', () => {
      const schema: JSONSchema = { items: [{ type: 'string' }, { $ref: '#/items/0' }] };
      assert.deepEqual(validate(['a', 2], schema), errors('Value must be of type: string'));
    });

    it('should name the segment that was not found', () => {
      const schema = { $ref: '#/definitions/foo', definitions: {} };
      assert.deepEqual(validate(1, schema), errors("Reference not found 'foo' in '#/definitions/foo'"));
    });

    it('should refuse remote references', () => {
      assert.deepEqual(validate(1, { $ref: 'other.json#/a' }), errors("Remote $ref 'other.json#/a' is not supported"));
    });

    it('should validate recursive structures through #', () => {
      const schema: JSONSchema = {
        type: 'object',
        required: ['id'],
        properties: {
          child: { $ref: '#' }
        }
      };

      assert.deepEqual(validate({ id: 1, child: { id: 2 } }, schema), VALID);
      assert.deepEqual(validate({ id: 1, child: { id: 2, child: {} } }, schema), errors('Missing required property: id'));
    });

    it('should validate recursive definitions', () => {
      const schema: JSONSchema = {
        $ref: '#/definitions/node',
        definitions: {
          node: {
            type: 'object',
            required: ['value'],
            properties: {
              value: { type: 'number' },
              next: { $ref: '#/definitions/node' }
            }
          }
        }
      };

      assert.deepEqual(validate({ value: 1, next: { value: 2 } }, schema), VALID);
      assert.deepEqual(validate({ value: 1, next: { value: 2, next: { value: 'x' } } }, schema), errors('Value must be of type: number'));
    });

    it('should report a reference that can only lead back to itself', () => {
      assert.deepEqual(validate(1, { $ref: '#' }), errors("Circular $ref '#' detected"));
    });

    it('should report mutually circular references', () => {
      const schema: JSONSchema = {
        $ref: '#/definitions/a',
        definitions: {
          a: { $ref: '#/definitions/b' },
          b: { $ref: '#/definitions/a' }
        }
      };

      assert.deepEqual(validate('x', schema), errors("Circular $ref '#/definitions/a' detected"));
    });
  });

  describe('determinism', () => {
    it('should return the same result for repeated calls', () => {
      const schema: JSONSchema = { type: 'object', required: ['a', 'b'], properties: { a: { type: 'string' } } };
      const value = { a: 1 };
      assert.deepEqual(validate(value, schema), validate(value, schema));
    });
  });
});

describe('Schema', () => {
  it('should expose title, description and type', () => {
    const schema = new Schema({ title: 'T', description: 'D', type: ['string', 'foo'] });
    assert.equal(schema.title, 'T');
    assert.equal(schema.description, 'D');
    assert.deepEqual(schema.type, ['string']);
  });

  it('should expose an empty type list when the keyword is absent', () => {
    assert.deepEqual(new Schema({}).type, []);
    assert.deepEqual(new Schema(true).type, []);
  });

  it('should keep a __proto__ property declared in a parsed document', () => {
    const schema = new Schema(JSON.parse('{"properties":{"__proto__":{"type":"string"}},"additionalProperties":false}'));
    assert.deepEqual(schema.validate(JSON.parse('{"__proto__":"x"}')), VALID);
    assert.deepEqual(schema.validate(JSON.parse('{"__proto__":5}')), errors('Value must be of type: string'));
  });

  it('should validate repeatedly against the same document', () => {
    const schema = new Schema({ type: 'string' });
    assert.deepEqual(schema.validate('a'), VALID);
    assert.deepEqual(schema.validate(1), errors('Value must be of type: string'));
    assert.deepEqual(schema.validate('b'), VALID);
  });

  it('should not see later changes to the document', () => {
    const document: JSONSchema = { type: 'string' };
    const schema = new Schema(document);
    document.type = 'number';
    assert.deepEqual(schema.validate('a'), VALID);
  });
});
