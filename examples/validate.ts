import type { JSONSchema } from '~/types';
import { validate } from '~/schema';

// Example schema
const serverSchema: JSONSchema = {
  type: 'object',
  required: ['hostname', 'address', 'port'],
  properties: {
    hostname: {
      type: 'string',
      minLength: 3,
      maxLength: 63
    },
    address: {
      anyOf: [
        { type: 'string', format: 'ipv4' },
        { type: 'string', format: 'ipv6' }
      ]
    },
    port: {
      type: 'integer',
      minimum: 1,
      maximum: 65535
    },
    tags: {
      type: 'array',
      items: { $ref: '#/definitions/tag' },
      uniqueItems: true
    }
  },
  additionalProperties: false,
  definitions: {
    tag: { type: 'string', pattern: '^[a-z-]+$' }
  }
};

const validServer = {
  hostname: 'db-primary',
  address: '10.0.0.12',
  port: 5432,
  tags: ['db', 'primary']
};

const invalidServer = {
  hostname: 'db', // too short
  address: 'localhost',
  port: 70000, // above maximum
  owner: 'ops'
};

console.log(validate(validServer, serverSchema));
// { valid: true }

console.log(validate(invalidServer, serverSchema));
// {
//   valid: false,
//   errors: [
//     'String length must be >= 3',
//     'Value must be a valid IPv4 address',
//     'Value must be a valid IPv6 address',
//     'Value must be <= 65535',
//     "Additional property 'owner' is not permitted in this object"
//   ]
// }
