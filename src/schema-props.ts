export const schemaProps = {
  base: [
    'title',
    'description',
    'type',
    '$ref',
    'enum',
    'allOf',
    'anyOf',
    'oneOf',
    'not',
    'format'
  ],

  string: [
    'maxLength',
    'minLength',
    'pattern'
  ],

  number: [
    'multipleOf',
    'minimum',
    'maximum',
    'exclusiveMinimum',
    'exclusiveMaximum'
  ],

  array: [
    'minItems',
    'maxItems',
    'uniqueItems',
    'items',
    'additionalItems'
  ],

  object: [
    'maxProperties',
    'minProperties',
    'required',
    'properties',
    'patternProperties',
    'additionalProperties',
    'dependencies'
  ],

  // Accepted without effect on validation
  ignored: [
    '$schema',
    'id',
    '$id',
    'definitions',
    'default',
    'examples'
  ]
} as const;

const known: ReadonlySet<string> = new Set<string>(Object.values(schemaProps).flat());

export const isKnownProp = (key: string): boolean => known.has(key);
