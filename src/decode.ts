import type { SchemaNode, TypeTag } from '~/types';
import { log } from '~/debug';
import { isKnownProp } from '~/schema-props';
import { isObject } from '~/utils';

const TYPE_TAGS: readonly TypeTag[] = ['object', 'array', 'string', 'integer', 'number', 'boolean', 'null'];

const isTypeTag = (v: unknown): v is TypeTag => TYPE_TAGS.some(tag => tag === v);

const isSchemaLike = (v: unknown): v is boolean | Record<string, unknown> => {
  return typeof v === 'boolean' || isObject(v);
};

const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

const asString = (v: unknown): string | undefined => (typeof v === 'string' ? v : undefined);
const asNumber = (v: unknown): number | undefined => (isNumber(v) ? v : undefined);
const asBoolean = (v: unknown): boolean | undefined => (typeof v === 'boolean' ? v : undefined);

const asStrings = (v: unknown): string[] | undefined => {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === 'string') : undefined;
};

const asSchema = (v: unknown): SchemaNode | undefined => {
  return isSchemaLike(v) ? decodeSchema(v) : undefined;
};

const asSchemaList = (v: unknown): SchemaNode[] | undefined => {
  return Array.isArray(v) ? v.map(decodeSchema) : undefined;
};

const asSchemaMap = (v: unknown): Record<string, SchemaNode> | undefined => {
  if (!isObject(v)) return undefined;

  return Object.fromEntries(Object.entries(v).map(([key, value]): [string, SchemaNode] => [key, decodeSchema(value)]));
};

/**
 * A string naming an unknown type yields an empty list, which rejects
 * every value. In the array form unknown names are dropped.
 */

export const decodeType = (v: unknown): TypeTag[] | undefined => {
  if (typeof v === 'string') {
    return isTypeTag(v) ? [v] : [];
  }

  if (Array.isArray(v)) {
    return v.filter(isTypeTag);
  }

  return undefined;
};

const decodeItems = (v: unknown): SchemaNode | SchemaNode[] | undefined => {
  return Array.isArray(v) ? asSchemaList(v) : asSchema(v);
};

const decodeDependencies = (v: unknown): Record<string, SchemaNode | string[]> | undefined => {
  if (!isObject(v)) return undefined;

  const entries: Array<[string, SchemaNode | string[]]> = [];
  for (const [key, value] of Object.entries(v)) {
    const dependency = Array.isArray(value) ? asStrings(value) : asSchema(value);
    if (dependency !== undefined) {
      entries.push([key, dependency]);
    }
  }

  return Object.fromEntries(entries);
};

/**
 * Turns a raw schema value into a typed node in one pass. Keyword values of
 * the wrong shape are dropped, so they contribute nothing when compiled.
 * Anything that is neither an object nor a boolean decodes to an empty
 * schema, which accepts every value.
 */

export const decodeSchema = (schema: unknown): SchemaNode => {
  if (typeof schema === 'boolean') {
    return schema;
  }

  if (!isObject(schema)) {
    return {};
  }

  for (const key of Object.keys(schema)) {
    if (!isKnownProp(key)) {
      log.compile('ignoring unknown keyword "%s"', key);
    }
  }

  const multipleOf = asNumber(schema.multipleOf);

  return {
    title: asString(schema.title),
    description: asString(schema.description),
    $ref: asString(schema.$ref),
    type: decodeType(schema.type),
    allOf: asSchemaList(schema.allOf),
    anyOf: asSchemaList(schema.anyOf),
    oneOf: asSchemaList(schema.oneOf),
    not: asSchema(schema.not),
    enum: Array.isArray(schema.enum) ? schema.enum : undefined,
    maxLength: asNumber(schema.maxLength),
    minLength: asNumber(schema.minLength),
    pattern: asString(schema.pattern),
    multipleOf: multipleOf !== undefined && multipleOf > 0 ? multipleOf : undefined,
    minimum: asNumber(schema.minimum),
    maximum: asNumber(schema.maximum),
    exclusiveMinimum: asBoolean(schema.exclusiveMinimum),
    exclusiveMaximum: asBoolean(schema.exclusiveMaximum),
    minItems: asNumber(schema.minItems),
    maxItems: asNumber(schema.maxItems),
    uniqueItems: asBoolean(schema.uniqueItems),
    items: decodeItems(schema.items),
    additionalItems: asSchema(schema.additionalItems),
    maxProperties: asNumber(schema.maxProperties),
    minProperties: asNumber(schema.minProperties),
    required: asStrings(schema.required),
    properties: asSchemaMap(schema.properties),
    patternProperties: asSchemaMap(schema.patternProperties),
    additionalProperties: asSchema(schema.additionalProperties),
    dependencies: decodeDependencies(schema.dependencies),
    format: asString(schema.format)
  };
};
