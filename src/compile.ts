import type { SchemaContext } from '~/context';
import type { SchemaKeywords, SchemaNode, Validator } from '~/types';
import { allOf, anyOf, invalid, not, oneOf, valid } from '~/combinators';
import { log } from '~/debug';
import { validateReference } from '~/reference';
import { hasOwn } from '~/utils';
import {
  validateDependencies,
  validateDependency,
  validateEnum,
  validateItems,
  validateMaxItems,
  validateMaxLength,
  validateMaximum,
  validateMaxProperties,
  validateMinItems,
  validateMinLength,
  validateMinimum,
  validateMinProperties,
  validateMultipleOf,
  validatePattern,
  validateProperties,
  validateRequired,
  validateTuple,
  validateType,
  validateUniqueItems
} from '~/validators';

const toRegExp = (pattern: string): RegExp | undefined => {
  try {
    return new RegExp(pattern, 'u');
  } catch (err) {
    log.compile('invalid pattern "%s": %s', pattern, err instanceof Error ? err.message : err);
    return undefined;
  }
};

const invalidPattern = (pattern: string): Validator => invalid(`Invalid regular expression: ${pattern}`);

/**
 * `true` and an absent keyword both allow anything; `false` is left for
 * the caller so it can say which item or property was rejected.
 */

const compileAdditional = (node: SchemaNode | undefined, context: SchemaContext): Validator | false => {
  if (node === false) return false;
  if (node === undefined || node === true) return valid;
  return compileValidator(node, context);
};

const compileProperties = (schema: SchemaKeywords, context: SchemaContext): Validator[] => {
  const properties = new Map<string, Validator>();
  const patternProperties: Array<[RegExp, Validator]> = [];
  const errors: Validator[] = [];

  for (const [key, node] of Object.entries(schema.properties ?? {})) {
    properties.set(key, compileValidator(node, context));
  }

  for (const [pattern, node] of Object.entries(schema.patternProperties ?? {})) {
    const regex = toRegExp(pattern);

    if (regex) {
      patternProperties.push([regex, compileValidator(node, context)]);
    } else {
      errors.push(invalidPattern(pattern));
    }
  }

  const additionalProperties = compileAdditional(schema.additionalProperties, context);
  const validator = validateProperties({ properties, patternProperties, additionalProperties }, context.getValue);
  return [...errors, validator];
};

const compileDependencies = (schema: SchemaKeywords, context: SchemaContext): Validator[] => {
  return Object.entries(schema.dependencies ?? {}).map(([key, dependency]) => {
    if (Array.isArray(dependency)) {
      return validateDependencies(key, dependency, context.getValue);
    }

    return validateDependency(key, compileValidator(dependency, context), context.getValue);
  });
};

const compileFormat = (format: string, context: SchemaContext): Validator => {
  const validator = hasOwn(context.formats, format) ? context.formats[format] : undefined;

  if (validator === undefined) {
    log.format('no validator registered for "%s"', format);
    return invalid(`Format '${format}' is not supported`);
  }

  return validator;
};

/**
 * Compiles one schema node into its keyword validators, in a fixed order so
 * that messages always come out the same way. Nested schemas are compiled
 * against the same context, so a `$ref` anywhere resolves against the root.
 */

// eslint-disable-next-line complexity
export const compileSchema = (node: SchemaNode, context: SchemaContext): Validator[] => {
  if (node === true) return [];
  if (node === false) return [invalid('Value is not permitted by a false schema')];

  const schema = node;
  const validators: Validator[] = [];

  if (schema.$ref !== undefined) {
    validators.push(validateReference(schema.$ref, context, compileValidator));
  }

  if (schema.type !== undefined) {
    validators.push(validateType(schema.type));
  }

  if (schema.allOf !== undefined) {
    for (const subschema of schema.allOf) {
      validators.push(...compileSchema(subschema, context));
    }
  }

  if (schema.anyOf !== undefined) {
    validators.push(anyOf(schema.anyOf.map(subschema => compileValidator(subschema, context))));
  }

  if (schema.oneOf !== undefined) {
    validators.push(oneOf(schema.oneOf.map(subschema => compileValidator(subschema, context))));
  }

  if (schema.not !== undefined) {
    validators.push(not(compileValidator(schema.not, context)));
  }

  if (schema.enum !== undefined) {
    validators.push(validateEnum(schema.enum));
  }

  if (schema.maxLength !== undefined) {
    validators.push(validateMaxLength(schema.maxLength));
  }

  if (schema.minLength !== undefined) {
    validators.push(validateMinLength(schema.minLength));
  }

  if (schema.pattern !== undefined) {
    const regex = toRegExp(schema.pattern);
    validators.push(regex ? validatePattern(schema.pattern, regex) : invalidPattern(schema.pattern));
  }

  if (schema.multipleOf !== undefined) {
    validators.push(validateMultipleOf(schema.multipleOf));
  }

  if (schema.minimum !== undefined) {
    validators.push(validateMinimum(schema.minimum, schema.exclusiveMinimum));
  }

  if (schema.maximum !== undefined) {
    validators.push(validateMaximum(schema.maximum, schema.exclusiveMaximum));
  }

  if (schema.minItems !== undefined) {
    validators.push(validateMinItems(schema.minItems));
  }

  if (schema.maxItems !== undefined) {
    validators.push(validateMaxItems(schema.maxItems));
  }

  if (schema.uniqueItems === true) {
    validators.push(validateUniqueItems);
  }

  if (Array.isArray(schema.items)) {
    const itemValidators = schema.items.map(item => compileValidator(item, context));
    validators.push(validateTuple(itemValidators, compileAdditional(schema.additionalItems, context)));
  } else if (schema.items !== undefined) {
    validators.push(validateItems(compileValidator(schema.items, context)));
  }

  if (schema.maxProperties !== undefined) {
    validators.push(validateMaxProperties(schema.maxProperties));
  }

  if (schema.minProperties !== undefined) {
    validators.push(validateMinProperties(schema.minProperties));
  }

  if (schema.required !== undefined) {
    validators.push(validateRequired(schema.required, context.getValue));
  }

  if (schema.properties !== undefined || schema.patternProperties !== undefined || schema.additionalProperties !== undefined) {
    validators.push(...compileProperties(schema, context));
  }

  if (schema.dependencies !== undefined) {
    validators.push(...compileDependencies(schema, context));
  }

  if (schema.format !== undefined) {
    validators.push(compileFormat(schema.format, context));
  }

  return validators;
};

export const compileValidator = (node: SchemaNode, context: SchemaContext): Validator => {
  return allOf(compileSchema(node, context));
};
