export type {
  GetValue,
  JSONSchema,
  JsonValue,
  SchemaKeywords,
  SchemaNode,
  TypeTag,
  ValidateOptions,
  ValidationResult,
  Validator
} from '~/types';

export { Schema, validate } from '~/schema';
export { allOf, anyOf, invalid, not, oneOf, valid } from '~/combinators';
export { flatten, isValid } from '~/result';
export { compileSchema, compileValidator } from '~/compile';
export type { SchemaContext } from '~/context';
export { createContext } from '~/context';
export { decodeSchema } from '~/decode';
export { defaultFormats } from '~/formats';
