import type { GetValue, JSONSchema, JsonValue, TypeTag, ValidateOptions, ValidationResult, Validator } from '~/types';
import cloneDeep from 'clone-deep';
import { compileValidator } from '~/compile';
import { createContext } from '~/context';
import { decodeSchema } from '~/decode';
import { defaultFormats } from '~/formats';
import { isObject } from '~/utils';
import { defaultGetValue } from '~/validators';

/**
 * Plain objects are rebuilt from their own entries, so a key such as
 * `__proto__` stays an ordinary property of the copy.
 */

const cloneEntries = (value: unknown): unknown => {
  if (!isObject(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, v]): [string, unknown] => [key, cloneDeep<unknown>(v, cloneEntries)]));
};

/**
 * `type` is the decoded type-tag list: empty when the keyword is absent,
 * when the schema is a boolean, or when every named type is unknown.
 */

export class Schema {
  readonly title?: string;
  readonly description?: string;
  readonly type: TypeTag[] = [];

  private readonly document: unknown;
  private readonly formats: Readonly<Record<string, Validator>>;
  private readonly getValue: GetValue;

  constructor(schema: JSONSchema | JsonValue, options: ValidateOptions = {}) {
    const node = decodeSchema(schema);

    if (typeof node !== 'boolean') {
      this.title = node.title;
      this.description = node.description;
      this.type = node.type ?? [];
    }

    this.document = cloneDeep<unknown>(schema, cloneEntries);
    this.formats = Object.freeze({ ...defaultFormats, ...options.formats });
    this.getValue = options.getValue || defaultGetValue;
  }

  /**
   * Compiles the document from scratch and applies it to `value`.
   * Nothing is cached between calls.
   */

  validate(value: unknown): ValidationResult {
    const context = createContext(this.document, this.formats, this.getValue);
    const validator = compileValidator(decodeSchema(this.document), context);
    return validator(value);
  }
}

export const validate = (
  value: unknown,
  schema: JSONSchema | JsonValue,
  options: ValidateOptions = {}
): ValidationResult => {
  return new Schema(schema, options).validate(value);
};
