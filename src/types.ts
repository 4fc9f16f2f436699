export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type TypeTag = 'object' | 'array' | 'string' | 'integer' | 'number' | 'boolean' | 'null';

/**
 * Shape of a draft-04 schema document as authors write it. Only used for
 * type hints on the public API; the decoder accepts any JSON value.
 */

export interface JSONSchema {
  // Annotations
  title?: string;
  description?: string;
  $ref?: string;
  definitions?: Record<string, JSONSchema>;

  // Basic
  type?: TypeTag | TypeTag[];
  enum?: JsonValue[];
  format?: string;

  // String validation
  minLength?: number;
  maxLength?: number;
  pattern?: string;

  // Number validation
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: boolean;
  exclusiveMaximum?: boolean;
  multipleOf?: number;

  // Array validation
  items?: JSONSchema | boolean | Array<JSONSchema | boolean>;
  additionalItems?: JSONSchema | boolean;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  // Object validation
  properties?: Record<string, JSONSchema | boolean>;
  required?: string[];
  minProperties?: number;
  maxProperties?: number;
  additionalProperties?: boolean | JSONSchema;
  patternProperties?: Record<string, JSONSchema | boolean>;
  dependencies?: Record<string, JSONSchema | boolean | string[]>;

  // Composition
  allOf?: Array<JSONSchema | boolean>;
  anyOf?: Array<JSONSchema | boolean>;
  oneOf?: Array<JSONSchema | boolean>;
  not?: JSONSchema | boolean;
}

/**
 * Decoded schema node. Every keyword has already been checked for shape, so
 * the compiler never reads the raw document.
 */

export type SchemaNode = boolean | SchemaKeywords;

export interface SchemaKeywords {
  title?: string;
  description?: string;
  $ref?: string;
  type?: TypeTag[];
  allOf?: SchemaNode[];
  anyOf?: SchemaNode[];
  oneOf?: SchemaNode[];
  not?: SchemaNode;
  enum?: unknown[];
  maxLength?: number;
  minLength?: number;
  pattern?: string;
  multipleOf?: number;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: boolean;
  exclusiveMaximum?: boolean;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  items?: SchemaNode | SchemaNode[];
  additionalItems?: SchemaNode;
  maxProperties?: number;
  minProperties?: number;
  required?: string[];
  properties?: Record<string, SchemaNode>;
  patternProperties?: Record<string, SchemaNode>;
  additionalProperties?: SchemaNode;
  dependencies?: Record<string, SchemaNode | string[]>;
  format?: string;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: [string, ...string[]] };

export type Validator = (value: unknown) => ValidationResult;

export type GetValue = (obj: Record<string, unknown>, key: string) => unknown;

export interface ValidateOptions {
  formats?: Record<string, Validator>;
  getValue?: GetValue;
}
