import type { GetValue, Validator } from '~/types';

export interface ReferenceFrame {
  ref: string;
  value: unknown;
}

/**
 * Everything a compiled validator needs to know about the document it came
 * from. Built fresh for every `validate` call.
 */

export interface SchemaContext {
  readonly root: unknown;
  readonly formats: Readonly<Record<string, Validator>>;
  readonly getValue: GetValue;
  readonly refs: Map<string, Validator>;
  readonly stack: ReferenceFrame[];
}

export const createContext = (
  root: unknown,
  formats: Readonly<Record<string, Validator>>,
  getValue: GetValue
): SchemaContext => ({
  root,
  formats,
  getValue,
  refs: new Map(),
  stack: []
});
