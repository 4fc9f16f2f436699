import type { TypeTag } from '~/types';

export const isObject = (v: unknown): v is Record<string, unknown> => {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
};

export const hasOwn = (obj: Record<string, unknown>, key: string): boolean => {
  return Object.prototype.hasOwnProperty.call(obj, key);
};

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

export const getSegments = (
  input: string,
  options: {
    language?: string;
    granularity?: 'grapheme' | 'word' | 'sentence';
  } = {}
): Intl.SegmentData[] => {
  const { language, granularity = 'grapheme' } = options;
  const segmenter = language === undefined && granularity === 'grapheme'
    ? graphemes
    : new Intl.Segmenter(language, { granularity });

  return Array.from(segmenter.segment(input));
};

/**
 * Length of a string as a reader counts it: one per grapheme cluster,
 * so combined emoji and accented letters count once.
 */

export const stringLength = (input: string): number => getSegments(input).length;

export const isValidValueType = (value: unknown, type: TypeTag): boolean => {
  switch (type) {
    case 'null': return value === null;
    case 'array': return Array.isArray(value);
    case 'object': return isObject(value);
    case 'boolean': return typeof value === 'boolean';
    case 'number': return typeof value === 'number';
    case 'integer': return typeof value === 'number' && Number.isInteger(value);
    case 'string': return typeof value === 'string';
    default: return false;
  }
};

/**
 * JSON equality: numbers compare by value, so `0` equals `-0`. Arrays match
 * index by index and objects need the same own keys with equal values.
 */

export const isEqual = (a: unknown, b: unknown): boolean => {
  if (a === b) return true;

  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => isEqual(item, b[i]));
  }

  if (isObject(a) && isObject(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every(key => hasOwn(b, key) && isEqual(a[key], b[key]));
  }

  return false;
};

export const stringify = (value: unknown): string => {
  return value === undefined ? 'undefined' : JSON.stringify(value);
};
