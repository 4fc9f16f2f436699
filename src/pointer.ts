import { hasOwn, isObject } from '~/utils';

interface Found {
  ok: true;
  value: unknown;
}

interface NotFound {
  ok: false;
  segment: string;
}

export type PointerResult = Found | NotFound;

const isArrayIndex = (segment: string): boolean => /^(0|[1-9][0-9]*)$/.test(segment);

/**
 * Unescape a path segment: `~1` becomes `/`, then `~0` becomes `~`.
 */

export const unescapeSegment = (segment: string): string => {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
};

/**
 * Splits a pointer such as `/definitions/a~1b` into `['definitions', 'a/b']`.
 * The empty pointer addresses the whole document.
 */

export const parsePointer = (pointer: string): string[] => {
  if (pointer === '') return [];
  return pointer.slice(1).split('/').map(unescapeSegment);
};

export const getPointer = (document: unknown, segments: string[]): PointerResult => {
  let node = document;

  for (const segment of segments) {
    if (isObject(node) && hasOwn(node, segment)) {
      node = node[segment];
      continue;
    }

    if (Array.isArray(node) && isArrayIndex(segment) && Number(segment) < node.length) {
      node = node[Number(segment)];
      continue;
    }

    return { ok: false, segment };
  }

  return { ok: true, value: node };
};
