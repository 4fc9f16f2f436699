import type { SchemaContext } from '~/context';
import type { SchemaNode, Validator } from '~/types';
import { invalid } from '~/combinators';
import { log } from '~/debug';
import { decodeSchema } from '~/decode';
import { getPointer, parsePointer } from '~/pointer';
import { failure } from '~/result';

type Compile = (node: SchemaNode, context: SchemaContext) => Validator;

interface Success {
  ok: true;
  value: unknown;
}

interface Failure {
  ok: false;
  error: string;
}

export type ResolvedRef = Success | Failure;

const unsupported = (ref: string): Failure => {
  return { ok: false, error: `Remote $ref '${ref}' is not supported` };
};

const decodePointer = (fragment: string): string | undefined => {
  try {
    return decodeURIComponent(fragment);
  } catch (err) {
    log.ref('cannot percent-decode "%s": %s', fragment, err instanceof Error ? err.message : err);
    return undefined;
  }
};

/**
 * Finds the schema a local reference points at. Only `#` and `#/...`
 * are understood; everything else is reported as a remote reference.
 */

export const resolveRef = (ref: string, root: unknown): ResolvedRef => {
  if (ref === '#') {
    return { ok: true, value: root };
  }

  if (!ref.startsWith('#/')) {
    return unsupported(ref);
  }

  const pointer = decodePointer(ref.slice(1));
  if (pointer === undefined) {
    return unsupported(ref);
  }

  const found = getPointer(root, parsePointer(pointer));
  if (!found.ok) {
    return { ok: false, error: `Reference not found '${found.segment}' in '${ref}'` };
  }

  return { ok: true, value: found.value };
};

/**
 * Resolution and compilation are deferred until the validator first runs,
 * so a schema may refer to itself. The compiled target is kept in the
 * context for the rest of the call.
 *
 * Entering the same reference again for the very same value can never
 * finish, so that case fails instead of recursing.
 */

export const validateReference = (ref: string, context: SchemaContext, compile: Compile): Validator => {
  const load = (): Validator => {
    const cached = context.refs.get(ref);
    if (cached) return cached;

    const resolved = resolveRef(ref, context.root);
    log.ref('resolved "%s": %s', ref, resolved.ok ? 'ok' : resolved.error);

    const validator = resolved.ok ? compile(decodeSchema(resolved.value), context) : invalid(resolved.error);
    context.refs.set(ref, validator);
    return validator;
  };

  return value => {
    if (context.stack.some(frame => frame.ref === ref && Object.is(frame.value, value))) {
      log.ref('circular reference "%s"', ref);
      return failure(`Circular $ref '${ref}' detected`);
    }

    const validator = load();
    context.stack.push({ ref, value });

    try {
      return validator(value);
    } finally {
      context.stack.pop();
    }
  };
};
