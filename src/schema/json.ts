import type { JsonValue } from './types';

export const isPlainObject = (value: unknown): value is Readonly<Record<string, unknown>> => {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Returns a fresh copy of `value` when it is a JSON-compatible tree, `undefined` otherwise.
 * Non-finite numbers, functions, symbols, `undefined` and class instances are not JSON-compatible.
 */
export function cloneJson(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;

  if (Array.isArray(value)) {
    const out: JsonValue[] = [];
    for (const item of value) {
      const copy = cloneJson(item);
      if (copy === undefined) return undefined;
      out.push(copy);
    }
    return out;
  }

  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const copy = cloneJson(item);
      if (copy === undefined) return undefined;
      out[key] = copy;
    }
    return out;
  }

  return undefined;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return value;
}
