/**
 * A shallow copy that keeps the prototype, so class instances stay
 * instances of their class and arrays stay arrays.
 */
export function shallowCopy<S extends object>(s: S): S {
  if (Array.isArray(s)) {
    return Object.assign([], s);
  }
  const copy: S = Object.create(Object.getPrototypeOf(s));
  return Object.assign(copy, s);
}
