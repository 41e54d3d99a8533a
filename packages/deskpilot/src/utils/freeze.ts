/** Freezes `value` and everything reachable from it, in place. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  return value;
}

/** A deep copy that no one can mutate, leaving the original untouched. */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
