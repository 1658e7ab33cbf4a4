/** Recursively freezes plain objects and arrays. Already frozen values are left as they are. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    const nested: unknown[] = Object.values(value);
    nested.forEach((entry) => deepFreeze(entry));
  }
  return value;
}
