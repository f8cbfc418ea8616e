/**
 * Helpers for the frozen value objects passed between stages.
 */

/**
 * Deep freeze an object and all nested objects.
 * Values that are already frozen are left alone, so shared frozen
 * sub-objects keep their identity.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

/**
 * Exhaustiveness guard for discriminated unions.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
