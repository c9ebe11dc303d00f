import type { ErrorClass } from "./types.js";

/**
 * Check if a value is a constructor of Error values
 */
export function isErrorClass(value: unknown): value is ErrorClass {
  if (typeof value !== "function") {
    return false;
  }
  const prototype: unknown = value.prototype;
  return value === Error || prototype instanceof Error;
}

/**
 * Runtime type of an error value, if it can be determined
 */
export function typeOf(error: Error): ErrorClass | undefined {
  const constructor: unknown = error.constructor;
  return isErrorClass(constructor) ? constructor : undefined;
}

/**
 * Strict supertypes of an error class, nearest first.
 *
 * Walks the constructor prototype chain and stops before the universal
 * root, so `Error` is the last entry for any subclass and
 * `superTypes(Error)` is empty.
 */
export function superTypes(type: ErrorClass): ErrorClass[] {
  const chain: ErrorClass[] = [];
  let current: unknown = Object.getPrototypeOf(type);
  while (isErrorClass(current)) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

/**
 * Display name of an error class ("Error" for anonymous classes)
 */
export function typeName(type: ErrorClass | undefined): string {
  return type !== undefined && type.name.length > 0 ? type.name : "Error";
}
