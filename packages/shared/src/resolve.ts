/**
 * Precedence resolution for option chains such as
 * widget value -> theme value -> computed default.
 */

/** Lazily computed candidate */
export type Candidate<T> = T | null | undefined | (() => T | null | undefined);

function isThunk<T>(candidate: Candidate<T>): candidate is () => T | null | undefined {
  return typeof candidate === "function";
}

/**
 * Return the first candidate that is neither null nor undefined.
 * Function candidates are only evaluated when every earlier one was empty,
 * so resolved values must not themselves be functions.
 */
export function resolveFirst<T>(...candidates: Candidate<T>[]): T | undefined {
  for (const candidate of candidates) {
    const value = isThunk(candidate) ? candidate() : candidate;
    if (value !== null && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/** Like `resolveFirst` but with a guaranteed fallback */
export function resolveFirstOr<T>(fallback: T, ...candidates: Candidate<T>[]): T {
  return resolveFirst(...candidates) ?? fallback;
}
