/**
 * Normalizes an unknown thrown or rejected value into an `Error`.
 *
 * @param value - The thrown value
 * @returns The value itself when it is an `Error`, otherwise a wrapping `Error`
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === "string" ? value : String(value), {
    cause: value,
  });
}
