/** Drops properties explicitly set to `undefined`. */
export function compact<T extends object>(input: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in input) {
    if (input[key] !== undefined) out[key] = input[key];
  }
  return out;
}
