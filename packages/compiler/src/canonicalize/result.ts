export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({
  ok: true,
  value,
});

export const fail = <E>(error: E): { ok: false; error: E } => ({
  ok: false,
  error,
});

export const mapResult = <T, U, E>(
  result: Result<T, E>,
  map: (value: T) => U
): Result<U, E> => (result.ok ? ok(map(result.value)) : result);

/** Runs `step` over `items` in order and stops at the first failure. */
export const traverse = <T, U, E>(
  items: readonly T[],
  step: (item: T, index: number) => Result<U, E>
): Result<U[], E> => {
  const values: U[] = [];
  for (const [index, item] of items.entries()) {
    const result = step(item, index);
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
};

/** `traverse` for steps that each yield a list, flattening the output. */
export const traverseConcat = <T, U, E>(
  items: readonly T[],
  step: (item: T) => Result<readonly U[], E>
): Result<U[], E> => mapResult(traverse(items, step), (lists) => lists.flat());
