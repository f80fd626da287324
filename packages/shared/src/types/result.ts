// ============================================
// Result Type
// ============================================

/**
 * Successful outcome carrying a value.
 */
export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed outcome carrying an error.
 */
export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Discriminated union for operations that can fail without throwing.
 *
 * @example
 * ```typescript
 * const result = loadConfig();
 * if (result.ok) {
 *   use(result.value);
 * } else {
 *   report(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}
