/**
 * A validation error produced by manifest or settings validation.
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
