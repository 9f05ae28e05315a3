import {
  AccountErrorKind,
  AccountOperationException,
} from '../exceptions/account-operation.exception';

/**
 * Outcome of a balance-changing operation. Callers branch on `success` and,
 * on failure, on `error.kind`.
 */
export type OperationResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: AccountOperationException };

export function succeeded(): OperationResult {
  return { success: true };
}

export function failed(error: AccountOperationException): OperationResult {
  return { success: false, error };
}

/**
 * The error kind carried by a failed result, or null on success.
 */
export function failureKind(result: OperationResult): AccountErrorKind | null {
  return result.success ? null : result.error.kind;
}

/**
 * Throws the carried exception, for callers that would rather let a NestJS
 * exception filter turn it into a response.
 */
export function unwrap(result: OperationResult): void {
  if (!result.success) {
    throw result.error;
  }
}
