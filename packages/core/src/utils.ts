// ============================================================================
// Result Type - Streamlined Functional Error Handling
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// Core Operations
// ============================================================================

export const match = <T, E, R>(result: Result<T, E>, onOk: (value: T) => R, onErr: (error: E) => R): R => {
	if (result.ok) {
		return onOk(result.value);
	}
	return onErr(result.error);
};

// ============================================================================
// Try/Catch Wrapper
// ============================================================================

export const tryCatch = <T, E>(fn: () => T, onError: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(onError(e));
	}
};

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

// ============================================================================
// Object Utilities
// ============================================================================

export const isPlainObject = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null && !Array.isArray(value);

// ============================================================================
// Testing Utilities
// ============================================================================

/** Unwrap a Result, throwing if it's an error. Useful for tests. */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`Unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/** Unwrap an error from a Result, throwing if it's ok. Useful for tests. */
export const unwrapErr = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrapErr called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};
