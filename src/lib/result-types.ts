/**
 * Result Type Utilities
 *
 * Thin layer over neverthrow. Expected per-file failures (unparsable source,
 * a pattern that will not compile, invalid configuration) travel as values so
 * callers decide whether to degrade or stop.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
