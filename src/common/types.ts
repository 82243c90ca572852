/**
 * Standard status/error codes that significantly match SQLite.
 * Carried by every error the builder raises so callers can branch without
 * parsing message text.
 */
export enum StatusCode {
	ERROR = 1,
	INTERNAL = 2,
	CONSTRAINT = 19,
	MISMATCH = 20,
	MISUSE = 21,
	UNSUPPORTED = 30,
}
