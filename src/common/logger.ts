import debug from 'debug';

const BASE_NAMESPACE = 'sql-ast';

/**
 * Logger for one part of the builder, under `sql-ast:<subNamespace>`.
 * The builder uses `builder` (one line per statement, failures on
 * `builder:error` via `log.extend('error')`) and the options manager
 * `core:options`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Turns on logging without the DEBUG environment variable.
 *
 * @param pattern - `debug` namespace pattern, e.g. `sql-ast:builder*` for
 *   built statements and build failures only
 * @param logFn - Replaces the stderr sink. It receives the raw `debug`
 *   arguments, with `%s`-style placeholders still unformatted.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

export function disableLogging(): void {
	debug.disable();
}

/** @param namespace - Without the `sql-ast:` prefix */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
