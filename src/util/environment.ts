/**
 * Environment variable access that also works outside Node.js
 */

export type EnvSource = Record<string, string | undefined>;

/**
 * Reads an environment variable from `process.env`, falling back to a
 * same-named string property on globalThis (e.g. `globalThis.DEBUG = "sql-ast:*"`).
 *
 * @param key The environment variable name
 * @returns The environment variable value or undefined if not found
 */
export function getEnvVar(key: string): string | undefined {
	// Node.js environment
	if (typeof process !== 'undefined' && process.env) {
		return process.env[key];
	}

	const value: unknown = Reflect.get(globalThis, key);
	return typeof value === 'string' ? value : undefined;
}

