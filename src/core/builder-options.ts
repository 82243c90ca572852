/**
 * Builder options: a fixed set of boolean switches, addressable by key or
 * alias, and settable from the environment
 */

import { createLogger } from '../common/logger.js';
import { MisuseError } from '../common/errors.js';
import { getEnvVar, type EnvSource } from '../util/environment.js';

const log = createLogger('core:options');

/** Prefix of environment variables read by {@link BuilderOptionsManager.applyEnvironment} */
export const ENV_PREFIX = 'SQL_AST_';

export const PRIMARY_KEY_IMPLIES_NOT_NULL = 'primary_key_implies_not_null';

export type BuilderOptionKey = typeof PRIMARY_KEY_IMPLIES_NOT_NULL;

interface OptionDefinition {
	defaultValue: boolean;
	aliases: readonly string[];
	description: string;
}

const OPTION_DEFINITIONS: ReadonlyMap<BuilderOptionKey, OptionDefinition> = new Map<BuilderOptionKey, OptionDefinition>([
	[PRIMARY_KEY_IMPLIES_NOT_NULL, {
		defaultValue: false,
		aliases: ['pk_not_null'],
		description: 'Treat a lone PRIMARY KEY column constraint as NOT NULL',
	}],
]);

/**
 * Holds a value for every builder option, starting from its default.
 * Keys and aliases match case-insensitively.
 */
export class BuilderOptionsManager {
	private readonly values = new Map<BuilderOptionKey, boolean>();

	constructor() {
		for (const [key, definition] of OPTION_DEFINITIONS) {
			this.values.set(key, definition.defaultValue);
		}
	}

	/**
	 * @param value A boolean, a number (non-zero is true) or one of
	 *   true/false, 1/0, on/off, yes/no
	 * @throws MisuseError for an unknown key or an unconvertible value
	 */
	setOption(key: string, value: unknown): void {
		const canonicalKey = resolveKey(key);
		const converted = toBoolean(value, key);
		const oldValue = this.getOption(canonicalKey);
		if (oldValue === converted) {
			return;
		}
		this.values.set(canonicalKey, converted);
		log('Option %s changed: %j → %j', canonicalKey, oldValue, converted);
	}

	/** @throws MisuseError for an unknown key */
	getOption(key: string): boolean {
		return this.values.get(resolveKey(key)) ?? false;
	}

	getAllOptions(): Record<BuilderOptionKey, boolean> {
		return { [PRIMARY_KEY_IMPLIES_NOT_NULL]: this.getOption(PRIMARY_KEY_IMPLIES_NOT_NULL) };
	}

	/**
	 * Applies `SQL_AST_<KEY>` variables (key uppercased) over the current values.
	 * Reads the process environment unless an explicit source is given.
	 */
	applyEnvironment(env?: EnvSource): void {
		for (const key of OPTION_DEFINITIONS.keys()) {
			const name = `${ENV_PREFIX}${key.toUpperCase()}`;
			const raw = env ? env[name] : getEnvVar(name);
			if (raw !== undefined) {
				log('Applying %s from environment', name);
				this.setOption(key, raw);
			}
		}
	}
}

function resolveKey(key: string): BuilderOptionKey {
	const lowerKey = key.toLowerCase();
	for (const [registeredKey, definition] of OPTION_DEFINITIONS) {
		if (registeredKey === lowerKey || definition.aliases.includes(lowerKey)) {
			return registeredKey;
		}
	}
	throw new MisuseError(`Unknown option: ${key}`);
}

function toBoolean(value: unknown, key: string): boolean {
	if (typeof value === 'boolean') {
		return value;
	}
	if (typeof value === 'string') {
		const lower = value.toLowerCase();
		if (lower === 'true' || lower === '1' || lower === 'on' || lower === 'yes') {
			return true;
		}
		if (lower === 'false' || lower === '0' || lower === 'off' || lower === 'no') {
			return false;
		}
	}
	if (typeof value === 'number') {
		return value !== 0;
	}
	throw new MisuseError(`Invalid boolean value for option ${key}: ${String(value)}`);
}
