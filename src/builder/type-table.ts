import { SqlTypeName } from '../ast/nodes.js';

/**
 * Canonical type table: uppercased type name -> type tag.
 * Built once at module load; never mutated.
 */
export const CANONICAL_TYPES: ReadonlyMap<string, SqlTypeName> = new Map([
	['INT', SqlTypeName.INTEGER],
	['INTEGER', SqlTypeName.INTEGER],
]);

/**
 * Resolves a raw type name, case-insensitively.
 * @returns The type tag, or undefined when the name is not in the table
 */
export function resolveTypeName(rawName: string): SqlTypeName | undefined {
	return CANONICAL_TYPES.get(rawName.toUpperCase());
}
