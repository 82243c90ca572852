import { AstBuildError } from '../common/errors.js';
import type { BuilderOptionsManager } from '../core/builder-options.js';
import type { SingleStatementNode } from '../cst/nodes.js';
import type { Statement } from '../ast/nodes.js';
import { AstBuilder } from './ast-builder.js';

export { AstBuilder } from './ast-builder.js';
export { CANONICAL_TYPES, resolveTypeName } from './type-table.js';

export type BuildResult =
	| { ok: true; statement: Statement }
	| { ok: false; error: AstBuildError };

/**
 * Build the AST of one single-statement parse tree
 *
 * @param root Parse tree produced by the grammar parser
 * @param options Builder options; defaults apply when omitted
 * @returns AST for the statement
 * @throws AstBuildError if the tree cannot be translated
 */
export function buildStatement(root: SingleStatementNode, options?: BuilderOptionsManager): Statement {
	return new AstBuilder(options).buildStatement(root);
}

/**
 * Build several independent statements. A statement that fails to build
 * yields an error result and does not affect the others; errors that are not
 * AstBuildErrors still propagate.
 */
export function buildStatements(roots: readonly SingleStatementNode[], options?: BuilderOptionsManager): BuildResult[] {
	const builder = new AstBuilder(options);
	return roots.map((root): BuildResult => {
		try {
			return { ok: true, statement: builder.buildStatement(root) };
		} catch (e) {
			if (e instanceof AstBuildError) {
				return { ok: false, error: e };
			}
			throw e;
		}
	});
}
