import type { CstNode } from '../cst/nodes.js';
import type { SourceSpan } from './nodes.js';

/**
 * Derives the span of a parse tree node from its first and last tokens.
 * Pure: the same node always yields an equal span.
 */
export function spanOf(node: CstNode): SourceSpan {
	return {
		startLine: node.start.line,
		startColumn: node.start.column,
		endLine: node.stop.line,
		endColumn: node.stop.column,
	};
}

export function spanToString(span: SourceSpan): string {
	return `${span.startLine}:${span.startColumn}-${span.endLine}:${span.endColumn}`;
}
