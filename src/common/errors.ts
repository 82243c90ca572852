import { StatusCode } from './types.js';
import type { SourceSpan } from '../ast/nodes.js';

/**
 * Location-annotated error triple handed to callers for rendering.
 */
export interface Diagnostic {
	message: string;
	line: number;
	column: number;
}

/**
 * Base class for errors raised while turning a parse tree into an AST.
 * Provides location information and status code support.
 */
export class AstBuildError extends Error {
	public code: number;
	public span?: SourceSpan;
	public line?: number;
	public column?: number;
	/** Message without the location suffix */
	public readonly baseMessage: string;

	constructor(message: string, code: number = StatusCode.ERROR, span?: SourceSpan) {
		super(message);
		this.code = code;
		this.name = 'AstBuildError';
		this.baseMessage = message;
		this.span = span;
		this.line = span?.startLine;
		this.column = span?.startColumn;

		// Enhance message with location if available
		if (span) {
			this.message = `${message} (at line ${span.startLine}, column ${span.startColumn})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, AstBuildError);
		}
	}

	/**
	 * The `{ message, line, column }` triple. Errors raised without a span
	 * (only possible for malformed, untyped input) report line and column 0.
	 */
	toDiagnostic(): Diagnostic {
		return {
			message: this.baseMessage,
			line: this.line ?? 0,
			column: this.column ?? 0,
		};
	}
}

/**
 * A data type name that has no entry in the canonical type table
 */
export class UnsupportedTypeError extends AstBuildError {
	public readonly typeName: string;

	constructor(typeName: string, span?: SourceSpan) {
		super(`unresolvable type name '${typeName}'`, StatusCode.MISMATCH, span);
		this.typeName = typeName;
		this.name = 'UnsupportedTypeError';
		Object.setPrototypeOf(this, UnsupportedTypeError.prototype);
	}
}

/**
 * A column definition that does not carry exactly one constraint
 */
export class ConstraintCardinalityError extends AstBuildError {
	public readonly count: number;

	constructor(count: number, span?: SourceSpan) {
		super(`invalid constraint cardinality: expected exactly one column constraint, found ${count}`, StatusCode.CONSTRAINT, span);
		this.count = count;
		this.name = 'ConstraintCardinalityError';
		Object.setPrototypeOf(this, ConstraintCardinalityError.prototype);
	}
}

/**
 * A SQL construct the grammar accepts but the builder does not translate
 */
export class UnsupportedFeatureError extends AstBuildError {
	public readonly feature: string;

	constructor(feature: string, span?: SourceSpan) {
		super(`unsupported: ${feature}`, StatusCode.UNSUPPORTED, span);
		this.feature = feature;
		this.name = 'UnsupportedFeatureError';
		Object.setPrototypeOf(this, UnsupportedFeatureError.prototype);
	}
}

/**
 * A parse tree node kind with no handler; the parser and builder disagree
 */
export class UnhandledNodeError extends AstBuildError {
	public readonly kind: string;

	constructor(kind: string, span?: SourceSpan) {
		super(`unhandled parse tree node kind '${kind}'`, StatusCode.INTERNAL, span);
		this.kind = kind;
		this.name = 'UnhandledNodeError';
		Object.setPrototypeOf(this, UnhandledNodeError.prototype);
	}
}

/**
 * A child node produced an AST fragment of the wrong type for its slot
 */
export class UnexpectedFragmentError extends AstBuildError {
	constructor(expected: string, actual: string, span?: SourceSpan) {
		super(`expected ${expected}, but got ${actual}`, StatusCode.INTERNAL, span);
		this.name = 'UnexpectedFragmentError';
		Object.setPrototypeOf(this, UnexpectedFragmentError.prototype);
	}
}

/**
 * Error thrown when the builder API is used incorrectly, such as an unknown
 * option key. Not an AstBuildError: it says nothing about the SQL being built.
 */
export class MisuseError extends Error {
	public readonly code = StatusCode.MISUSE;

	constructor(message: string = 'API misuse') {
		super(message);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}
