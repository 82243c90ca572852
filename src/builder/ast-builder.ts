import { createLogger } from '../common/logger.js';
import {
	ConstraintCardinalityError,
	UnexpectedFragmentError,
	UnhandledNodeError,
	UnsupportedFeatureError,
	UnsupportedTypeError,
} from '../common/errors.js';
import type * as Cst from '../cst/nodes.js';
import type * as AST from '../ast/nodes.js';
import { spanOf, spanToString } from '../ast/span.js';
import { resolveTypeName } from './type-table.js';
import { BuilderOptionsManager, PRIMARY_KEY_IMPLIES_NOT_NULL } from '../core/builder-options.js';

const log = createLogger('builder');
const errorLog = log.extend('error');

/**
 * Turns one concrete parse tree into one canonical AST.
 *
 * Each handler builds its children first and then its own node, so a single
 * depth-first pass produces the whole tree. The first failure aborts the
 * statement; nothing is recovered or collected.
 */
export class AstBuilder {
	private readonly options: BuilderOptionsManager;

	constructor(options?: BuilderOptionsManager) {
		this.options = options ?? new BuilderOptionsManager();
	}

	/**
	 * Builds the AST of a single-statement parse tree.
	 * @throws AstBuildError located at the node where the problem was found
	 */
	buildStatement(root: Cst.SingleStatementNode): AST.Statement {
		try {
			const statement = this.visitStatement(root.statement);
			log('Built %s %s at %s', statement.type, statement.name.name, spanToString(statement.span));
			return statement;
		} catch (e) {
			errorLog('Build failed: %O', e);
			throw e;
		}
	}

	/**
	 * Dispatches on the node kind. The switch is exhaustive over the parse tree
	 * union; the default branch only runs for input that bypassed the types.
	 */
	visit(node: Cst.AnyCstNode): AST.AstFragment {
		switch (node.kind) {
			case 'singleStatement': return this.visitStatement(node.statement);
			case 'createTable': return this.buildCreateTable(node);
			case 'createTableAs': return this.buildCreateTableAs(node);
			case 'columnDefinition': return this.buildColumnDefinition(node);
			case 'tableConstraint': return this.buildTableConstraint(node);
			case 'columnConstraintPrimaryKey': return this.buildConstraintPrimaryKey(node);
			case 'columnConstraintNotNull': return this.buildConstraintNotNull(node);
			case 'tableName': return this.buildTableName(node);
			case 'qualifiedName': return this.buildQualifiedName(node);
			case 'unquotedIdentifier':
			case 'quotedIdentifier':
				return this.buildIdentifier(node);
			case 'identDataType':
			case 'maybeParametrizedDataType':
				return this.buildDataType(node);
			case 'clause': return this.buildClause(node);
			default:
				return unhandled(node);
		}
	}

	buildCreateTable(node: Cst.CreateTableNode): AST.CreateTableStatement {
		const ifNotExists = node.ifNotExists !== undefined;
		for (const clause of [node.clusteredBy, node.partitionedBy, node.withProperties]) {
			if (clause) this.buildClause(clause);
		}

		const columns = node.elements.map(element => {
			const fragment = this.visit(element);
			if (fragment.type !== 'columnDefinition') {
				throw new UnexpectedFragmentError('column definition', fragment.type, spanOf(element));
			}
			return fragment;
		});

		return {
			type: 'createTable',
			name: this.buildTableName(node.table),
			columns,
			ifNotExists,
			span: spanOf(node),
		};
	}

	buildColumnDefinition(node: Cst.ColumnDefinitionNode): AST.ColumnDefinition {
		const span = spanOf(node);
		const name = this.buildIdentifier(node.name);
		const dataType = this.buildDataType(node.dataType);
		const constraints = node.constraints.map(c => this.buildColumnConstraint(c));

		// Only a single constraint per column is translated
		if (constraints.length !== 1) {
			throw new ConstraintCardinalityError(constraints.length, span);
		}

		return {
			type: 'columnDefinition',
			name,
			dataType,
			nullability: this.nullabilityOf(constraints[0]),
			span,
		};
	}

	buildConstraintPrimaryKey(node: Cst.ColumnConstraintPrimaryKeyNode): AST.PrimaryKeyConstraint {
		return { type: 'primaryKey', span: spanOf(node) };
	}

	buildConstraintNotNull(node: Cst.ColumnConstraintNotNullNode): AST.NotNullConstraint {
		return { type: 'notNull', span: spanOf(node) };
	}

	/*
	 * Case folding follows postgres: unquoted names fold to lower case, quoted
	 * names keep their spelling. It has to happen here because the AST no
	 * longer knows which kind of token a name came from.
	 */
	buildIdentifier(node: Cst.IdentifierNode): AST.Identifier {
		const span = spanOf(node);
		if (node.kind === 'quotedIdentifier') {
			return { type: 'identifier', name: node.value, quoted: true, span };
		}
		// String.prototype.toLowerCase ignores the host locale
		return { type: 'identifier', name: node.token.text.toLowerCase(), quoted: false, span };
	}

	buildTableName(node: Cst.TableNameNode): AST.Identifier {
		return this.buildQualifiedName(node.qname);
	}

	buildDataType(node: Cst.DataTypeNode): AST.DataType {
		if (node.kind === 'maybeParametrizedDataType') {
			if (node.parameters.length > 0) {
				throw new UnsupportedFeatureError(`type parameters for '${node.base.ident.token.text}'`, spanOf(node));
			}
			return this.buildDataType(node.base);
		}

		// Resolve on the raw spelling, not the case-folded identifier value
		const ident = this.buildIdentifier(node.ident);
		const rawName = ident.quoted ? ident.name : node.ident.token.text;
		const span = spanOf(node);
		const typeName = resolveTypeName(rawName);
		if (typeName === undefined) {
			throw new UnsupportedTypeError(rawName, span);
		}
		return { type: 'dataType', typeName, span };
	}

	private visitStatement(node: Cst.StatementNode): AST.Statement {
		switch (node.kind) {
			case 'createTable': return this.buildCreateTable(node);
			case 'createTableAs': return this.buildCreateTableAs(node);
			default: return unhandled(node);
		}
	}

	private buildColumnConstraint(node: Cst.ColumnConstraintNode): AST.ColumnConstraint {
		switch (node.kind) {
			case 'columnConstraintPrimaryKey': return this.buildConstraintPrimaryKey(node);
			case 'columnConstraintNotNull': return this.buildConstraintNotNull(node);
			default: return unhandled(node);
		}
	}

	private buildQualifiedName(node: Cst.QualifiedNameNode): AST.Identifier {
		if (node.parts.length !== 1) {
			throw new UnsupportedFeatureError('qualified table names', spanOf(node));
		}
		return this.buildIdentifier(node.parts[0]);
	}

	private buildCreateTableAs(node: Cst.CreateTableAsNode): never {
		throw new UnsupportedFeatureError('CREATE TABLE ... AS', spanOf(node));
	}

	private buildTableConstraint(node: Cst.TableConstraintNode): never {
		throw new UnsupportedFeatureError('table constraints', spanOf(node));
	}

	private buildClause(node: Cst.ClauseNode): never {
		throw new UnsupportedFeatureError(CLAUSE_NAMES[node.clause], spanOf(node));
	}

	private nullabilityOf(constraint: AST.ColumnConstraint): AST.NullabilityStrategy {
		switch (constraint.type) {
			case 'notNull':
				return 'notNullable';
			case 'primaryKey':
				return this.options.getOption(PRIMARY_KEY_IMPLIES_NOT_NULL) ? 'notNullable' : 'nullable';
		}
	}
}

const CLAUSE_NAMES: Readonly<Record<Cst.ClauseNode['clause'], string>> = {
	clusteredBy: 'CLUSTERED BY',
	partitionedBy: 'PARTITIONED BY',
	withProperties: 'table properties (WITH)',
	query: 'CREATE TABLE ... AS',
};

/** Fails for a node that slipped past the exhaustive switches */
function unhandled(node: never): never {
	const value: unknown = node;
	const kind = isRecord(value) && typeof value.kind === 'string' ? value.kind : typeof value;
	throw new UnhandledNodeError(kind, isRecord(value) ? tryRecoverSpan(value) : undefined);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}

function isToken(value: unknown): value is Cst.Token {
	return isRecord(value) && typeof value.line === 'number' && typeof value.column === 'number';
}

function tryRecoverSpan(value: Record<string, unknown>): AST.SourceSpan | undefined {
	const { start, stop } = value;
	if (isToken(start) && isToken(stop)) {
		return { startLine: start.line, startColumn: start.column, endLine: stop.line, endColumn: stop.column };
	}
	return undefined;
}
