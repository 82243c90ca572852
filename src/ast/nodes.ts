/**
 * Canonical AST handed to the planner/catalog layer.
 * Every node is immutable once built and carries the span it was built from.
 */

/** 1-based source range, start and end both inclusive */
export interface SourceSpan {
	readonly startLine: number;
	readonly startColumn: number;
	readonly endLine: number;
	readonly endColumn: number;
}

// Base for all AST nodes
export interface AstNode {
	readonly type: 'identifier' | 'dataType' | 'primaryKey' | 'notNull' | 'columnDefinition' | 'createTable';
	readonly span: SourceSpan;
}

export interface Identifier extends AstNode {
	readonly type: 'identifier';
	/** Lowercased for unquoted tokens, verbatim for quoted ones */
	readonly name: string;
	readonly quoted: boolean;
}

/** Closed set of canonical type tags */
export enum SqlTypeName {
	INTEGER = 'INTEGER',
}

export interface DataType extends AstNode {
	readonly type: 'dataType';
	readonly typeName: SqlTypeName;
}

export interface PrimaryKeyConstraint extends AstNode {
	readonly type: 'primaryKey';
}

export interface NotNullConstraint extends AstNode {
	readonly type: 'notNull';
}

export type ColumnConstraint = PrimaryKeyConstraint | NotNullConstraint;

export type NullabilityStrategy = 'nullable' | 'notNullable';

export interface ColumnDefinition extends AstNode {
	readonly type: 'columnDefinition';
	readonly name: Identifier;
	readonly dataType: DataType;
	readonly nullability: NullabilityStrategy;
}

export interface CreateTableStatement extends AstNode {
	readonly type: 'createTable';
	readonly name: Identifier;
	/** Declaration order */
	readonly columns: readonly ColumnDefinition[];
	readonly ifNotExists: boolean;
}

export type Statement = CreateTableStatement;

/** Any fragment the builder's dispatch can return */
export type AstFragment = Statement | ColumnDefinition | ColumnConstraint | DataType | Identifier;
