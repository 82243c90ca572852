/**
 * Concrete parse tree contract produced by the grammar-driven parser.
 * Node kinds mirror grammar productions one-to-one; fields hold children in
 * source order. Nothing here is normalized: identifiers still carry their
 * quoted/unquoted distinction and type names their raw spelling.
 */

export interface Token {
	/** Raw source text of the token */
	text: string;
	/** 1-based */
	line: number;
	/** 1-based */
	column: number;
}

// Base for all parse tree nodes
export interface CstNode {
	kind: CstNodeKind;
	/** First token covered by the node */
	start: Token;
	/** Last token covered by the node */
	stop: Token;
}

export type CstNodeKind =
	| 'singleStatement' | 'createTable' | 'createTableAs' | 'columnDefinition' | 'tableConstraint'
	| 'columnConstraintPrimaryKey' | 'columnConstraintNotNull' | 'tableName' | 'qualifiedName'
	| 'unquotedIdentifier' | 'quotedIdentifier' | 'identDataType' | 'maybeParametrizedDataType' | 'clause';

export interface SingleStatementNode extends CstNode {
	kind: 'singleStatement';
	statement: StatementNode;
}

export type StatementNode = CreateTableNode | CreateTableAsNode;

// CREATE TABLE [IF NOT EXISTS] name (elements) [CLUSTERED BY ...] [PARTITIONED BY ...] [WITH (...)]
export interface CreateTableNode extends CstNode {
	kind: 'createTable';
	/** The EXISTS token of IF NOT EXISTS, when present */
	ifNotExists?: Token;
	table: TableNameNode;
	elements: TableElementNode[];
	clusteredBy?: ClauseNode;
	partitionedBy?: ClauseNode;
	withProperties?: ClauseNode;
}

// CREATE TABLE name AS query
export interface CreateTableAsNode extends CstNode {
	kind: 'createTableAs';
	table: TableNameNode;
	query: ClauseNode;
}

export type TableElementNode = ColumnDefinitionNode | TableConstraintNode;

export interface ColumnDefinitionNode extends CstNode {
	kind: 'columnDefinition';
	name: IdentifierNode;
	dataType: DataTypeNode;
	constraints: ColumnConstraintNode[];
}

// Table-level PRIMARY KEY (a, b)
export interface TableConstraintNode extends CstNode {
	kind: 'tableConstraint';
	columns: IdentifierNode[];
}

export type ColumnConstraintNode = ColumnConstraintPrimaryKeyNode | ColumnConstraintNotNullNode;

export interface ColumnConstraintPrimaryKeyNode extends CstNode {
	kind: 'columnConstraintPrimaryKey';
}

export interface ColumnConstraintNotNullNode extends CstNode {
	kind: 'columnConstraintNotNull';
}

export interface TableNameNode extends CstNode {
	kind: 'tableName';
	qname: QualifiedNameNode;
}

export interface QualifiedNameNode extends CstNode {
	kind: 'qualifiedName';
	parts: IdentifierNode[];
}

export type IdentifierNode = UnquotedIdentifierNode | QuotedIdentifierNode;

export interface UnquotedIdentifierNode extends CstNode {
	kind: 'unquotedIdentifier';
	token: Token;
}

export interface QuotedIdentifierNode extends CstNode {
	kind: 'quotedIdentifier';
	token: Token;
	/** Identifier text with the surrounding quotes removed and escapes resolved */
	value: string;
}

export type DataTypeNode = IdentDataTypeNode | MaybeParametrizedDataTypeNode;

export interface IdentDataTypeNode extends CstNode {
	kind: 'identDataType';
	ident: IdentifierNode;
}

export interface MaybeParametrizedDataTypeNode extends CstNode {
	kind: 'maybeParametrizedDataType';
	base: IdentDataTypeNode;
	/** Integer literal tokens between the parentheses; empty when there are none */
	parameters: Token[];
}

/** A clause the grammar recognizes but the builder does not translate */
export interface ClauseNode extends CstNode {
	kind: 'clause';
	clause: 'clusteredBy' | 'partitionedBy' | 'withProperties' | 'query';
}

export type AnyCstNode =
	| SingleStatementNode | CreateTableNode | CreateTableAsNode | ColumnDefinitionNode | TableConstraintNode
	| ColumnConstraintPrimaryKeyNode | ColumnConstraintNotNullNode | TableNameNode | QualifiedNameNode
	| UnquotedIdentifierNode | QuotedIdentifierNode | IdentDataTypeNode | MaybeParametrizedDataTypeNode | ClauseNode;
