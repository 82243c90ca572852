/**
 * In-process stand-in for the grammar-driven parser: turns CREATE TABLE text
 * into the parse tree shape the builder consumes. Test-only; it covers just
 * the productions the tests exercise.
 */
import type * as Cst from '../../src/cst/nodes.js';

type LexTokenType = 'word' | 'quoted' | 'number' | 'punct' | 'eof';

interface LexToken extends Cst.Token {
	type: LexTokenType;
	/** Unescaped content of a quoted identifier */
	value: string;
}

function tokenize(source: string): LexToken[] {
	const tokens: LexToken[] = [];
	let current = 0;
	let line = 1;
	let column = 1;

	const advance = (): string => {
		const c = source[current++];
		if (c === '\n') {
			line++;
			column = 1;
		} else {
			column++;
		}
		return c;
	};
	const peek = (offset = 0): string => source[current + offset] ?? '';

	while (current < source.length) {
		const startLine = line;
		const startColumn = column;
		const start = current;
		const c = advance();

		if (/\s/.test(c)) continue;
		if (c === '-' && peek() === '-') {
			while (peek() !== '\n' && current < source.length) advance();
			continue;
		}

		if (c === '"') {
			let value = '';
			for (;;) {
				if (current >= source.length) throw new Error(`Unterminated identifier at ${startLine}:${startColumn}`);
				const q = advance();
				if (q === '"') {
					if (peek() !== '"') break;
					advance();
				}
				value += q;
			}
			tokens.push({ type: 'quoted', text: source.slice(start, current), value, line: startLine, column: startColumn });
			continue;
		}

		let type: LexTokenType;
		if (/[A-Za-z_]/.test(c)) {
			while (/[A-Za-z0-9_$]/.test(peek())) advance();
			type = 'word';
		} else if (/[0-9]/.test(c)) {
			while (/[0-9]/.test(peek())) advance();
			type = 'number';
		} else if ('(),.;='.includes(c)) {
			type = 'punct';
		} else {
			throw new Error(`Unexpected character '${c}' at ${startLine}:${startColumn}`);
		}
		const text = source.slice(start, current);
		tokens.push({ type, text, value: text, line: startLine, column: startColumn });
	}

	tokens.push({ type: 'eof', text: '', value: '', line, column });
	return tokens;
}

class CstParser {
	private current = 0;

	constructor(private readonly tokens: LexToken[]) {}

	singleStatement(): Cst.SingleStatementNode {
		const start = this.peek();
		const statement = this.statement();
		this.matchPunct(';');
		if (this.peek().type !== 'eof') {
			throw this.error(`Unexpected '${this.peek().text}' after statement`);
		}
		return { kind: 'singleStatement', statement, start, stop: this.previous() };
	}

	private statement(): Cst.StatementNode {
		const start = this.expectKeyword('CREATE');
		this.expectKeyword('TABLE');

		let ifNotExists: Cst.Token | undefined;
		if (this.matchKeyword('IF')) {
			this.expectKeyword('NOT');
			ifNotExists = this.expectKeyword('EXISTS');
		}

		const table = this.tableName();

		if (!ifNotExists && this.matchKeyword('AS')) {
			const query = this.restAsClause('query');
			return { kind: 'createTableAs', table, query, start, stop: this.previous() };
		}

		this.expectPunct('(');
		const elements: Cst.TableElementNode[] = [];
		do {
			elements.push(this.tableElement());
		} while (this.matchPunct(','));
		this.expectPunct(')');

		const node: Cst.CreateTableNode = { kind: 'createTable', table, elements, start, stop: this.previous() };
		if (ifNotExists) node.ifNotExists = ifNotExists;

		for (;;) {
			if (this.checkKeyword('CLUSTERED')) {
				node.clusteredBy = this.keywordClause('clusteredBy', ['CLUSTERED', 'BY']);
			} else if (this.checkKeyword('PARTITIONED')) {
				node.partitionedBy = this.keywordClause('partitionedBy', ['PARTITIONED', 'BY']);
			} else if (this.checkKeyword('WITH')) {
				node.withProperties = this.keywordClause('withProperties', ['WITH']);
			} else {
				break;
			}
			node.stop = this.previous();
		}
		return node;
	}

	private tableName(): Cst.TableNameNode {
		const qname = this.qualifiedName();
		return { kind: 'tableName', qname, start: qname.start, stop: qname.stop };
	}

	private qualifiedName(): Cst.QualifiedNameNode {
		const parts = [this.identifier()];
		while (this.matchPunct('.')) {
			parts.push(this.identifier());
		}
		return { kind: 'qualifiedName', parts, start: parts[0].start, stop: this.previous() };
	}

	private tableElement(): Cst.TableElementNode {
		if (this.checkKeyword('PRIMARY')) {
			const start = this.advance();
			this.expectKeyword('KEY');
			this.expectPunct('(');
			const columns = [this.identifier()];
			while (this.matchPunct(',')) columns.push(this.identifier());
			this.expectPunct(')');
			return { kind: 'tableConstraint', columns, start, stop: this.previous() };
		}
		return this.columnDefinition();
	}

	private columnDefinition(): Cst.ColumnDefinitionNode {
		const name = this.identifier();
		const dataType = this.dataType();
		const constraints: Cst.ColumnConstraintNode[] = [];
		while (!this.checkPunct(',') && !this.checkPunct(')')) {
			constraints.push(this.columnConstraint());
		}
		return { kind: 'columnDefinition', name, dataType, constraints, start: name.start, stop: this.previous() };
	}

	private columnConstraint(): Cst.ColumnConstraintNode {
		if (this.checkKeyword('PRIMARY')) {
			const start = this.advance();
			const stop = this.expectKeyword('KEY');
			return { kind: 'columnConstraintPrimaryKey', start, stop };
		}
		if (this.checkKeyword('NOT')) {
			const start = this.advance();
			const stop = this.expectKeyword('NULL');
			return { kind: 'columnConstraintNotNull', start, stop };
		}
		throw this.error(`Unexpected '${this.peek().text}' in column definition`);
	}

	private dataType(): Cst.MaybeParametrizedDataTypeNode {
		const ident = this.identifier();
		const base: Cst.IdentDataTypeNode = { kind: 'identDataType', ident, start: ident.start, stop: ident.stop };
		const parameters: Cst.Token[] = [];
		if (this.matchPunct('(')) {
			do {
				parameters.push(this.expect('number'));
			} while (this.matchPunct(','));
			this.expectPunct(')');
		}
		return { kind: 'maybeParametrizedDataType', base, parameters, start: base.start, stop: this.previous() };
	}

	private identifier(): Cst.IdentifierNode {
		const token = this.peek();
		if (token.type === 'quoted') {
			this.advance();
			return { kind: 'quotedIdentifier', token, value: token.value, start: token, stop: token };
		}
		if (token.type === 'word') {
			this.advance();
			return { kind: 'unquotedIdentifier', token, start: token, stop: token };
		}
		throw this.error(`Expected identifier, got '${token.text}'`);
	}

	/** Keyword prefix followed by one parenthesized group */
	private keywordClause(clause: Cst.ClauseNode['clause'], keywords: string[]): Cst.ClauseNode {
		const start = this.peek();
		for (const keyword of keywords) this.expectKeyword(keyword);
		this.expectPunct('(');
		let depth = 1;
		while (depth > 0) {
			const token = this.advance();
			if (token.type === 'eof') throw this.error('Unbalanced parentheses');
			if (token.text === '(') depth++;
			if (token.text === ')') depth--;
		}
		return { kind: 'clause', clause, start, stop: this.previous() };
	}

	/** Everything up to the end of the statement */
	private restAsClause(clause: Cst.ClauseNode['clause']): Cst.ClauseNode {
		const start = this.peek();
		const startIndex = this.current;
		while (this.peek().type !== 'eof' && !this.checkPunct(';')) this.advance();
		if (this.current === startIndex) throw this.error('Expected query');
		return { kind: 'clause', clause, start, stop: this.previous() };
	}

	private peek(): LexToken {
		return this.tokens[this.current];
	}

	private previous(): LexToken {
		return this.tokens[this.current - 1];
	}

	private advance(): LexToken {
		const token = this.tokens[this.current];
		if (token.type !== 'eof') this.current++;
		return token;
	}

	private checkKeyword(keyword: string): boolean {
		const token = this.peek();
		return token.type === 'word' && token.text.toUpperCase() === keyword;
	}

	private checkPunct(punct: string): boolean {
		const token = this.peek();
		return token.type === 'punct' && token.text === punct;
	}

	private matchKeyword(keyword: string): boolean {
		if (!this.checkKeyword(keyword)) return false;
		this.advance();
		return true;
	}

	private matchPunct(punct: string): boolean {
		if (!this.checkPunct(punct)) return false;
		this.advance();
		return true;
	}

	private expectKeyword(keyword: string): LexToken {
		if (!this.checkKeyword(keyword)) throw this.error(`Expected ${keyword}, got '${this.peek().text}'`);
		return this.advance();
	}

	private expectPunct(punct: string): LexToken {
		if (!this.checkPunct(punct)) throw this.error(`Expected '${punct}', got '${this.peek().text}'`);
		return this.advance();
	}

	private expect(type: LexTokenType): LexToken {
		if (this.peek().type !== type) throw this.error(`Expected ${type}, got '${this.peek().text}'`);
		return this.advance();
	}

	private error(message: string): Error {
		const token = this.peek();
		return new Error(`${message} at ${token.line}:${token.column}`);
	}
}

/** Parses one CREATE TABLE statement into its parse tree */
export function parseCst(sql: string): Cst.SingleStatementNode {
	return new CstParser(tokenize(sql)).singleStatement();
}
