/**
 * sql-ast-builder - parse tree to AST translation for a SQL front-end
 *
 * Consumes the concrete parse tree of a grammar-driven parser and produces the
 * canonical AST used by the planner/catalog layer.
 */

// Builder
export { AstBuilder, buildStatement, buildStatements, CANONICAL_TYPES, resolveTypeName } from './builder/index.js';
export type { BuildResult } from './builder/index.js';

// AST
export { SqlTypeName } from './ast/nodes.js';
export type {
	SourceSpan, AstNode, AstFragment, Identifier, DataType, ColumnConstraint, PrimaryKeyConstraint, NotNullConstraint,
	NullabilityStrategy, ColumnDefinition, CreateTableStatement, Statement,
} from './ast/nodes.js';
export { spanOf, spanToString } from './ast/span.js';

// Parse tree contract
export type * from './cst/nodes.js';

// Errors, status codes and logging
export { StatusCode } from './common/types.js';
export {
	AstBuildError, UnsupportedTypeError, ConstraintCardinalityError, UnsupportedFeatureError, UnhandledNodeError,
	UnexpectedFragmentError, MisuseError,
} from './common/errors.js';
export type { Diagnostic } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Configuration
export {
	BuilderOptionsManager, PRIMARY_KEY_IMPLIES_NOT_NULL, ENV_PREFIX,
} from './core/builder-options.js';
export type { BuilderOptionKey } from './core/builder-options.js';

