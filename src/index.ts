/**
 * @file Main entry point: the fluent statement builder, its escaping helpers,
 * and the SQLite execution layer.
 */
import { SqlBuilder } from './sqlBuilder';
import { escape, quote, quoteList, quoteIdentifier } from './sqlEscaper';
import { StatementError, ExecutionError } from './errors';
import { toJsonValue, toJsonRow } from './valueConverter';
import { SQLiteProvider } from './dataProviders/SQLiteProvider';
import { Logger, LogLevel, globalLogger, getLogger, defaultFormatter } from './logger';

export type { Statement, StatementKind, JoinOperator, SqlText } from './statement';
export type { StatementErrorCode, ExecutionErrorCode } from './errors';
export type { JsonValue, DriverRow } from './valueConverter';
export type { StatementExecutor } from './dataProvider';
export type { SQLiteProviderOptions } from './dataProviders/SQLiteProvider';
export type { LoggerConfig, LogEntry, LogData, ContextLogger } from './logger';

export
{
	SqlBuilder,
	escape, quote, quoteList, quoteIdentifier,
	StatementError, ExecutionError,
	toJsonValue, toJsonRow,
	SQLiteProvider,
	Logger, LogLevel, globalLogger, getLogger, defaultFormatter
}
