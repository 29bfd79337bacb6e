/**
 * Structural problems found while rendering a statement.
 */
export type StatementErrorCode = 'NO_TABLE' | 'NO_VALUES' | 'NO_SET_FIELDS';

const statementMessages: Record<StatementErrorCode, string> = {
	NO_TABLE: 'no table name',
	NO_VALUES: 'no values',
	NO_SET_FIELDS: 'no set fields'
};

/**
 * Raised by the renderers when a statement cannot produce valid SQL.
 */
export class StatementError extends Error
{
	readonly code: StatementErrorCode;

	constructor(code: StatementErrorCode)
	{
		super(statementMessages[code]);
		this.name = 'StatementError';
		this.code = code;
	}
}

/**
 * Failures of the execution layer (connection state and row conversion).
 */
export type ExecutionErrorCode = 'NOT_CONNECTED' | 'UNSUPPORTED_TYPE' | 'NO_VALUE' | 'TYPE_MISMATCH';

export class ExecutionError extends Error
{
	readonly code: ExecutionErrorCode;

	constructor(code: ExecutionErrorCode, message: string)
	{
		super(message);
		this.name = 'ExecutionError';
		this.code = code;
	}
}
