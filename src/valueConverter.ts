import { ExecutionError } from './errors';

/**
 * Generic value a result cell is converted to.
 */
export type JsonValue = null | number | string;

/**
 * A result row as returned by the driver: one cell per column, in column order.
 */
export type DriverRow = readonly unknown[];

function typeName(value: unknown): string
{
	if (value instanceof Uint8Array) return 'blob';
	if (typeof value === 'number') return 'real';
	return typeof value;
}

/**
 * Converts a single driver value. Only NULL, integers and text are supported.
 * @throws ExecutionError with code UNSUPPORTED_TYPE for any other value
 */
export function toJsonValue(value: unknown): JsonValue
{
	if (value === null || value === undefined) return null;
	if (typeof value === 'string') return value;
	if (typeof value === 'number' && Number.isInteger(value)) return value;
	if (typeof value === 'bigint' && value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER))
	{
		return Number(value);
	}

	throw new ExecutionError('UNSUPPORTED_TYPE', `Unsupported type: ${typeName(value)}`);
}

/**
 * Converts every column of a row, keeping column order.
 */
export function toJsonRow(row: DriverRow): JsonValue[]
{
	return row.map(toJsonValue);
}
