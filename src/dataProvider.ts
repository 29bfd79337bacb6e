import { JsonValue } from './valueConverter';

/**
 * Runs rendered SQL against a database and converts result cells to `JsonValue`.
 */
export interface StatementExecutor
{
	/**
	 * Executes a statement that returns no rows.
	 */
	exec(sql: string): Promise<void>;

	/**
	 * Returns every row of a query.
	 */
	all(sql: string): Promise<JsonValue[][]>;

	/**
	 * Returns the first row of a query, or undefined when there is none.
	 */
	first(sql: string): Promise<JsonValue[] | undefined>;

	/**
	 * Iterates the rows of a query one at a time.
	 */
	cursor(sql: string): AsyncIterableIterator<JsonValue[]>;
}
