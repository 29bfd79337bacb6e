/**
 * @file Mutable clause state of a single SQL statement under construction.
 * The builder owns one `Statement` and the renderer reads it; nothing else
 * holds a reference to it.
 */

/**
 * Statement kind, fixed at construction. Rendering dispatches on it once.
 */
export type StatementKind = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

/**
 * Join keyword written in front of the joined table.
 */
export type JoinOperator =
	| 'JOIN'
	| 'LEFT JOIN'
	| 'LEFT OUTER JOIN'
	| 'RIGHT JOIN'
	| 'INNER JOIN'
	| 'CROSS JOIN';

/**
 * Anything a caller may pass where SQL text is expected.
 * Values are stored by their display string.
 */
export type SqlText = string | number | bigint | boolean;

/**
 * Accumulated clauses of a statement.
 * Examples:
 * { kind: 'SELECT', table: 'books', fields: ['title'], wheres: ['price > 100'], ... }
 * { kind: 'UPDATE', table: 'books', sets: ['price = price + 10'], ... }
 */
export interface Statement
{
	readonly kind: StatementKind;
	/** Table, comma-separated table list or parenthesized subquery */
	table: string;
	distinct: boolean;
	/** SELECT column list, or INSERT column list */
	fields: string[];
	/** Fully rendered join fragments, e.g. "LEFT JOIN shops ON books.id = shops.book" */
	joins: string[];
	/** Modifiers consumed by the next join */
	joinNatural: boolean;
	joinOperator: JoinOperator;
	/** "field = value" assignments (UPDATE) */
	sets: string[];
	/** Parenthesized value tuples (INSERT) */
	values: string[];
	/** Raw query used as the INSERT source instead of VALUES */
	selectSource?: string;
	groupBy: string[];
	having?: string;
	/** Each entry is one OR-chain; entries are ANDed together */
	wheres: string[];
	/** "field" or "field DESC" */
	orderBy: string[];
	limit?: number;
	offset?: number;
	/** "UNION q" or "UNION ALL q" fragments written after the main query */
	unions: string[];
}

/**
 * Creates an empty statement of the given kind.
 */
export function createStatement(kind: StatementKind, table: string): Statement
{
	return {
		kind,
		table,
		distinct: false,
		fields: [],
		joins: [],
		joinNatural: false,
		joinOperator: 'JOIN',
		sets: [],
		values: [],
		groupBy: [],
		wheres: [],
		orderBy: [],
		unions: []
	};
}

/**
 * Converts caller input to stored SQL text.
 */
export function toText(value: SqlText): string
{
	return String(value);
}

/**
 * Appends a new independent entry.
 */
export function appendEntry(entries: string[], entry: string): void
{
	entries.push(entry);
}

/**
 * Extends the most recently appended entry with `separator + text`.
 * When there is no entry yet, `text` becomes the first one.
 */
export function extendLastEntry(entries: string[], separator: string, text: string): void
{
	const last = entries.length - 1;
	if (last < 0)
	{
		entries.push(text);
		return;
	}
	entries[last] = `${entries[last]}${separator}${text}`;
}
