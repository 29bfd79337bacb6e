/**
 * String and identifier escaping for SQLite statements.
 * The builder never escapes caller-supplied fragments on its own; these
 * helpers are the way to embed literal text into raw fragments.
 */

/**
 * Escape a string literal body by doubling every single quote.
 * @param text Raw text
 * @returns Escaped text (e.g., "O'Brien" becomes "O''Brien")
 */
export function escape(text: string): string
{
	return text.replace(/'/g, "''");
}

/**
 * Escape and wrap a string in single quotes.
 * @param text Raw text
 * @returns Quoted literal (e.g., "O'Brien" becomes "'O''Brien'")
 */
export function quote(text: string): string
{
	return `'${escape(text)}'`;
}

/**
 * Quote every element of a list as a string literal.
 */
export function quoteList(values: readonly string[]): string[]
{
	return values.map(quote);
}

/**
 * Escape identifiers using double quotes, supports table.field format
 * @param identifier Identifier (e.g., "books.id" or "id")
 * @returns Escaped identifier (e.g., "\"books\".\"id\"" or "\"id\"")
 */
export function quoteIdentifier(identifier: string): string
{
	// Split by dot to handle table.field format
	const parts = identifier.split('.');

	return parts.map(part => `"${part.replace(/"/g, '""')}"`).join('.');
}
