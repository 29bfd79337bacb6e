/**
 * StatementRenderer - Serializes accumulated statement clauses into SQL text
 *
 * Rendering is pure: the same unmodified statement always yields the same
 * string, so a builder may be rendered, changed and rendered again.
 *
 * Clause order for SELECT:
 * SELECT [DISTINCT] fields FROM table [joins] [GROUP BY] [HAVING] [WHERE] [ORDER BY] [LIMIT] [OFFSET] [UNION ...]
 *
 * @module statementRenderer
 */

import { Statement } from './statement';
import { StatementError } from './errors';

/**
 * Renders the WHERE clause including its leading space, or an empty string.
 * A single OR-chain is written bare; several are each parenthesized and ANDed.
 */
export function renderWheres(wheres: readonly string[]): string
{
	if (wheres.length === 0) return '';
	if (wheres.length === 1) return ` WHERE ${wheres[0]}`;
	return ` WHERE ${wheres.map(cond => `(${cond})`).join(' AND ')}`;
}

function renderList(keyword: string, items: readonly string[]): string
{
	return items.length > 0 ? ` ${keyword} ${items.join(', ')}` : '';
}

function renderFields(statement: Statement): string
{
	return statement.fields.length > 0 ? statement.fields.join(', ') : '*';
}

function renderDistinct(statement: Statement): string
{
	return statement.distinct ? ' DISTINCT' : '';
}

function checkTable(statement: Statement): void
{
	if (statement.table.length === 0)
	{
		throw new StatementError('NO_TABLE');
	}
}

function renderSelect(statement: Statement): string
{
	checkTable(statement);

	let sql = `SELECT${renderDistinct(statement)} ${renderFields(statement)} FROM ${statement.table}`;

	for (const join of statement.joins)
	{
		sql += ` ${join}`;
	}

	sql += renderList('GROUP BY', statement.groupBy);

	// HAVING is written even without GROUP BY; the caller owns that combination
	if (statement.having !== undefined)
	{
		sql += ` HAVING ${statement.having}`;
	}

	sql += renderWheres(statement.wheres);
	sql += renderList('ORDER BY', statement.orderBy);

	if (statement.limit !== undefined)
	{
		sql += ` LIMIT ${statement.limit}`;
	}

	if (statement.offset !== undefined)
	{
		sql += ` OFFSET ${statement.offset}`;
	}

	for (const union of statement.unions)
	{
		sql += ` ${union}`;
	}

	return sql;
}

function renderInsert(statement: Statement): string
{
	checkTable(statement);

	const columns = statement.fields.length > 0 ? ` (${statement.fields.join(', ')})` : '';

	if (statement.selectSource !== undefined)
	{
		return `INSERT INTO ${statement.table}${columns} ${statement.selectSource}`;
	}

	if (statement.values.length === 0)
	{
		throw new StatementError('NO_VALUES');
	}

	return `INSERT INTO ${statement.table}${columns} VALUES ${statement.values.join(', ')}`;
}

function renderUpdate(statement: Statement): string
{
	checkTable(statement);

	if (statement.sets.length === 0)
	{
		throw new StatementError('NO_SET_FIELDS');
	}

	return `UPDATE ${statement.table} SET ${statement.sets.join(', ')}${renderWheres(statement.wheres)}`;
}

function renderDelete(statement: Statement): string
{
	checkTable(statement);

	return `DELETE FROM ${statement.table}${renderWheres(statement.wheres)}`;
}

/**
 * Renders the statement as an unterminated fragment.
 * @throws StatementError when the table, INSERT values or UPDATE assignments are missing
 */
export function renderQuery(statement: Statement): string
{
	switch (statement.kind)
	{
		case 'SELECT':
			return renderSelect(statement);
		case 'INSERT':
			return renderInsert(statement);
		case 'UPDATE':
			return renderUpdate(statement);
		case 'DELETE':
			return renderDelete(statement);
	}
}

/**
 * Renders the complete statement terminated with a semicolon.
 */
export function renderSql(statement: Statement): string
{
	return `${renderQuery(statement)};`;
}

/**
 * Renders the statement as a parenthesized subquery.
 */
export function renderSubquery(statement: Statement): string
{
	return `(${renderQuery(statement)})`;
}

/**
 * Renders the statement as a parenthesized subquery with an alias.
 */
export function renderSubqueryAs(statement: Statement, name: string): string
{
	return `${renderSubquery(statement)} AS ${name}`;
}

/**
 * Renders only the projection, for selects that read no table
 * (e.g. "SELECT 10, 'abc'").
 */
export function renderQueryValues(statement: Statement): string
{
	return `SELECT${renderDistinct(statement)} ${renderFields(statement)}`;
}
