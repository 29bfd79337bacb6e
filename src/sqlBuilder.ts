import {
	Statement, StatementKind, SqlText,
	createStatement, toText, appendEntry, extendLastEntry
} from './statement';
import {
	renderSql, renderQuery, renderSubquery, renderSubqueryAs, renderQueryValues
} from './statementRenderer';
import { escape, quote, quoteList } from './sqlEscaper';
import { StatementExecutor } from './dataProvider';
import { JsonValue } from './valueConverter';
import { ExecutionError } from './errors';

/**
 * Where an accumulated condition goes: a new ANDed entry, or the end of the
 * current OR-chain.
 */
type WhereMode = 'AND' | 'OR';

/**
 * Comparison operators accepted by the field/value accumulators.
 */
type Comparison = '=' | '<>' | '>' | '>=' | '<' | '<=';

function rowCount(value: number): number
{
	return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}

function likeMask(mask: SqlText, prefix: string, suffix: string): string
{
	return `'${prefix}${escape(toText(mask))}${suffix}'`;
}

/**
 * Fluent builder for SQL statements.
 * Every accumulator mutates this builder and returns it, so a builder can be
 * rendered, modified and rendered again (e.g. a COUNT query followed by the
 * page of results it counts).
 *
 * @example
 * ```typescript
 * const sql = SqlBuilder.selectFrom('books')
 *   .field('title')
 *   .field('price')
 *   .andWhere('price > 100')
 *   .andWhereLikeLeft('title', 'Harry Potter')
 *   .orderDesc('price')
 *   .limit(10)
 *   .sql();
 * // SELECT title, price FROM books WHERE (price > 100) AND (title LIKE 'Harry Potter%') ORDER BY price DESC LIMIT 10;
 * ```
 */
export class SqlBuilder
{
	private readonly statement: Statement;

	private constructor(kind: StatementKind, table: SqlText)
	{
		this.statement = createStatement(kind, toText(table));
	}

	/**
	 * Create a SELECT statement.
	 * @param table - Table name, comma-separated table list or subquery
	 */
	static selectFrom(table: SqlText): SqlBuilder
	{
		return new SqlBuilder('SELECT', table);
	}

	/**
	 * Create a SELECT that reads no table; render it with `queryValues()`.
	 */
	static selectValues(values: readonly SqlText[]): SqlBuilder
	{
		return new SqlBuilder('SELECT', '').fields(values);
	}

	/**
	 * Create an INSERT statement.
	 */
	static insertInto(table: SqlText): SqlBuilder
	{
		return new SqlBuilder('INSERT', table);
	}

	/**
	 * Create an UPDATE statement.
	 */
	static updateTable(table: SqlText): SqlBuilder
	{
		return new SqlBuilder('UPDATE', table);
	}

	/**
	 * Create a DELETE statement.
	 */
	static deleteFrom(table: SqlText): SqlBuilder
	{
		return new SqlBuilder('DELETE', table);
	}

	/**
	 * Make the next join NATURAL.
	 */
	natural(): this
	{
		this.statement.joinNatural = true;
		return this;
	}

	/**
	 * Make the next join a LEFT JOIN.
	 */
	left(): this
	{
		this.statement.joinOperator = 'LEFT JOIN';
		return this;
	}

	/**
	 * Make the next join a LEFT OUTER JOIN.
	 */
	leftOuter(): this
	{
		this.statement.joinOperator = 'LEFT OUTER JOIN';
		return this;
	}

	/**
	 * Make the next join a RIGHT JOIN.
	 */
	right(): this
	{
		this.statement.joinOperator = 'RIGHT JOIN';
		return this;
	}

	/**
	 * Make the next join an INNER JOIN.
	 */
	inner(): this
	{
		this.statement.joinOperator = 'INNER JOIN';
		return this;
	}

	/**
	 * Make the next join a CROSS JOIN.
	 */
	cross(): this
	{
		this.statement.joinOperator = 'CROSS JOIN';
		return this;
	}

	/**
	 * Join with a table. Pending join modifiers are applied and reset.
	 * @param table - Joined table, optionally with alias
	 * @param operator - Join type written before JOIN (e.g. "LEFT OUTER"); overrides a pending modifier
	 * @param constraint - Raw text written after the table (e.g. "ON b.id = s.book" or "USING (id)")
	 */
	join(table: SqlText, operator?: string, constraint?: string): this
	{
		const keyword: string = operator !== undefined ? `${operator} JOIN` : this.statement.joinOperator;
		let text = `${keyword} ${toText(table)}`;

		if (this.statement.joinNatural)
		{
			text = `NATURAL ${text}`;
		}

		if (constraint !== undefined)
		{
			text += ` ${constraint}`;
		}

		appendEntry(this.statement.joins, text);
		this.statement.joinNatural = false;
		this.statement.joinOperator = 'JOIN';
		return this;
	}

	/**
	 * Add ON constraint to the last join. Ignored when nothing was joined yet.
	 */
	on(constraint: SqlText): this
	{
		if (this.statement.joins.length > 0)
		{
			extendLastEntry(this.statement.joins, ' ON ', toText(constraint));
		}
		return this;
	}

	/**
	 * Set DISTINCT for fields.
	 */
	distinct(): this
	{
		this.statement.distinct = true;
		return this;
	}

	/**
	 * Add fields.
	 */
	fields(fields: readonly SqlText[]): this
	{
		this.statement.fields.push(...fields.map(toText));
		return this;
	}

	/**
	 * Replace fields.
	 */
	setFields(fields: readonly SqlText[]): this
	{
		this.statement.fields = fields.map(toText);
		return this;
	}

	/**
	 * Add field.
	 */
	field(field: SqlText): this
	{
		this.statement.fields.push(toText(field));
		return this;
	}

	/**
	 * Replace fields with the given one.
	 */
	setField(field: SqlText): this
	{
		this.statement.fields = [toText(field)];
		return this;
	}

	/**
	 * Add SET part (for UPDATE). The value is written verbatim.
	 */
	set(field: SqlText, value: SqlText): this
	{
		this.statement.sets.push(`${toText(field)} = ${toText(value)}`);
		return this;
	}

	/**
	 * Add SET part with the value quoted as a string literal.
	 */
	setStr(field: SqlText, value: SqlText): this
	{
		return this.set(field, quote(toText(value)));
	}

	/**
	 * Add VALUES tuple (for INSERT).
	 */
	values(values: readonly SqlText[]): this
	{
		this.statement.values.push(`(${values.map(toText).join(', ')})`);
		return this;
	}

	/**
	 * Use a query as the INSERT source instead of VALUES.
	 */
	select(query: SqlText): this
	{
		this.statement.selectSource = toText(query);
		return this;
	}

	/**
	 * Add GROUP BY part.
	 */
	groupBy(field: SqlText): this
	{
		this.statement.groupBy.push(toText(field));
		return this;
	}

	/**
	 * Set HAVING condition (replaces the previous one).
	 */
	having(cond: SqlText): this
	{
		this.statement.having = toText(cond);
		return this;
	}

	private where(mode: WhereMode, cond: string): this
	{
		if (mode === 'AND')
		{
			appendEntry(this.statement.wheres, cond);
		}
		else
		{
			extendLastEntry(this.statement.wheres, ' OR ', cond);
		}
		return this;
	}

	private compare(mode: WhereMode, field: SqlText, op: Comparison, value: SqlText): this
	{
		return this.where(mode, `${toText(field)} ${op} ${toText(value)}`);
	}

	private like(mode: WhereMode, field: SqlText, not: boolean, mask: string): this
	{
		return this.where(mode, `${toText(field)} ${not ? 'NOT LIKE' : 'LIKE'} ${mask}`);
	}

	private inList(mode: WhereMode, field: SqlText, not: boolean, list: string): this
	{
		return this.where(mode, `${toText(field)} ${not ? 'NOT IN' : 'IN'} (${list})`);
	}

	private between(mode: WhereMode, field: SqlText, not: boolean, min: SqlText, max: SqlText): this
	{
		return this.where(mode, `${toText(field)} ${not ? 'NOT BETWEEN' : 'BETWEEN'} ${toText(min)} AND ${toText(max)}`);
	}

	/**
	 * Add an independent WHERE condition; separate conditions are ANDed.
	 */
	andWhere(cond: SqlText): this
	{
		return this.where('AND', toText(cond));
	}

	/**
	 * Add WHERE condition for equal parts.
	 */
	andWhereEq(field: SqlText, value: SqlText): this
	{
		return this.compare('AND', field, '=', value);
	}

	/**
	 * Add WHERE condition for non-equal parts.
	 */
	andWhereNe(field: SqlText, value: SqlText): this
	{
		return this.compare('AND', field, '<>', value);
	}

	/**
	 * Add WHERE condition for field greater than value.
	 */
	andWhereGt(field: SqlText, value: SqlText): this
	{
		return this.compare('AND', field, '>', value);
	}

	/**
	 * Add WHERE condition for field not less than value.
	 */
	andWhereGe(field: SqlText, value: SqlText): this
	{
		return this.compare('AND', field, '>=', value);
	}

	/**
	 * Add WHERE condition for field less than value.
	 */
	andWhereLt(field: SqlText, value: SqlText): this
	{
		return this.compare('AND', field, '<', value);
	}

	/**
	 * Add WHERE condition for field not greater than value.
	 */
	andWhereLe(field: SqlText, value: SqlText): this
	{
		return this.compare('AND', field, '<=', value);
	}

	/**
	 * Add WHERE LIKE condition with the mask used as is.
	 */
	andWhereLike(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, false, likeMask(mask, '', ''));
	}

	/**
	 * Add WHERE LIKE %condition.
	 */
	andWhereLikeRight(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, false, likeMask(mask, '%', ''));
	}

	/**
	 * Add WHERE LIKE condition%.
	 */
	andWhereLikeLeft(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, false, likeMask(mask, '', '%'));
	}

	/**
	 * Add WHERE LIKE %condition%.
	 */
	andWhereLikeAny(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, false, likeMask(mask, '%', '%'));
	}

	/**
	 * Add WHERE NOT LIKE condition.
	 */
	andWhereNotLike(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, true, likeMask(mask, '', ''));
	}

	/**
	 * Add WHERE NOT LIKE %condition.
	 */
	andWhereNotLikeRight(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, true, likeMask(mask, '%', ''));
	}

	/**
	 * Add WHERE NOT LIKE condition%.
	 */
	andWhereNotLikeLeft(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, true, likeMask(mask, '', '%'));
	}

	/**
	 * Add WHERE NOT LIKE %condition%.
	 */
	andWhereNotLikeAny(field: SqlText, mask: SqlText): this
	{
		return this.like('AND', field, true, likeMask(mask, '%', '%'));
	}

	/**
	 * Add WHERE condition for NULL field.
	 */
	andWhereIsNull(field: SqlText): this
	{
		return this.where('AND', `${toText(field)} IS NULL`);
	}

	/**
	 * Add WHERE condition for non-NULL field.
	 */
	andWhereIsNotNull(field: SqlText): this
	{
		return this.where('AND', `${toText(field)} IS NOT NULL`);
	}

	/**
	 * Add WHERE field IN (list); list items are written verbatim.
	 */
	andWhereIn(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('AND', field, false, list.map(toText).join(', '));
	}

	/**
	 * Add WHERE field IN (list) with every item quoted.
	 */
	andWhereInQuoted(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('AND', field, false, quoteList(list.map(toText)).join(', '));
	}

	/**
	 * Add WHERE field IN (query).
	 */
	andWhereInQuery(field: SqlText, query: SqlText): this
	{
		return this.inList('AND', field, false, toText(query));
	}

	/**
	 * Add WHERE field NOT IN (list).
	 */
	andWhereNotIn(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('AND', field, true, list.map(toText).join(', '));
	}

	/**
	 * Add WHERE field NOT IN (list) with every item quoted.
	 */
	andWhereNotInQuoted(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('AND', field, true, quoteList(list.map(toText)).join(', '));
	}

	/**
	 * Add WHERE field NOT IN (query).
	 */
	andWhereNotInQuery(field: SqlText, query: SqlText): this
	{
		return this.inList('AND', field, true, toText(query));
	}

	/**
	 * Add WHERE field BETWEEN min AND max.
	 */
	andWhereBetween(field: SqlText, min: SqlText, max: SqlText): this
	{
		return this.between('AND', field, false, min, max);
	}

	/**
	 * Add WHERE field NOT BETWEEN min AND max.
	 */
	andWhereNotBetween(field: SqlText, min: SqlText, max: SqlText): this
	{
		return this.between('AND', field, true, min, max);
	}

	/**
	 * Extend the last WHERE condition with OR. Starts a new condition when there is none.
	 */
	orWhere(cond: SqlText): this
	{
		return this.where('OR', toText(cond));
	}

	/**
	 * Add OR condition for equal parts.
	 */
	orWhereEq(field: SqlText, value: SqlText): this
	{
		return this.compare('OR', field, '=', value);
	}

	/**
	 * Add OR condition for non-equal parts.
	 */
	orWhereNe(field: SqlText, value: SqlText): this
	{
		return this.compare('OR', field, '<>', value);
	}

	/**
	 * Add OR condition for field greater than value.
	 */
	orWhereGt(field: SqlText, value: SqlText): this
	{
		return this.compare('OR', field, '>', value);
	}

	/**
	 * Add OR condition for field not less than value.
	 */
	orWhereGe(field: SqlText, value: SqlText): this
	{
		return this.compare('OR', field, '>=', value);
	}

	/**
	 * Add OR condition for field less than value.
	 */
	orWhereLt(field: SqlText, value: SqlText): this
	{
		return this.compare('OR', field, '<', value);
	}

	/**
	 * Add OR condition for field not greater than value.
	 */
	orWhereLe(field: SqlText, value: SqlText): this
	{
		return this.compare('OR', field, '<=', value);
	}

	/**
	 * Add OR LIKE condition.
	 */
	orWhereLike(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, false, likeMask(mask, '', ''));
	}

	/**
	 * Add OR LIKE %condition.
	 */
	orWhereLikeRight(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, false, likeMask(mask, '%', ''));
	}

	/**
	 * Add OR LIKE condition%.
	 */
	orWhereLikeLeft(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, false, likeMask(mask, '', '%'));
	}

	/**
	 * Add OR LIKE %condition%.
	 */
	orWhereLikeAny(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, false, likeMask(mask, '%', '%'));
	}

	/**
	 * Add OR NOT LIKE condition.
	 */
	orWhereNotLike(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, true, likeMask(mask, '', ''));
	}

	/**
	 * Add OR NOT LIKE %condition.
	 */
	orWhereNotLikeRight(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, true, likeMask(mask, '%', ''));
	}

	/**
	 * Add OR NOT LIKE condition%.
	 */
	orWhereNotLikeLeft(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, true, likeMask(mask, '', '%'));
	}

	/**
	 * Add OR NOT LIKE %condition%.
	 */
	orWhereNotLikeAny(field: SqlText, mask: SqlText): this
	{
		return this.like('OR', field, true, likeMask(mask, '%', '%'));
	}

	/**
	 * Add OR condition for NULL field.
	 */
	orWhereIsNull(field: SqlText): this
	{
		return this.where('OR', `${toText(field)} IS NULL`);
	}

	/**
	 * Add OR condition for non-NULL field.
	 */
	orWhereIsNotNull(field: SqlText): this
	{
		return this.where('OR', `${toText(field)} IS NOT NULL`);
	}

	/**
	 * Add OR field IN (list).
	 */
	orWhereIn(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('OR', field, false, list.map(toText).join(', '));
	}

	/**
	 * Add OR field IN (list) with every item quoted.
	 */
	orWhereInQuoted(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('OR', field, false, quoteList(list.map(toText)).join(', '));
	}

	/**
	 * Add OR field IN (query).
	 */
	orWhereInQuery(field: SqlText, query: SqlText): this
	{
		return this.inList('OR', field, false, toText(query));
	}

	/**
	 * Add OR field NOT IN (list).
	 */
	orWhereNotIn(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('OR', field, true, list.map(toText).join(', '));
	}

	/**
	 * Add OR field NOT IN (list) with every item quoted.
	 */
	orWhereNotInQuoted(field: SqlText, list: readonly SqlText[]): this
	{
		return this.inList('OR', field, true, quoteList(list.map(toText)).join(', '));
	}

	/**
	 * Add OR field NOT IN (query).
	 */
	orWhereNotInQuery(field: SqlText, query: SqlText): this
	{
		return this.inList('OR', field, true, toText(query));
	}

	/**
	 * Add OR field BETWEEN min AND max.
	 */
	orWhereBetween(field: SqlText, min: SqlText, max: SqlText): this
	{
		return this.between('OR', field, false, min, max);
	}

	/**
	 * Add OR field NOT BETWEEN min AND max.
	 */
	orWhereNotBetween(field: SqlText, min: SqlText, max: SqlText): this
	{
		return this.between('OR', field, true, min, max);
	}

	/**
	 * Append UNION query. ORDER BY belongs on the last query only.
	 */
	union(query: SqlText): this
	{
		this.statement.unions.push(`UNION ${toText(query)}`);
		return this;
	}

	/**
	 * Append UNION ALL query.
	 */
	unionAll(query: SqlText): this
	{
		this.statement.unions.push(`UNION ALL ${toText(query)}`);
		return this;
	}

	/**
	 * Add ORDER BY.
	 * @param desc - Sort descending
	 */
	orderBy(field: SqlText, desc: boolean): this
	{
		this.statement.orderBy.push(desc ? `${toText(field)} DESC` : toText(field));
		return this;
	}

	/**
	 * Add ORDER BY ASC.
	 */
	orderAsc(field: SqlText): this
	{
		return this.orderBy(field, false);
	}

	/**
	 * Add ORDER BY DESC.
	 */
	orderDesc(field: SqlText): this
	{
		return this.orderBy(field, true);
	}

	/**
	 * Set LIMIT. Fractions are truncated; negative or non-finite counts become 0.
	 */
	limit(limit: number): this
	{
		this.statement.limit = rowCount(limit);
		return this;
	}

	/**
	 * Set OFFSET, normalized like `limit()`.
	 */
	offset(offset: number): this
	{
		this.statement.offset = rowCount(offset);
		return this;
	}

	/**
	 * Build complete SQL command terminated with a semicolon.
	 * @throws StatementError on a missing table, INSERT values or UPDATE assignments
	 */
	sql(): string
	{
		return renderSql(this.statement);
	}

	/**
	 * Build query fragment without the trailing semicolon.
	 */
	query(): string
	{
		return renderQuery(this.statement);
	}

	/**
	 * Build parenthesized subquery.
	 */
	subquery(): string
	{
		return renderSubquery(this.statement);
	}

	/**
	 * Build named subquery: "(query) AS name".
	 */
	subqueryAs(name: SqlText): string
	{
		return renderSubqueryAs(this.statement, toText(name));
	}

	/**
	 * Build "SELECT values" without a FROM part.
	 */
	queryValues(): string
	{
		return renderQueryValues(this.statement);
	}

	/**
	 * Execute the statement without reading rows.
	 */
	async exec(executor: StatementExecutor): Promise<void>
	{
		await executor.exec(this.sql());
	}

	/**
	 * Execute the query and return all rows.
	 */
	async get(executor: StatementExecutor): Promise<JsonValue[][]>
	{
		return executor.all(this.sql());
	}

	/**
	 * Execute the query and return the first row, or an empty row when there is none.
	 */
	async getRow(executor: StatementExecutor): Promise<JsonValue[]>
	{
		return (await executor.first(this.sql())) ?? [];
	}

	/**
	 * Execute the query and return the first column of the first row.
	 * @throws ExecutionError with code NO_VALUE when the query returns nothing
	 */
	async getValue(executor: StatementExecutor): Promise<JsonValue>
	{
		const row = await executor.first(this.sql());
		if (row === undefined || row.length === 0)
		{
			throw new ExecutionError('NO_VALUE', 'Query returned no value');
		}
		return row[0];
	}

	/**
	 * Execute the query and return the first value as an integer.
	 */
	async getInt(executor: StatementExecutor): Promise<number>
	{
		const value = await this.getValue(executor);
		if (typeof value !== 'number')
		{
			throw new ExecutionError('TYPE_MISMATCH', `Expected integer value, got ${value === null ? 'null' : typeof value}`);
		}
		return value;
	}

	/**
	 * Execute the query and return the first value as a string.
	 */
	async getStr(executor: StatementExecutor): Promise<string>
	{
		const value = await this.getValue(executor);
		if (typeof value !== 'string')
		{
			throw new ExecutionError('TYPE_MISMATCH', `Expected string value, got ${value === null ? 'null' : typeof value}`);
		}
		return value;
	}

	/**
	 * Execute the query and iterate its rows one at a time.
	 */
	getCursor(executor: StatementExecutor): AsyncIterableIterator<JsonValue[]>
	{
		return executor.cursor(this.sql());
	}
}
