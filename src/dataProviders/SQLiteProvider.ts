import { StatementExecutor } from '../dataProvider';
import { JsonValue, toJsonRow } from '../valueConverter';
import { ExecutionError } from '../errors';
import { getLogger } from '../logger';
import initSqlJs, { Database, SqlJsStatic, Statement } from 'sql.js';
import { readFile, writeFile } from 'fs/promises';

/**
 * Options for connecting to a SQLite database.
 */
export interface SQLiteProviderOptions
{
	/** The file path to the SQLite database, or ":memory:" for a database that is never written to disk. */
	filename: string;
}

const MEMORY_FILENAME = ':memory:';

let sqlJs: Promise<SqlJsStatic> | undefined;

/**
 * Loads the sql.js WebAssembly module once per process.
 */
function loadSqlJs(): Promise<SqlJsStatic>
{
	sqlJs ??= initSqlJs();
	return sqlJs;
}

function isMissingFile(err: unknown): boolean
{
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Executes rendered SQL against SQLite (sql.js) and converts result cells to `JsonValue`.
 * The database lives in memory: it is loaded from `filename` on connect and
 * written back by `save()` and `disconnect()`.
 */
export class SQLiteProvider implements StatementExecutor
{
	private db?: Database;
	private readonly options: SQLiteProviderOptions;
	private readonly logger = getLogger('SQLiteProvider');

	/**
	 * Creates an instance of SQLiteProvider.
	 * @param options The SQLite database configuration.
	 */
	constructor(options: SQLiteProviderOptions)
	{
		this.options = options;
		this.logger.debug('SQLiteProvider initialized', { filename: options.filename });
	}

	private get inMemory(): boolean
	{
		return this.options.filename === MEMORY_FILENAME;
	}

	/**
	 * Opens the database, reading the file when it exists.
	 */
	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to SQLite database', { filename: this.options.filename });

		const SQL = await loadSqlJs();
		const data = await this.load();
		this.db = new SQL.Database(data);

		this.logger.info('SQLite database connected successfully', {
			filename: this.options.filename,
			loaded: data !== undefined
		});
	}

	private async load(): Promise<Uint8Array | undefined>
	{
		if (this.inMemory) return undefined;

		try
		{
			return await readFile(this.options.filename);
		}
		catch (err)
		{
			if (isMissingFile(err)) return undefined;
			throw err;
		}
	}

	/**
	 * Writes the database to its file. Statements still open on this
	 * connection (an unfinished cursor) are freed by the export.
	 */
	async save(): Promise<void>
	{
		const db = this.getConnection();
		if (this.inMemory) return;

		await writeFile(this.options.filename, db.export());
		this.logger.debug('SQLite database saved', { filename: this.options.filename });
	}

	/**
	 * Saves and closes the database.
	 */
	async disconnect(): Promise<void>
	{
		if (this.db)
		{
			await this.save();
			this.db.close();
			this.db = undefined;
		}

		this.logger.info('SQLite database disconnected successfully');
	}

	private getConnection(): Database
	{
		if (!this.db) throw new ExecutionError('NOT_CONNECTED', 'Not connected');
		return this.db;
	}

	/**
	 * Logs a failed statement and rethrows the error.
	 */
	private fail(operation: string, sql: string, err: unknown): never
	{
		const message = err instanceof Error ? err.message : String(err);
		this.logger.error(`[SQLiteProvider.${operation}] ${message}`, { sql });
		throw err;
	}

	/**
	 * Steps a prepared statement for at most `maxRows` rows; cells are read by
	 * position, so duplicate or numeric column names keep their place.
	 */
	private query(sql: string, maxRows: number): JsonValue[][]
	{
		const statement = this.getConnection().prepare(sql);
		try
		{
			const rows: JsonValue[][] = [];
			while (rows.length < maxRows && statement.step())
			{
				rows.push(toJsonRow(statement.get()));
			}
			return rows;
		}
		finally
		{
			statement.free();
		}
	}

	async exec(sql: string): Promise<void>
	{
		this.logger.debug('Exec sql', { sql });
		try
		{
			this.getConnection().run(sql);
		}
		catch (err)
		{
			this.fail('exec', sql, err);
		}
	}

	async all(sql: string): Promise<JsonValue[][]>
	{
		this.logger.debug('Get rows sql', { sql });
		try
		{
			const rows = this.query(sql, Infinity);
			this.logger.debug('Query completed', { rowCount: rows.length });
			return rows;
		}
		catch (err)
		{
			this.fail('all', sql, err);
		}
	}

	async first(sql: string): Promise<JsonValue[] | undefined>
	{
		this.logger.debug('Get row sql', { sql });
		try
		{
			const [row] = this.query(sql, 1);
			return row;
		}
		catch (err)
		{
			this.fail('first', sql, err);
		}
	}

	/**
	 * Steps through the rows of a prepared statement; the statement is
	 * freed when iteration finishes or is abandoned.
	 */
	async *cursor(sql: string): AsyncIterableIterator<JsonValue[]>
	{
		this.logger.debug('Get cursor sql', { sql });
		let statement: Statement | undefined;
		try
		{
			statement = this.getConnection().prepare(sql);
			while (statement.step())
			{
				yield toJsonRow(statement.get());
			}
		}
		catch (err)
		{
			this.fail('cursor', sql, err);
		}
		finally
		{
			statement?.free();
		}
	}
}
