export interface SqlResult {
    /** Column names in the order the database reported them */
    columns: string[];
    rows: Record<string, unknown>[];
}

export interface ExecuteOptions {
    /** Run inside a READ ONLY transaction, so the database itself refuses any write (SQLSTATE 25006) */
    readOnly?: boolean;
}

export interface SqlExecutor {
    execute(sql: string, options?: ExecuteOptions): Promise<SqlResult>;
    close(): Promise<void>;
}

/**
 * An error raised by the database itself for the statement, identified by its five character SQLSTATE code.
 * Socket errors such as EPIPE also carry five letter codes; SQLSTATE classes never start with E.
 */
export interface SqlStateError extends Error {
    code: string;
}

export function isSqlStateError(error: unknown): error is SqlStateError {
    return error instanceof Error
        && 'code' in error
        && typeof error.code === 'string'
        && /^(?:[0-9][0-9A-Z]|F0|HV|P0|XX)[0-9A-Z]{3}$/.test(error.code);
}
