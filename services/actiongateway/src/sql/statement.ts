const READ_ONLY_KEYWORDS = new Set(['SELECT', 'WITH', 'SHOW', 'EXPLAIN', 'VALUES']);

// Words that make an otherwise read-only statement write: EXPLAIN ANALYZE DELETE, data-modifying CTEs, SELECT INTO
const WRITE_KEYWORDS = new Set([
    'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'DROP', 'ALTER', 'CREATE', 'TRUNCATE',
    'GRANT', 'REVOKE', 'COPY', 'CALL', 'INTO',
]);

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;
const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

function isIdentifierChar(char: string | undefined): boolean {
    return char !== undefined && IDENTIFIER_CHAR.test(char);
}

/**
 * The statement with comments, string literals, quoted identifiers and dollar-quoted bodies each
 * replaced by a single space, so only SQL keywords, names and punctuation remain.
 * An unterminated span runs to the end of the text.
 */
export function stripLiterals(sql: string): string {
    let code = '';
    let i = 0;

    while (i < sql.length) {
        const char = sql[i];
        const next = sql[i + 1];

        if (char === '-' && next === '-') {
            const newline = sql.indexOf('\n', i + 2);
            i = newline === -1 ? sql.length : newline + 1;
            code += ' ';
        } else if (char === '/' && next === '*') {
            // block comments nest
            let depth = 1;
            i += 2;
            while (i < sql.length && depth > 0) {
                if (sql[i] === '/' && sql[i + 1] === '*') {
                    depth++;
                    i += 2;
                } else if (sql[i] === '*' && sql[i + 1] === '/') {
                    depth--;
                    i += 2;
                } else {
                    i++;
                }
            }
            code += ' ';
        } else if (char === "'" || char === '"') {
            // E'...' strings take backslash escapes
            const backslashEscapes = char === "'" && /[Ee]/.test(sql[i - 1] ?? '') && !isIdentifierChar(sql[i - 2]);
            i++;
            while (i < sql.length) {
                if (backslashEscapes && sql[i] === '\\') {
                    i += 2;
                } else if (sql[i] === char && sql[i + 1] === char) {
                    i += 2;
                } else if (sql[i] === char) {
                    i++;
                    break;
                } else {
                    i++;
                }
            }
            code += ' ';
        } else if (char === '$' && !isIdentifierChar(sql[i - 1]) && DOLLAR_TAG.test(sql.slice(i))) {
            const tag = sql.slice(i, sql.indexOf('$', i + 1) + 1);
            const end = sql.indexOf(tag, i + tag.length);
            i = end === -1 ? sql.length : end + tag.length;
            code += ' ';
        } else {
            code += char;
            i++;
        }
    }
    return code;
}

/**
 * First keyword of a statement, upper-cased, after leading whitespace, comments and parentheses.
 * Returns an empty string when there is none.
 */
export function firstKeyword(sql: string): string {
    const match = /^[\s(]*([A-Za-z]+)/.exec(stripLiterals(sql));
    return match ? match[1].toUpperCase() : '';
}

/**
 * First keyword anywhere in the statement that writes or defines data, if any.
 */
export function findWriteKeyword(sql: string): string | undefined {
    const words = stripLiterals(sql).match(/[A-Za-z_][A-Za-z0-9_$]*/g) || [];
    return words.map(word => word.toUpperCase()).find(word => WRITE_KEYWORDS.has(word));
}

/**
 * True when a `;` outside comments and quoted text is followed by more code.
 */
export function hasMultipleStatements(sql: string): boolean {
    const code = stripLiterals(sql);
    const separator = code.indexOf(';');
    return separator !== -1 && code.slice(separator + 1).replace(/;/g, '').trim() !== '';
}

/**
 * Lexical check only; PgSqlExecutor also runs such statements in a READ ONLY transaction.
 */
export function isReadOnlyStatement(sql: string): boolean {
    return READ_ONLY_KEYWORDS.has(firstKeyword(sql))
        && !hasMultipleStatements(sql)
        && findWriteKeyword(sql) === undefined;
}
