import { parseCsv } from '@cookbook/shared';
import { VectorDocument } from './RedisVectorStore';

export interface LoadArticlesOptions {
    idColumn?: string;
    /** Column holding the embedding as a JSON array, e.g. `[0.12, -0.4, ...]` */
    vectorColumn?: string;
    /** Columns left out of the stored fields, besides the id and vector columns */
    ignoreColumns?: string[];
    /** When set, every vector must have exactly this many dimensions */
    dimension?: number;
}

function parseVector(text: string): number[] | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return null;
    }
    if (!Array.isArray(parsed) || parsed.length === 0) {
        return null;
    }
    const vector: number[] = [];
    for (const value of parsed) {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            return null;
        }
        vector.push(value);
    }
    return vector;
}

/**
 * Reads pre-embedded articles from CSV into documents ready for indexing.
 * Throws on the first row whose id is empty or whose vector is not a JSON array of numbers.
 */
export function loadArticles(csvText: string, options: LoadArticlesOptions = {}): VectorDocument[] {
    const idColumn = options.idColumn || 'id';
    const vectorColumn = options.vectorColumn || 'content_vector';
    const skipped = new Set([idColumn, vectorColumn, ...(options.ignoreColumns || [])]);

    return parseCsv(csvText).map((record, index) => {
        const row = index + 2; // the header is line 1
        const id = record[idColumn];
        if (!id) {
            throw new Error(`Row ${row}: ${idColumn} is empty`);
        }
        const vector = parseVector(record[vectorColumn] ?? '');
        if (!vector) {
            throw new Error(`Row ${row}: ${vectorColumn} is not a JSON array of numbers`);
        }
        if (options.dimension !== undefined && vector.length !== options.dimension) {
            throw new Error(`Row ${row}: ${vectorColumn} has ${vector.length} dimensions, expected ${options.dimension}`);
        }

        const fields: Record<string, string> = {};
        for (const [column, value] of Object.entries(record)) {
            if (!skipped.has(column)) {
                fields[column] = value;
            }
        }
        return { id, vector, fields };
    });
}
