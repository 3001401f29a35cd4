import { RequestComposer, RequestValidationError } from '@cookbook/shared';
import { DistanceMetric } from './config';

export interface SearchInput {
    vector: ReadonlyArray<number>;
    k: number;
    /** Scalar predicate for a hybrid query, e.g. from textFilter or tagFilter */
    filter?: string;
    returnFields: string[];
}

export interface VectorQuery {
    index: string;
    query: string;
    params: { vector: Buffer };
    returnFields: string[];
    k: number;
    metric: DistanceMetric;
    filter?: string;
}

export interface SearchQueryComposerOptions {
    index: string;
    vectorField: string;
    dimension: number;
    metric: DistanceMetric;
}

/** Alias the KNN clause gives the distance of each hit */
export const SCORE_FIELD = 'vector_score';

export function toFloat32Buffer(vector: ReadonlyArray<number>): Buffer {
    return Buffer.from(new Float32Array(vector).buffer);
}

export class SearchQueryComposer implements RequestComposer<SearchInput, VectorQuery> {
    constructor(private readonly options: SearchQueryComposerOptions) {}

    compose(input: SearchInput): VectorQuery {
        const { vector, k, filter, returnFields } = input;
        const { dimension, vectorField } = this.options;

        if (vector.length !== dimension) {
            throw new RequestValidationError(`vector must have ${dimension} dimensions, got ${vector.length}`, 'vector');
        }
        if (!vector.every(value => Number.isFinite(value))) {
            throw new RequestValidationError('vector must contain only finite numbers', 'vector');
        }
        if (!Number.isInteger(k) || k <= 0) {
            throw new RequestValidationError(`k must be a positive integer, got ${k}`, 'k');
        }
        if (returnFields.length === 0) {
            throw new RequestValidationError('At least one return field is required', 'returnFields');
        }

        const trimmedFilter = filter?.trim();
        const base = trimmedFilter ? `(${trimmedFilter})` : '*';
        const query: VectorQuery = {
            index: this.options.index,
            query: `${base}=>[KNN ${k} @${vectorField} $vector AS ${SCORE_FIELD}]`,
            params: { vector: toFloat32Buffer(vector) },
            returnFields: [...returnFields],
            k,
            metric: this.options.metric,
        };
        if (trimmedFilter) {
            query.filter = trimmedFilter;
        }
        return query;
    }
}
