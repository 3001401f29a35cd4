import { ResponsePresenter, TabularRecord, toCsv } from '@cookbook/shared';
import { DistanceMetric } from './config';
import { SearchHit } from './RedisVectorStore';

export interface SearchArtifact {
    /** `{ rank, id, similarity | distance, ...fields }` in the order the store ranked them; fields sharing a computed column's name are dropped */
    rows: TabularRecord[];
    lines: string[];
    text: string;
    csv: string;
}

export interface SearchResultPresenterOptions {
    metric: DistanceMetric;
    /** Field printed on each console line; the id is used when a hit lacks it */
    titleField?: string;
}

function round3(value: number): number {
    return Math.round(value * 1000) / 1000;
}

/**
 * COSINE and IP scores come back as distances (1 - similarity) and are shown as similarities;
 * L2 distances are shown as they are.
 */
export class SearchResultPresenter implements ResponsePresenter<SearchHit[], SearchArtifact> {
    private readonly titleField: string;

    constructor(private readonly options: SearchResultPresenterOptions) {
        this.titleField = options.titleField || 'title';
    }

    present(hits: ReadonlyArray<SearchHit>): SearchArtifact {
        const scoreName = this.options.metric === 'L2' ? 'distance' : 'similarity';
        const rows: TabularRecord[] = [];
        const lines: string[] = [];

        hits.forEach((hit, index) => {
            const rank = index + 1;
            const score = round3(scoreName === 'distance' ? hit.score : 1 - hit.score);
            const row: TabularRecord = { rank, id: hit.id, [scoreName]: score };
            // stored fields never replace the computed columns
            for (const [name, value] of Object.entries(hit.fields)) {
                if (!Object.prototype.hasOwnProperty.call(row, name)) {
                    row[name] = value;
                }
            }
            rows.push(row);
            lines.push(`${rank}. ${hit.fields[this.titleField] ?? hit.id} (Score: ${score})`);
        });

        return { rows, lines, text: lines.join('\n'), csv: toCsv(rows) };
    }
}
