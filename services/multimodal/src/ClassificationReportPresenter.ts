import { ResponsePresenter, renderBarChart, toCsv } from '@cookbook/shared';
import { ClassificationResult } from './ImageClassifier';

export interface ClassificationReport {
    csv: string;
    /** Images per label, in label order, zero counts included */
    counts: Record<string, number>;
    chart: string;
    totalTokens: number;
}

export class ClassificationReportPresenter implements ResponsePresenter<ClassificationResult[], ClassificationReport> {
    constructor(private readonly labels: string[], private readonly chartWidth = 40) {}

    present(results: ReadonlyArray<ClassificationResult>): ClassificationReport {
        const counts: Record<string, number> = {};
        for (const label of this.labels) {
            counts[label] = 0;
        }
        for (const result of results) {
            counts[result.label] = (counts[result.label] ?? 0) + 1;
        }

        const csv = toCsv(results.map(result => ({
            image: result.image,
            label: result.label,
            prompt_tokens: result.usage.promptTokens,
            completion_tokens: result.usage.completionTokens,
        })));

        return {
            csv,
            counts,
            chart: renderBarChart(counts, { width: this.chartWidth, title: 'Images per label' }),
            totalTokens: results.reduce((sum, result) => sum + result.usage.totalTokens, 0),
        };
    }
}
