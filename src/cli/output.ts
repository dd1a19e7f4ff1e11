import fs from "node:fs";
import path from "node:path";
import type { AnalysisReport, LoadReport } from '../types';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

export const DEFAULT_REPORT_NAME = 'support_insights.json';

/**
 * Default report path: inside the data directory
 */
export function getDefaultOutputPath(dataDir: string): string {
    return path.join(path.resolve(dataDir), DEFAULT_REPORT_NAME);
}

export type ReportDocument = AnalysisReport & {
    generatedAt: string;
    timeZone: string;
    load: LoadReport;
};

/**
 * The JSON document written by the CLI: the load report plus the analysis
 */
export function buildReportDocument(load: LoadReport, analysis: AnalysisReport, timeZone: string): ReportDocument {
    return {
        generatedAt: new Date().toISOString(),
        timeZone,
        load,
        ...analysis
    };
}

export function writeReport(outputPath: string, document: ReportDocument): number {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(document, null, 2), "utf8");
    return fs.statSync(outputPath).size;
}
