import * as fs from 'fs';
import { generateHtmlReport, summarizeReports } from '@codeshape/core';
import { loadSettings } from '../config';
import { analyzeFiles, collectFiles } from '../workspace';

export interface ReportOptions {
    output: string;
    format: string;
    config?: string;
}

export async function report(pattern: string, options: ReportOptions) {
    if (options.format !== 'html' && options.format !== 'json') {
        throw new Error(`Unknown format '${options.format}' (expected html or json)`);
    }

    const settings = await loadSettings(options.config);
    const files = await collectFiles(pattern, settings);
    const { analyses, failures } = await analyzeFiles(files);
    for (const failure of failures) {
        console.error(`Error processing ${failure.file}:`, failure.error);
    }

    const reports = analyses.map(a => a.report);
    if (options.format === 'json') {
        const body = { summary: summarizeReports(reports), files: analyses };
        await fs.promises.writeFile(options.output, JSON.stringify(body, null, 2));
    } else {
        await fs.promises.writeFile(options.output, generateHtmlReport(reports, settings.threshold));
    }
    console.log(`Report written to ${options.output}`);

    if (failures.length > 0) process.exitCode = 1;
}
