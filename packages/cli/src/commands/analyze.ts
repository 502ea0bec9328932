import chalk from 'chalk';
import { Diagnostic, FileReport } from '@codeshape/core';
import { loadSettings } from '../config';
import { analyzeFiles, collectFiles } from '../workspace';

export interface AnalyzeOptions {
    json?: boolean;
    config?: string;
}

export function formatCounts(report: FileReport): string {
    return [
        `classes ${report.classCount}`,
        `structs ${report.structCount}`,
        `methods ${report.methodCount}`,
        `functions ${report.functionCount}`,
        `includes ${report.includes.length}`
    ].join('  ');
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
    const color = diagnostic.severity === 'error' ? chalk.red : chalk.yellow;
    return `  ${color(diagnostic.severity)} line ${diagnostic.line}: ${diagnostic.message} (${diagnostic.category})`;
}

export async function analyze(pattern: string, options: AnalyzeOptions) {
    const settings = await loadSettings(options.config);
    const files = await collectFiles(pattern, settings);
    const { analyses, failures } = await analyzeFiles(files);

    for (const failure of failures) {
        console.error(`Error processing ${failure.file}:`, failure.error);
    }

    if (options.json) {
        console.log(JSON.stringify(analyses, null, 2));
    } else {
        console.log(chalk.blue(`Analyzing ${files.length} files...`));
        for (const { file, report, diagnostics } of analyses) {
            console.log(chalk.bold(file));
            console.log(`  ${formatCounts(report)}`);
            for (const diagnostic of diagnostics) {
                console.log(formatDiagnostic(diagnostic));
            }
        }
    }

    const hasDiagnostics = analyses.some(a => a.diagnostics.length > 0);
    if (failures.length > 0 || (settings.failOnDiagnostics && hasDiagnostics)) {
        process.exitCode = 1;
    }
}
