import chalk from 'chalk';
import { loadSettings } from '../config';
import { FileAnalysis, analyzeFiles, collectFiles } from '../workspace';

export interface CheckOptions {
    threshold?: string;
    failOnError?: boolean;
    config?: string;
}

export interface Violation {
    file: string;
    key: string;
    line: number;
    cyclomatic: number;
}

/** Functions and methods whose cyclomatic complexity exceeds `threshold`, per file in input order. */
export function findViolations(analyses: readonly FileAnalysis[], threshold: number): Violation[] {
    const violations: Violation[] = [];
    for (const { file, report } of analyses) {
        for (const declaration of report.declarations) {
            const result = report.complexity[declaration.key];
            if (result !== undefined && result.cyclomatic > threshold) {
                violations.push({ file, key: declaration.key, line: declaration.startLine, cyclomatic: result.cyclomatic });
            }
        }
    }
    return violations;
}

export async function check(pattern: string, options: CheckOptions) {
    const settings = await loadSettings(options.config);
    const threshold = options.threshold !== undefined ? parseInt(options.threshold, 10) : settings.threshold.warning;
    if (Number.isNaN(threshold)) {
        throw new Error(`Invalid threshold: ${options.threshold}`);
    }

    const files = await collectFiles(pattern, settings);
    console.log(chalk.blue(`Checking complexity for ${files.length} files...`));

    const { analyses, failures } = await analyzeFiles(files);
    for (const failure of failures) {
        console.error(`Error processing ${failure.file}:`, failure.error);
    }

    const violations = findViolations(analyses, threshold);
    let current = '';
    for (const violation of violations) {
        if (violation.file !== current) {
            current = violation.file;
            console.log(chalk.bold(current));
        }
        const color = violation.cyclomatic > settings.threshold.error ? chalk.red : chalk.yellow;
        console.log(`  ${color(violation.cyclomatic)} - ${violation.key} (line ${violation.line})`);
    }

    const hasDiagnostics = analyses.some(a => a.diagnostics.length > 0);
    if (violations.length > 0 && options.failOnError) {
        console.error(chalk.red('\nComplexity check failed.'));
        process.exitCode = 1;
    } else if (violations.length > 0) {
        console.log(chalk.yellow('\nComplexity warnings found.'));
    } else {
        console.log(chalk.green('\nNo complexity issues found.'));
    }
    if (failures.length > 0 || (settings.failOnDiagnostics && hasDiagnostics)) {
        process.exitCode = 1;
    }
}
