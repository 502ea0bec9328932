import { glob } from 'glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { AnalysisResult, AnalyzerSettings, analyzeSource, dialectForFile } from '@codeshape/core';

export interface FileAnalysis extends AnalysisResult {
    file: string;
}

export interface WorkspaceAnalysis {
    analyses: FileAnalysis[];
    failures: { file: string; error: unknown }[];
}

// `node_modules` excludes the directory anywhere in the tree; anything with a
// slash or a wildcard is taken as a glob as written.
export function excludePatterns(exclude: readonly string[]): string[] {
    return exclude.map(entry => /[/*?[{]/.test(entry) ? entry : `**/${entry}/**`);
}

/** Files matching `pattern` that some dialect understands, sorted. */
export async function collectFiles(pattern: string, settings: AnalyzerSettings, cwd = process.cwd()): Promise<string[]> {
    const files = await glob(pattern, {
        cwd,
        nodir: true,
        ignore: excludePatterns(settings.exclude)
    });
    return files
        .filter(file => dialectForFile(file) !== undefined)
        .map(file => file.split(path.sep).join('/'))
        .sort();
}

async function analyzeFile(file: string, cwd: string): Promise<FileAnalysis> {
    const dialect = dialectForFile(file);
    if (!dialect) throw new Error(`No dialect for ${file}`);
    const content = await fs.readFile(path.resolve(cwd, file), 'utf-8');
    return { file, ...analyzeSource(content, dialect.id, { file }) };
}

/** Reads every file concurrently; one unreadable file does not stop the others. */
export async function analyzeFiles(files: readonly string[], cwd = process.cwd()): Promise<WorkspaceAnalysis> {
    const settled = await Promise.allSettled(files.map(file => analyzeFile(file, cwd)));

    const result: WorkspaceAnalysis = { analyses: [], failures: [] };
    settled.forEach((outcome, index) => {
        if (outcome.status === 'fulfilled') result.analyses.push(outcome.value);
        else result.failures.push({ file: files[index], error: outcome.reason });
    });
    return result;
}
