import {
    ComplexityResult,
    DeclarationRecord,
    DeclarationSummary,
    FileReport,
    IncludeRecord,
    LanguageSummary,
    LineCounts,
    ProjectSummary
} from './types';

export interface FileReportInput {
    file?: string;
    language: string;
    declarations: readonly DeclarationRecord[];
    includes: readonly IncludeRecord[];
    /** Aligned with `declarations`; undefined for types. */
    complexities: readonly (ComplexityResult | undefined)[];
    lines: LineCounts;
    todoCount: number;
}

/**
 * `Owner::name/arity` for members, `name/arity` for free functions and the
 * bare name for types. Repeats get `#2`, `#3`, ... in source order.
 */
export function declarationKey(record: DeclarationRecord): string {
    if (record.kind === 'Class' || record.kind === 'Struct') return record.name;
    const owner = record.owner !== undefined ? `${record.owner}::` : '';
    return `${owner}${record.name}/${record.parameters.length}`;
}

function emptyLines(): LineCounts {
    return { total: 0, code: 0, comment: 0, blank: 0 };
}

function addLines(into: LineCounts, from: LineCounts) {
    into.total += from.total;
    into.code += from.code;
    into.comment += from.comment;
    into.blank += from.blank;
}

export function buildFileReport(input: FileReportInput): FileReport {
    const seen = new Map<string, number>();
    const declarations: DeclarationSummary[] = [];
    const complexity: Record<string, ComplexityResult> = {};

    input.declarations.forEach((record, index) => {
        const base = declarationKey(record);
        const count = (seen.get(base) ?? 0) + 1;
        seen.set(base, count);
        const key = count === 1 ? base : `${base}#${count}`;

        const summary: DeclarationSummary = {
            key,
            kind: record.kind,
            name: record.name,
            parameters: Object.freeze(record.parameters.map(p => Object.freeze({ ...p }))),
            startLine: record.startLine,
            endLine: record.endLine,
            isConstructor: record.isConstructor
        };
        if (record.owner !== undefined) summary.owner = record.owner;
        declarations.push(Object.freeze(summary));

        const result = input.complexities[index];
        if (result && (record.kind === 'Function' || record.kind === 'Method')) {
            complexity[key] = Object.freeze({ ...result });
        }
    });

    const count = (kind: DeclarationRecord['kind']) => input.declarations.filter(d => d.kind === kind).length;

    const report: FileReport = {
        language: input.language,
        classCount: count('Class'),
        structCount: count('Struct'),
        methodCount: count('Method'),
        functionCount: count('Function'),
        includes: Object.freeze(input.includes.map(i => Object.freeze({ ...i }))),
        declarations: Object.freeze(declarations),
        complexity: Object.freeze(complexity),
        lines: Object.freeze({ ...input.lines }),
        todoCount: input.todoCount,
        ...(input.file !== undefined ? { file: input.file } : {})
    };
    return Object.freeze(report);
}

/** Totals across files, with a per-language breakdown (most files first). */
export function summarizeReports(reports: readonly FileReport[]): ProjectSummary {
    const summary: ProjectSummary = {
        fileCount: reports.length,
        classCount: 0,
        structCount: 0,
        methodCount: 0,
        functionCount: 0,
        includeCount: 0,
        lines: emptyLines(),
        languages: []
    };
    const languages = new Map<string, LanguageSummary>();

    for (const report of reports) {
        summary.classCount += report.classCount;
        summary.structCount += report.structCount;
        summary.methodCount += report.methodCount;
        summary.functionCount += report.functionCount;
        summary.includeCount += report.includes.length;
        addLines(summary.lines, report.lines);

        let language = languages.get(report.language);
        if (!language) {
            language = {
                language: report.language,
                fileCount: 0,
                classCount: 0,
                structCount: 0,
                methodCount: 0,
                functionCount: 0,
                lines: emptyLines()
            };
            languages.set(report.language, language);
        }
        language.fileCount++;
        language.classCount += report.classCount;
        language.structCount += report.structCount;
        language.methodCount += report.methodCount;
        language.functionCount += report.functionCount;
        addLines(language.lines, report.lines);
    }

    summary.languages = [...languages.values()]
        .sort((a, b) => b.fileCount - a.fileCount || a.language.localeCompare(b.language));
    return summary;
}
