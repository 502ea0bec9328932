import { AnalysisResult, ComplexityResult, DeclarationRecord, TokenSpan } from './types';
import { getDialect } from './dialects';
import { lex } from './lexer/lexer';
import { scan } from './scanner/scanner';
import { evaluateComplexity } from './calculators/cyclomatic';
import { buildFileReport } from './aggregator';
import { countLines, countTodos } from './line-counter';

export interface AnalyzeOptions {
    file?: string;
}

function isCallable(record: DeclarationRecord): boolean {
    return record.kind === 'Function' || record.kind === 'Method';
}

// Spans of callables declared inside `record`'s body.
function nestedSpans(record: DeclarationRecord, all: readonly DeclarationRecord[]): TokenSpan[] {
    return all
        .filter(other => other !== record && isCallable(other)
            && other.span.start > record.body.start && other.span.end <= record.body.end)
        .map(other => other.span);
}

/**
 * Runs the whole pipeline over one source text:
 *
 *   lex → scan → evaluate complexity → aggregate
 *
 * Never throws on malformed input. An unknown language yields an empty
 * report and a single error diagnostic.
 */
export function analyzeSource(text: string, language: string, options: AnalyzeOptions = {}): AnalysisResult {
    const dialect = getDialect(language);
    if (!dialect) {
        return {
            report: buildFileReport({
                file: options.file,
                language,
                declarations: [],
                includes: [],
                complexities: [],
                lines: countLines(text, []),
                todoCount: 0
            }),
            diagnostics: [{ severity: 'error', category: 'input', message: `Unsupported language '${language}'`, line: 1 }]
        };
    }

    const lexed = lex(text, dialect);
    const scanned = scan(text, lexed.tokens, dialect);

    const complexities: (ComplexityResult | undefined)[] = scanned.declarations.map(record =>
        isCallable(record)
            ? evaluateComplexity(lexed.tokens, record, dialect, nestedSpans(record, scanned.declarations))
            : undefined
    );

    return {
        report: buildFileReport({
            file: options.file,
            language: dialect.id,
            declarations: scanned.declarations,
            includes: scanned.includes,
            complexities,
            lines: countLines(text, lexed.tokens),
            todoCount: countTodos(lexed.tokens)
        }),
        diagnostics: [...lexed.diagnostics, ...scanned.diagnostics]
    };
}
