export enum TokenKind {
    Identifier = 'identifier',
    Keyword = 'keyword',
    Punctuation = 'punctuation',
    String = 'string',
    Comment = 'comment',
    Number = 'number',
    Directive = 'directive',
    // synthetic, zero-width: statement ends and indentation blocks
    Newline = 'newline',
    Indent = 'indent',
    Dedent = 'dedent',
    EOF = 'eof'
}

export interface Token {
    readonly kind: TokenKind;
    readonly value: string;
    readonly start: number;
    readonly end: number;
    readonly line: number;
}

/** Half-open range of token indices: `start` is inclusive, `end` exclusive. */
export interface TokenSpan {
    start: number;
    end: number;
}

export type DeclarationKind = 'Class' | 'Struct' | 'Function' | 'Method';

export interface ParameterRecord {
    type: string;
    name: string;
    hasDefault: boolean;
}

export interface DeclarationRecord {
    kind: DeclarationKind;
    name: string;
    owner?: string;
    parameters: ParameterRecord[];
    // Whole declaration, from its first significant token to the closing brace.
    span: TokenSpan;
    // Body block: `start` is the `{` (or indent, or `=>`/`:` of a one-line body), `end - 1` its closer.
    body: TokenSpan;
    startLine: number;
    endLine: number;
    isConstructor: boolean;
}

export interface IncludeRecord {
    path: string;
    line: number;
}

export interface ComplexityResult {
    decisionPoints: number;
    cyclomatic: number;
    /** Structural increments weighted by nesting, plus one per boolean operator sequence. */
    cognitive: number;
    /** Deepest stack of control-flow blocks open at once inside the body. */
    nestingDepth: number;
}

export type DiagnosticSeverity = 'warning' | 'error';
export type DiagnosticCategory = 'lexical' | 'structural' | 'input';

export interface Diagnostic {
    severity: DiagnosticSeverity;
    category: DiagnosticCategory;
    message: string;
    line: number;
}

export interface LineCounts {
    total: number;
    code: number;
    comment: number;
    blank: number;
}

export interface DeclarationSummary {
    key: string;
    kind: DeclarationKind;
    name: string;
    owner?: string;
    parameters: readonly ParameterRecord[];
    startLine: number;
    endLine: number;
    isConstructor: boolean;
}

export interface FileReport {
    readonly file?: string;
    readonly language: string;
    readonly classCount: number;
    readonly structCount: number;
    readonly methodCount: number;
    readonly functionCount: number;
    readonly includes: readonly IncludeRecord[];
    readonly declarations: readonly DeclarationSummary[];
    readonly complexity: Readonly<Record<string, ComplexityResult>>;
    readonly lines: LineCounts;
    readonly todoCount: number;
}

export interface AnalysisResult {
    report: FileReport;
    diagnostics: Diagnostic[];
}

export interface LanguageSummary {
    language: string;
    fileCount: number;
    classCount: number;
    structCount: number;
    methodCount: number;
    functionCount: number;
    lines: LineCounts;
}

export interface ProjectSummary {
    fileCount: number;
    classCount: number;
    structCount: number;
    methodCount: number;
    functionCount: number;
    includeCount: number;
    lines: LineCounts;
    languages: LanguageSummary[];
}
