/**
 * Dialect descriptors
 * ===================
 *
 * Everything the lexer and the structural scanner need to know about one
 * language lives in a plain descriptor object. Adding a language means adding
 * a table, not a branch in the pipeline.
 */

export type ComplexityNodeType =
    | 'IF'
    | 'LOOP'
    | 'CASE'
    | 'CATCH'
    | 'TERNARY'
    | 'BINARY';

/** How a control-flow keyword shapes nesting and cognitive increments. */
export type FlowKind =
    | 'IF'
    | 'ELSE_IF'
    | 'ELSE'
    | 'LOOP'
    | 'DO'
    | 'SWITCH'
    | 'TRY'
    | 'CATCH'
    | 'FINALLY'
    | 'WITH';

export type TypeDeclarationKind = 'Class' | 'Struct';

export type IncludeRule =
    /** One Directive token per include, matched against `pattern` (group 1 is the path). */
    | { style: 'preprocessor'; pattern: RegExp }
    /** `import a.b.C;` / `using System.Text;` style statements at file or namespace scope. */
    | { style: 'statement'; keywords: ReadonlySet<string>; skip: ReadonlySet<string> }
    /** ECMAScript module specifiers: `import ... from 'x'`, `export ... from 'x'`, `require('x')`. */
    | { style: 'module' }
    /** Every string literal in a file-scope statement opened by one of `keywords` (`import "fmt"`, `import ( ... )`). */
    | { style: 'quoted'; keywords: ReadonlySet<string> }
    /** `import a.b as c, d` and `from .pkg import x` statements. */
    | { style: 'import-from' };

export type SignatureStyle = 'c-like' | 'script' | 'go' | 'python';

export interface DialectDescriptor {
    id: string;
    displayName: string;
    extensions: string[];

    // lexical rules
    lineComments: string[];
    blockComments: ReadonlyArray<readonly [string, string]>;
    stringDelimiters: string[];
    escapeChar: string;
    /** Delimiters of literals that may span lines (`"""` text blocks); checked before `stringDelimiters`. */
    multiLineQuotes?: string[];
    /** Quote of a raw literal with no escapes that may span lines (Go's backtick). */
    rawQuote?: string;
    /** Lower-cased words that prefix a string literal (`r`, `b`, `f`, `rb`). */
    stringPrefixes?: ReadonlySet<string>;
    templateDelimiter?: string;
    verbatimStringPrefix?: string;
    rawStringPrefixes?: ReadonlySet<string>;
    digitSeparator?: string;
    regexLiterals?: boolean;
    preprocessor: boolean;
    keywords: ReadonlySet<string>;
    /** Blocks are opened and closed by indentation; the lexer emits Newline, Indent and Dedent tokens. */
    offside?: boolean;
    /** A line ending after an operand or closer ends the statement; the lexer emits a Newline token there. */
    automaticSemicolons?: boolean;
    /** `T&& name` declares an rvalue reference rather than testing a condition. */
    rvalueReferences?: boolean;

    // declaration rules
    typeKeywords: Readonly<Record<string, TypeDeclarationKind>>;
    opaqueKeywords: ReadonlySet<string>;
    namespaceKeywords: ReadonlySet<string>;
    qualifiers: ReadonlySet<string>;
    accessLabels: ReadonlySet<string>;
    trailingQualifiers: ReadonlySet<string>;
    trailerIntroducers: ReadonlySet<string>;
    annotationPrefix?: string;
    attributeBrackets: boolean;
    linkageBlocks: boolean;
    signatureStyle: SignatureStyle;
    functionKeyword?: string;
    /** Fixed constructor name for dialects that do not reuse the type name. */
    constructorName?: string;
    /** Recognise `function name() {}` statements inside bodies as their own declarations. */
    nestedFunctions: boolean;
    /** Emit records for `;`-terminated signatures (prototypes, abstract members). */
    declarationsWithoutBody: boolean;
    include: IncludeRule;

    // complexity rules: keywords and operator tokens that open a decision point
    decisions: Readonly<Record<string, ComplexityNodeType>>;
    flow: Readonly<Record<string, FlowKind>>;
}

/** Decision table shared by every built-in C-family dialect. */
export const cFamilyDecisions: Readonly<Record<string, ComplexityNodeType>> = {
    if: 'IF',
    for: 'LOOP',
    while: 'LOOP',
    case: 'CASE',
    catch: 'CATCH',
    '&&': 'BINARY',
    '||': 'BINARY',
    '?': 'TERNARY'
};

export const cFamilyFlow: Readonly<Record<string, FlowKind>> = {
    if: 'IF',
    else: 'ELSE',
    for: 'LOOP',
    while: 'LOOP',
    do: 'DO',
    switch: 'SWITCH',
    try: 'TRY',
    catch: 'CATCH',
    finally: 'FINALLY'
};

export const cStyleComments = {
    lineComments: ['//'],
    blockComments: [['/*', '*/']] as const
};
