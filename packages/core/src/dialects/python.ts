import { DialectDescriptor } from './dialect';

// Blocks come from indentation; `def` and `class` headers end in `:`.
export const pythonDialect: DialectDescriptor = {
    id: 'python',
    displayName: 'Python',
    extensions: ['.py', '.pyi'],

    lineComments: ['#'],
    blockComments: [],
    multiLineQuotes: ['"""', "'''"],
    stringDelimiters: ['"', "'"],
    stringPrefixes: new Set(['r', 'u', 'b', 'f', 'br', 'rb', 'fr', 'rf']),
    escapeChar: '\\',
    digitSeparator: '_',
    preprocessor: false,
    offside: true,
    keywords: new Set([
        'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class',
        'continue', 'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global',
        'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return',
        'try', 'while', 'with', 'yield'
    ]),

    typeKeywords: { class: 'Class' },
    opaqueKeywords: new Set<string>(),
    namespaceKeywords: new Set<string>(),
    qualifiers: new Set(['async']),
    accessLabels: new Set<string>(),
    trailingQualifiers: new Set<string>(),
    trailerIntroducers: new Set(['->']),
    annotationPrefix: '@',
    attributeBrackets: false,
    linkageBlocks: false,
    signatureStyle: 'python',
    functionKeyword: 'def',
    constructorName: '__init__',
    nestedFunctions: false,
    declarationsWithoutBody: false,
    include: { style: 'import-from' },

    decisions: {
        if: 'IF',
        elif: 'IF',
        for: 'LOOP',
        while: 'LOOP',
        except: 'CATCH',
        with: 'IF',
        assert: 'IF',
        and: 'BINARY',
        or: 'BINARY'
    },
    flow: {
        if: 'IF',
        elif: 'ELSE_IF',
        else: 'ELSE',
        for: 'LOOP',
        while: 'LOOP',
        try: 'TRY',
        except: 'CATCH',
        finally: 'FINALLY',
        with: 'WITH'
    }
};
