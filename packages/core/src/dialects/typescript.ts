import { DialectDescriptor, cFamilyDecisions, cFamilyFlow, cStyleComments } from './dialect';

export const typescriptDialect: DialectDescriptor = {
    id: 'typescript',
    displayName: 'TypeScript/JavaScript',
    extensions: ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'],

    ...cStyleComments,
    stringDelimiters: ['"', "'"],
    escapeChar: '\\',
    templateDelimiter: '`',
    digitSeparator: '_',
    regexLiterals: true,
    preprocessor: false,
    keywords: new Set([
        'abstract', 'as', 'async', 'await', 'break', 'case', 'catch', 'class', 'const', 'constructor',
        'continue', 'debugger', 'declare', 'default', 'delete', 'do', 'else', 'enum', 'export',
        'extends', 'false', 'finally', 'for', 'from', 'function', 'if', 'implements', 'import', 'in',
        'instanceof', 'interface', 'let', 'new', 'null', 'of', 'private', 'protected', 'public',
        'readonly', 'return', 'static', 'super', 'switch', 'this', 'throw', 'true', 'try', 'type',
        'typeof', 'var', 'void', 'while', 'yield'
    ]),

    typeKeywords: { class: 'Class' },
    opaqueKeywords: new Set(['interface', 'enum', 'type']),
    namespaceKeywords: new Set(['namespace', 'module']),
    qualifiers: new Set([
        'export', 'default', 'declare', 'abstract', 'async', 'static', 'public', 'private',
        'protected', 'readonly', 'override', 'accessor', 'get', 'set', '*'
    ]),
    accessLabels: new Set<string>(),
    trailingQualifiers: new Set<string>(),
    trailerIntroducers: new Set([':']),
    annotationPrefix: '@',
    attributeBrackets: false,
    linkageBlocks: false,
    signatureStyle: 'script',
    functionKeyword: 'function',
    constructorName: 'constructor',
    nestedFunctions: true,
    declarationsWithoutBody: false,
    include: { style: 'module' },

    decisions: cFamilyDecisions,
    flow: cFamilyFlow
};
