import { DialectDescriptor, cFamilyDecisions, cFamilyFlow, cStyleComments } from './dialect';

export const javaDialect: DialectDescriptor = {
    id: 'java',
    displayName: 'Java',
    extensions: ['.java'],

    ...cStyleComments,
    multiLineQuotes: ['"""'],
    stringDelimiters: ['"', "'"],
    escapeChar: '\\',
    digitSeparator: '_',
    preprocessor: false,
    keywords: new Set([
        'abstract', 'assert', 'boolean', 'break', 'byte', 'case', 'catch', 'char', 'class',
        'const', 'continue', 'default', 'do', 'double', 'else', 'enum', 'extends', 'final',
        'finally', 'float', 'for', 'goto', 'if', 'implements', 'import', 'instanceof', 'int',
        'interface', 'long', 'native', 'new', 'null', 'package', 'private', 'protected', 'public',
        'return', 'short', 'static', 'strictfp', 'super', 'switch', 'synchronized', 'this',
        'throw', 'throws', 'transient', 'true', 'false', 'try', 'void', 'volatile', 'while'
    ]),

    typeKeywords: { class: 'Class', interface: 'Class', enum: 'Class', record: 'Class' },
    opaqueKeywords: new Set<string>(),
    namespaceKeywords: new Set<string>(),
    qualifiers: new Set([
        'public', 'private', 'protected', 'static', 'final', 'abstract', 'synchronized', 'native',
        'default', 'strictfp', 'transient', 'sealed'
    ]),
    accessLabels: new Set<string>(),
    trailingQualifiers: new Set<string>(),
    trailerIntroducers: new Set(['throws']),
    annotationPrefix: '@',
    attributeBrackets: false,
    linkageBlocks: false,
    signatureStyle: 'c-like',
    nestedFunctions: false,
    declarationsWithoutBody: false,
    include: { style: 'statement', keywords: new Set(['import']), skip: new Set(['static']) },

    decisions: cFamilyDecisions,
    flow: cFamilyFlow
};
