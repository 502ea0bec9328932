import { DialectDescriptor, cFamilyDecisions, cFamilyFlow, cStyleComments } from './dialect';

export const csharpDialect: DialectDescriptor = {
    id: 'csharp',
    displayName: 'C#',
    extensions: ['.cs'],

    ...cStyleComments,
    multiLineQuotes: ['"""'],
    stringDelimiters: ['"', "'"],
    escapeChar: '\\',
    verbatimStringPrefix: '@',
    digitSeparator: '_',
    preprocessor: true,
    keywords: new Set([
        'abstract', 'as', 'base', 'bool', 'break', 'byte', 'case', 'catch', 'char', 'checked',
        'class', 'const', 'continue', 'decimal', 'default', 'delegate', 'do', 'double', 'else',
        'enum', 'event', 'explicit', 'extern', 'false', 'finally', 'fixed', 'float', 'for',
        'foreach', 'goto', 'if', 'implicit', 'in', 'int', 'interface', 'internal', 'is', 'lock',
        'long', 'namespace', 'new', 'null', 'object', 'operator', 'out', 'override', 'params',
        'private', 'protected', 'public', 'readonly', 'ref', 'return', 'sbyte', 'sealed', 'short',
        'sizeof', 'stackalloc', 'static', 'string', 'struct', 'switch', 'this', 'throw', 'true',
        'try', 'typeof', 'uint', 'ulong', 'unchecked', 'unsafe', 'ushort', 'using', 'virtual',
        'void', 'volatile', 'while'
    ]),

    // `record` is contextual, so it is matched by value rather than as a keyword token
    typeKeywords: { class: 'Class', interface: 'Class', record: 'Class', struct: 'Struct' },
    opaqueKeywords: new Set(['enum', 'delegate']),
    namespaceKeywords: new Set(['namespace']),
    qualifiers: new Set([
        'public', 'private', 'protected', 'internal', 'static', 'virtual', 'override', 'abstract',
        'sealed', 'async', 'new', 'extern', 'partial', 'unsafe', 'readonly', 'required', 'file'
    ]),
    accessLabels: new Set<string>(),
    trailingQualifiers: new Set<string>(),
    trailerIntroducers: new Set([':', 'where']),
    attributeBrackets: true,
    linkageBlocks: false,
    signatureStyle: 'c-like',
    nestedFunctions: false,
    declarationsWithoutBody: false,
    include: { style: 'statement', keywords: new Set(['using']), skip: new Set(['global', 'static']) },

    decisions: { ...cFamilyDecisions, foreach: 'LOOP' },
    flow: { ...cFamilyFlow, foreach: 'LOOP' }
};
