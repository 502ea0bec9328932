import { DialectDescriptor, cStyleComments } from './dialect';

export const goDialect: DialectDescriptor = {
    id: 'go',
    displayName: 'Go',
    extensions: ['.go'],

    ...cStyleComments,
    stringDelimiters: ['"', "'"],
    rawQuote: '`',
    escapeChar: '\\',
    digitSeparator: '_',
    preprocessor: false,
    automaticSemicolons: true,
    keywords: new Set([
        'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else', 'fallthrough',
        'for', 'func', 'go', 'goto', 'if', 'import', 'interface', 'map', 'package', 'range',
        'return', 'select', 'struct', 'switch', 'type', 'var'
    ]),

    // interfaces are counted with classes
    typeKeywords: { struct: 'Struct', interface: 'Class' },
    opaqueKeywords: new Set<string>(),
    namespaceKeywords: new Set<string>(),
    qualifiers: new Set<string>(),
    accessLabels: new Set<string>(),
    trailingQualifiers: new Set<string>(),
    trailerIntroducers: new Set<string>(),
    attributeBrackets: false,
    linkageBlocks: false,
    signatureStyle: 'go',
    functionKeyword: 'func',
    nestedFunctions: false,
    declarationsWithoutBody: false,
    include: { style: 'quoted', keywords: new Set(['import']) },

    decisions: {
        if: 'IF',
        for: 'LOOP',
        case: 'CASE',
        '&&': 'BINARY',
        '||': 'BINARY'
    },
    flow: {
        if: 'IF',
        else: 'ELSE',
        for: 'LOOP',
        switch: 'SWITCH',
        select: 'SWITCH'
    }
};
