import { DialectDescriptor, cFamilyDecisions, cFamilyFlow, cStyleComments } from './dialect';

// C and C++ share one table; C simply never uses most of the keywords.
export const cppDialect: DialectDescriptor = {
    id: 'cpp',
    displayName: 'C/C++',
    extensions: ['.c', '.h', '.cc', '.cpp', '.cxx', '.c++', '.hh', '.hpp', '.hxx', '.h++', '.ipp', '.inl'],

    ...cStyleComments,
    stringDelimiters: ['"', "'"],
    escapeChar: '\\',
    rawStringPrefixes: new Set(['R', 'LR', 'uR', 'UR', 'u8R']),
    digitSeparator: "'",
    preprocessor: true,
    rvalueReferences: true,
    keywords: new Set([
        'alignas', 'alignof', 'asm', 'auto', 'bool', 'break', 'case', 'catch', 'char', 'char8_t',
        'char16_t', 'char32_t', 'class', 'const', 'consteval', 'constexpr', 'constinit', 'const_cast',
        'continue', 'decltype', 'default', 'delete', 'do', 'double', 'dynamic_cast', 'else', 'enum',
        'explicit', 'export', 'extern', 'false', 'float', 'for', 'friend', 'goto', 'if', 'inline',
        'int', 'long', 'mutable', 'namespace', 'new', 'noexcept', 'nullptr', 'operator', 'private',
        'protected', 'public', 'register', 'reinterpret_cast', 'return', 'short', 'signed', 'sizeof',
        'static', 'static_assert', 'static_cast', 'struct', 'switch', 'template', 'this',
        'thread_local', 'throw', 'true', 'try', 'typedef', 'typeid', 'typename', 'union', 'unsigned',
        'using', 'virtual', 'void', 'volatile', 'wchar_t', 'while'
    ]),

    typeKeywords: { class: 'Class', struct: 'Struct' },
    opaqueKeywords: new Set(['enum', 'union']),
    namespaceKeywords: new Set(['namespace']),
    qualifiers: new Set([
        'static', 'inline', 'virtual', 'explicit', 'extern', 'constexpr', 'consteval', 'friend',
        'typename', 'thread_local', 'register', 'mutable'
    ]),
    accessLabels: new Set(['public', 'protected', 'private']),
    trailingQualifiers: new Set(['const', 'volatile', 'override', 'final', 'noexcept', 'throw', '&', '&&']),
    trailerIntroducers: new Set([':', '->']),
    attributeBrackets: true,
    linkageBlocks: true,
    signatureStyle: 'c-like',
    nestedFunctions: false,
    declarationsWithoutBody: false,
    include: { style: 'preprocessor', pattern: /^#\s*(?:include|import)\s*[<"]([^>"]+)[>"]/ },

    decisions: cFamilyDecisions,
    flow: cFamilyFlow
};
