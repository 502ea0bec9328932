/**
 * Declaration matchers
 * ====================
 *
 * The scanner buffers the significant tokens of the statement in progress.
 * When a `{` (or a `;`, for dialects with bodiless declarations) ends that
 * statement, the helpers here decide what the statement declares.
 *
 *   c-like:  [attributes] [template<...>] qualifiers return-type name(params) trailer
 *   script:  qualifiers function name(params) [: type]
 *            qualifiers name(params) [: type]           (inside a class body)
 *   go:      func [(receiver)] name[type params](params) results
 *            type Name[type params] struct | interface
 *   python:  [async] def name(params) [-> type]:
 *            class Name[(bases)]:
 *
 * Positions returned by the matchers index into the statement array, not into
 * the file's token stream.
 */

import { ParameterRecord, Token, TokenKind } from '../types';
import { DialectDescriptor, TypeDeclarationKind } from '../dialects/dialect';
import { parseParameters } from './parameters';

export type Terminator = '{' | ';';

export interface SignatureMatch {
    /** Empty for anonymous script functions. */
    name: string;
    qualifier?: string;
    parameters: ParameterRecord[];
    hasReturnType: boolean;
    isDestructor: boolean;
    isOperator: boolean;
    start: number;
    trailer: Token[];
}

export interface TypeMatch {
    kind: TypeDeclarationKind;
    keyword: string;
    name?: string;
    start: number;
}

export type StatementShape =
    | { kind: 'type'; match: TypeMatch }
    | { kind: 'namespace' }
    | { kind: 'signature'; match: SignatureMatch }
    | { kind: 'block' };

const block: StatementShape = { kind: 'block' };

// A candidate preceded by one of these is a statement, not a declaration.
const controlKeywords = new Set([
    'return', 'new', 'throw', 'else', 'case', 'goto', 'delete', 'sizeof', 'do', 'co_return',
    'co_yield', 'await', 'if', 'while', 'for', 'switch', 'catch'
]);

// Tokens after which `function` or `class` starts an expression.
const expressionContext = new Set([
    '=', '(', ',', ':', '?', '=>', '&&', '||', '??', '[', '!', '+', '-', '||=', '&&=', '??=',
    '...', 'return', 'new', 'extends', 'yield', 'await', 'typeof', 'void', 'in', 'of', 'case',
    'throw', 'delete'
]);

const typeNameStops = new Set([':', '<', ';', 'extends', 'implements', 'where']);
const typeNameModifiers = new Set(['final', 'sealed', 'abstract']);

export function isPunct(token: Token | undefined, value: string): boolean {
    return token !== undefined && token.kind === TokenKind.Punctuation && token.value === value;
}

function isWord(token: Token | undefined): boolean {
    return token !== undefined && (token.kind === TokenKind.Identifier || token.kind === TokenKind.Keyword);
}

// Identifiers spelled like macros (`Q_DECL_OVERRIDE`, `NOEXCEPT`) may trail a signature.
function isMacroName(token: Token): boolean {
    return token.kind === TokenKind.Identifier && /^[A-Z][A-Z0-9_]+$/.test(token.value);
}

/** Joins token values, keeping a space only between two words. */
export function joinTokens(tokens: readonly Token[]): string {
    let out = '';
    for (let k = 0; k < tokens.length; k++) {
        if (k > 0 && isWord(tokens[k - 1]) && isWord(tokens[k])) out += ' ';
        out += tokens[k].value;
    }
    return out;
}

/** Index of the closer matching the `(`, `[` or `{` at `open`, or -1. */
export function matchForward(tokens: readonly Token[], open: number): number {
    const opener = tokens[open].value;
    const closer = opener === '(' ? ')' : opener === '[' ? ']' : '}';
    let depth = 0;
    for (let k = open; k < tokens.length; k++) {
        if (isPunct(tokens[k], opener)) depth++;
        else if (isPunct(tokens[k], closer) && --depth === 0) return k;
    }
    return -1;
}

function angleWeight(token: Token | undefined): number {
    if (token === undefined || token.kind !== TokenKind.Punctuation) return 0;
    switch (token.value) {
        case '<': return 1;
        case '>': return -1;
        case '>>': return -2;
        case '>>>': return -3;
        default: return 0;
    }
}

/**
 * Skips a generic argument list starting at `open`; returns the index after
 * it, or -1. Angles inside parentheses (`N = sizeof(T)`) do not count.
 */
export function skipAnglesForward(tokens: readonly Token[], open: number): number {
    let depth = 0;
    let parens = 0;
    for (let k = open; k < tokens.length; k++) {
        const token = tokens[k];
        if (isPunct(token, '(')) {
            parens++;
        } else if (isPunct(token, ')')) {
            if (--parens < 0) return -1;
        } else if (parens === 0) {
            if (isPunct(token, '{') || isPunct(token, ';')) return -1;
            depth += angleWeight(token);
            if (depth <= 0) return k + 1;
        }
    }
    return -1;
}

/** From a closing `>` at `close`, returns the index before the matching `<`, or -1. */
function skipAnglesBack(tokens: readonly Token[], close: number, floor: number): number {
    let depth = 0;
    for (let k = close; k >= floor; k--) {
        depth -= angleWeight(tokens[k]);
        if (depth <= 0) return k - 1;
    }
    return -1;
}

function skipAnnotation(tokens: readonly Token[], k: number, prefix: string): number {
    if (!isPunct(tokens[k], prefix) || !isWord(tokens[k + 1])) return k;
    let j = k + 2;
    while (isPunct(tokens[j], '.') && isWord(tokens[j + 1])) j += 2;
    if (isPunct(tokens[j], '(')) {
        const close = matchForward(tokens, j);
        return close < 0 ? tokens.length : close + 1;
    }
    return j;
}

/**
 * Drops annotations (`@Override`, `@Inject()`) found outside brackets, so
 * they never read as part of a return type. Returns the kept positions.
 */
export function withoutAnnotations(tokens: readonly Token[], dialect: DialectDescriptor): number[] {
    const kept: number[] = [];
    const prefix = dialect.annotationPrefix;
    let depth = 0;
    for (let k = 0; k < tokens.length; k++) {
        if (prefix && depth === 0) {
            const next = skipAnnotation(tokens, k, prefix);
            if (next !== k) {
                k = next - 1;
                continue;
            }
        }
        if (isPunct(tokens[k], '(') || isPunct(tokens[k], '[')) depth++;
        else if (isPunct(tokens[k], ')') || isPunct(tokens[k], ']')) depth = Math.max(0, depth - 1);
        kept.push(k);
    }
    return kept;
}

// Leading `[[nodiscard]]`, `[Obsolete]` and `template<...>` headers.
function skipPrefixNoise(tokens: readonly Token[], dialect: DialectDescriptor): number {
    let k = 0;
    for (;;) {
        if (dialect.attributeBrackets && isPunct(tokens[k], '[')) {
            const close = matchForward(tokens, k);
            if (close < 0) return tokens.length;
            k = close + 1;
        } else if (tokens[k]?.value === 'template' && isPunct(tokens[k + 1], '<')) {
            const next = skipAnglesForward(tokens, k + 1);
            if (next < 0) return tokens.length;
            k = next;
        } else {
            return k;
        }
    }
}

function typeName(tokens: readonly Token[], keyword: number): string | undefined {
    let name: string | undefined;
    for (let k = keyword + 1; k < tokens.length; k++) {
        const token = tokens[k];
        if (typeNameStops.has(token.value)) break;
        if (isPunct(token, '(')) {
            const close = matchForward(tokens, k);
            if (close < 0) break;
            k = close;
        } else if (token.kind === TokenKind.Identifier && !typeNameModifiers.has(token.value)) {
            name = token.value;
        }
    }
    return name;
}

function qualifierStart(tokens: readonly Token[], at: number, dialect: DialectDescriptor): number {
    let k = at;
    while (k > 0 && dialect.qualifiers.has(tokens[k - 1].value)) k--;
    return k;
}

function inExpression(tokens: readonly Token[], at: number, dialect: DialectDescriptor): boolean {
    const k = qualifierStart(tokens, at, dialect) - 1;
    return k >= 0 && expressionContext.has(tokens[k].value);
}

function validTrailer(trailer: readonly Token[], dialect: DialectDescriptor, terminator: Terminator): boolean {
    let k = 0;
    while (k < trailer.length) {
        const token = trailer[k];
        if (dialect.trailerIntroducers.has(token.value)) return true;
        if (terminator === ';' && (token.value === '=' || token.value === '=>')) return true;
        if (!dialect.trailingQualifiers.has(token.value) && !isMacroName(token)) return false;
        k++;
        if (isPunct(trailer[k], '(')) {
            const close = matchForward(trailer, k);
            if (close < 0) return false;
            k = close + 1;
        }
    }
    return true;
}

interface ResolvedName {
    name: string;
    start: number;
    isDestructor: boolean;
    isOperator: boolean;
}

function resolveName(tokens: readonly Token[], floor: number, open: number): ResolvedName | undefined {
    const last = open - 1;
    if (last < floor) return undefined;

    for (let k = last; k >= Math.max(floor, last - 3); k--) {
        if (tokens[k].value === 'operator' && isWord(tokens[k])) {
            const symbol = joinTokens(tokens.slice(k + 1, open));
            const name = symbol && isWord(tokens[k + 1]) ? `operator ${symbol}` : `operator${symbol}`;
            return { name, start: k, isDestructor: false, isOperator: true };
        }
    }

    let k = last;
    if (angleWeight(tokens[k]) < 0) k = skipAnglesBack(tokens, k, floor);
    if (k < floor || tokens[k].kind !== TokenKind.Identifier) return undefined;
    if (k > floor && isPunct(tokens[k - 1], '~')) {
        return { name: `~${tokens[k].value}`, start: k - 1, isDestructor: true, isOperator: false };
    }
    return { name: tokens[k].value, start: k, isDestructor: false, isOperator: false };
}

function cLikeCandidate(
    tokens: readonly Token[],
    begin: number,
    open: number,
    text: string,
    dialect: DialectDescriptor,
    terminator: Terminator
): SignatureMatch | undefined {
    const close = matchForward(tokens, open);
    if (close < 0) return undefined;
    const resolved = resolveName(tokens, begin, open);
    if (!resolved) return undefined;

    // Owner::name, Outer::Inner::name, Owner<T>::name
    let qualifier: string | undefined;
    let nameStart = resolved.start;
    while (nameStart - 2 >= begin && isPunct(tokens[nameStart - 1], '::')) {
        let k = nameStart - 2;
        if (angleWeight(tokens[k]) < 0) k = skipAnglesBack(tokens, k, begin);
        if (k < begin || tokens[k].kind !== TokenKind.Identifier) break;
        qualifier ??= tokens[k].value;
        nameStart = k;
    }

    const trailer = tokens.slice(close + 1);
    if (!validTrailer(trailer, dialect, terminator)) return undefined;

    let start = begin;
    for (let k = begin; k < nameStart; k++) {
        if (isPunct(tokens[k], ')') || isPunct(tokens[k], ']')) start = k + 1;
    }
    const returnType = tokens.slice(start, nameStart).filter(t => !dialect.qualifiers.has(t.value));
    if (returnType.some(t => isPunct(t, '=') || controlKeywords.has(t.value))) return undefined;

    return {
        name: resolved.name,
        qualifier,
        parameters: parseParameters(tokens.slice(open + 1, close), text, dialect),
        hasReturnType: returnType.length > 0,
        isDestructor: resolved.isDestructor,
        isOperator: resolved.isOperator,
        start,
        trailer
    };
}

/** First `name(params) trailer` in the statement that reads as a signature. */
export function matchCLikeSignature(
    tokens: readonly Token[],
    begin: number,
    text: string,
    dialect: DialectDescriptor,
    terminator: Terminator
): SignatureMatch | undefined {
    let depth = 0;
    for (let k = begin; k < tokens.length; k++) {
        const token = tokens[k];
        if (isPunct(token, '(')) {
            if (depth === 0) {
                const match = cLikeCandidate(tokens, begin, k, text, dialect, terminator);
                if (match) return match;
            }
            depth++;
        } else if (isPunct(token, '[')) {
            depth++;
        } else if (isPunct(token, ')') || isPunct(token, ']')) {
            depth = Math.max(0, depth - 1);
        } else if (depth === 0 && isPunct(token, '=') && tokens[k - 1]?.value !== 'operator') {
            return undefined;
        }
    }
    return undefined;
}

function cLikeKeyword(tokens: readonly Token[], begin: number, dialect: DialectDescriptor): StatementShape | undefined {
    for (let k = begin; k < tokens.length; k++) {
        const token = tokens[k];
        if (isPunct(token, '(') || isPunct(token, '=')) return undefined;
        if (!isWord(token)) continue;
        const next = tokens[k + 1];

        if (Object.hasOwn(dialect.typeKeywords, token.value)) {
            if (next !== undefined && !isWord(next) && !isPunct(next, ':')) continue;
            // contextual keywords (`record`) lex as identifiers and need a name after them
            if (token.kind === TokenKind.Identifier && !isWord(next)) continue;
            // `struct Node *make(void)` returns a struct rather than declaring one
            const after = tokens[k + 2];
            const returnsType = isWord(next)
                && (isPunct(after, '*') || isPunct(after, '&') || after?.kind === TokenKind.Identifier)
                && tokens.slice(k + 2).some(t => isPunct(t, '('));
            if (returnsType) return undefined;
            return {
                kind: 'type',
                match: { kind: dialect.typeKeywords[token.value], keyword: token.value, name: typeName(tokens, k), start: begin }
            };
        }
        if (dialect.opaqueKeywords.has(token.value)) return block;
        if (dialect.namespaceKeywords.has(token.value)) {
            return next === undefined || isWord(next) ? { kind: 'namespace' } : block;
        }
    }
    return undefined;
}

export function classifyCLike(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor,
    terminator: Terminator
): StatementShape {
    const begin = skipPrefixNoise(tokens, dialect);
    if (begin >= tokens.length) return block;

    if (dialect.linkageBlocks && tokens[begin].value === 'extern'
        && tokens[begin + 1]?.kind === TokenKind.String && begin + 2 === tokens.length) {
        return { kind: 'namespace' };
    }

    const keyword = cLikeKeyword(tokens, begin, dialect);
    if (keyword) return keyword;

    const match = matchCLikeSignature(tokens, begin, text, dialect, terminator);
    return match ? { kind: 'signature', match } : block;
}

/** `function name(params)` outside an expression; `'expression'` for a function expression. */
export function matchScriptFunction(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor
): SignatureMatch | 'expression' | undefined {
    let depth = 0;
    let keyword = -1;
    for (let k = 0; k < tokens.length; k++) {
        const token = tokens[k];
        if (isPunct(token, '(') || isPunct(token, '[')) depth++;
        else if (isPunct(token, ')') || isPunct(token, ']')) depth = Math.max(0, depth - 1);
        else if (depth === 0 && token.kind === TokenKind.Keyword && token.value === dialect.functionKeyword) keyword = k;
    }
    if (keyword < 0) return undefined;
    if (inExpression(tokens, keyword, dialect)) return 'expression';

    let k = keyword + 1;
    if (isPunct(tokens[k], '*')) k++;
    let name = '';
    if (isWord(tokens[k])) name = tokens[k++].value;
    if (isPunct(tokens[k], '<')) k = skipAnglesForward(tokens, k);
    if (k < 0 || !isPunct(tokens[k], '(')) return undefined;

    const close = matchForward(tokens, k);
    if (close < 0) return undefined;
    const trailer = tokens.slice(close + 1);
    if (trailer.length > 0 && !dialect.trailerIntroducers.has(trailer[0].value)) return undefined;

    return {
        name,
        parameters: parseParameters(tokens.slice(k + 1, close), text, dialect),
        hasReturnType: true,
        isDestructor: false,
        isOperator: false,
        start: qualifierStart(tokens, keyword, dialect),
        trailer
    };
}

/** Tokens outside any bracket pair, so `: { f: () => void }` shows only its `:`. */
function topLevel(tokens: readonly Token[]): Token[] {
    const kept: Token[] = [];
    let depth = 0;
    for (const token of tokens) {
        if (isPunct(token, '(') || isPunct(token, '[') || isPunct(token, '{')) depth++;
        else if (isPunct(token, ')') || isPunct(token, ']') || isPunct(token, '}')) depth = Math.max(0, depth - 1);
        else if (depth === 0) kept.push(token);
    }
    return kept;
}

/** `name(params) [: type]` inside a class body; arrow-valued properties do not match. */
export function matchScriptMethod(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor
): SignatureMatch | undefined {
    let group: [number, number] | undefined;
    let depth = 0;
    for (let k = 0; k < tokens.length; k++) {
        const token = tokens[k];
        if (isPunct(token, '[') || isPunct(token, '{')) depth++;
        else if (isPunct(token, ']') || isPunct(token, '}')) depth = Math.max(0, depth - 1);
        else if (depth === 0 && isPunct(token, '(')) {
            const close = matchForward(tokens, k);
            if (close < 0) break;
            const trailer = tokens.slice(close + 1);
            const annotated = trailer.length > 0 && isPunct(trailer[0], ':')
                && !topLevel(trailer).some(t => isPunct(t, '=>') || isPunct(t, '='));
            if (trailer.length === 0 || annotated) group = [k, close];
            k = close;
        }
    }
    if (!group) return undefined;
    const [open, close] = group;

    let k = open - 1;
    if (angleWeight(tokens[k]) < 0) k = skipAnglesBack(tokens, k, 0);
    if (isPunct(tokens[k], '?') || isPunct(tokens[k], '!')) k--;
    const token = tokens[k];
    if (token === undefined) return undefined;

    let name: string;
    let nameStart = k;
    if (isWord(token)) {
        name = token.value;
        if (isPunct(tokens[k - 1], '#')) {
            name = `#${name}`;
            nameStart--;
        }
    } else if (token.kind === TokenKind.String) {
        name = token.value.slice(1, -1);
    } else if (token.kind === TokenKind.Number) {
        name = token.value;
    } else if (isPunct(token, ']')) {
        let bracket = k;
        while (bracket >= 0 && !isPunct(tokens[bracket], '[')) bracket--;
        if (bracket < 0) return undefined;
        name = `[${joinTokens(tokens.slice(bracket + 1, k))}]`;
        nameStart = bracket;
    } else {
        return undefined;
    }

    const start = qualifierStart(tokens, nameStart, dialect);
    if (start > 0 && (isPunct(tokens[start - 1], '=') || isPunct(tokens[start - 1], '.'))) return undefined;

    return {
        name,
        parameters: parseParameters(tokens.slice(open + 1, close), text, dialect),
        hasReturnType: true,
        isDestructor: false,
        isOperator: false,
        start,
        trailer: tokens.slice(close + 1)
    };
}

function scriptType(tokens: readonly Token[], dialect: DialectDescriptor): StatementShape | undefined {
    for (let k = tokens.length - 1; k >= 0; k--) {
        const token = tokens[k];
        if (!isWord(token) || !Object.hasOwn(dialect.typeKeywords, token.value)) continue;
        if (inExpression(tokens, k, dialect)) return block;
        const next = tokens[k + 1];
        const named = next?.kind === TokenKind.Identifier && !typeNameStops.has(next.value);
        return {
            kind: 'type',
            match: {
                kind: dialect.typeKeywords[token.value],
                keyword: token.value,
                name: named ? next.value : undefined,
                start: qualifierStart(tokens, k, dialect)
            }
        };
    }
    return undefined;
}

function scriptNamespace(tokens: readonly Token[], dialect: DialectDescriptor): boolean {
    let k = 0;
    while (k < tokens.length && dialect.qualifiers.has(tokens[k].value)) k++;
    const keyword = tokens[k];
    const next = tokens[k + 1];
    return keyword !== undefined && dialect.namespaceKeywords.has(keyword.value)
        && next !== undefined && (isWord(next) || next.kind === TokenKind.String);
}

export function classifyScript(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor,
    inTypeBody: boolean,
    functionsOnly: boolean
): StatementShape {
    const fn = matchScriptFunction(tokens, text, dialect);
    if (fn === 'expression') return block;
    if (fn) return { kind: 'signature', match: fn };
    if (functionsOnly) return block;

    if (inTypeBody) {
        const method = matchScriptMethod(tokens, text, dialect);
        return method ? { kind: 'signature', match: method } : block;
    }
    return scriptType(tokens, dialect) ?? (scriptNamespace(tokens, dialect) ? { kind: 'namespace' } : block);
}

// --- go ---

function receiverType(tokens: readonly Token[]): string | undefined {
    let name: string | undefined;
    for (const token of tokens) {
        if (isPunct(token, '[')) break;
        if (token.kind === TokenKind.Identifier) name = token.value;
    }
    return name;
}

/** `func [(r *T)] name[T any](params) results`; the receiver's type becomes the qualifier. */
export function matchGoFunction(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor
): SignatureMatch | undefined {
    if (tokens[0]?.value !== dialect.functionKeyword) return undefined;
    let k = 1;
    let qualifier: string | undefined;
    if (isPunct(tokens[k], '(')) {
        const close = matchForward(tokens, k);
        if (close < 0) return undefined;
        qualifier = receiverType(tokens.slice(k + 1, close));
        if (qualifier === undefined) return undefined;
        k = close + 1;
    }
    if (tokens[k]?.kind !== TokenKind.Identifier) return undefined;
    const name = tokens[k++].value;
    if (isPunct(tokens[k], '[')) {
        const close = matchForward(tokens, k);
        if (close < 0) return undefined;
        k = close + 1;
    }
    if (!isPunct(tokens[k], '(')) return undefined;
    const close = matchForward(tokens, k);
    if (close < 0) return undefined;

    const trailer = tokens.slice(close + 1);
    return {
        name,
        qualifier,
        parameters: parseParameters(tokens.slice(k + 1, close), text, dialect),
        hasReturnType: trailer.length > 0,
        isDestructor: false,
        isOperator: false,
        start: 0,
        trailer
    };
}

/**
 * Go declarations. `member` names the statement position where the current
 * member of a grouped `type ( ... )` declaration begins.
 */
export function classifyGo(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor,
    member = 0
): StatementShape {
    const fn = member === 0 ? matchGoFunction(tokens, text, dialect) : undefined;
    if (fn) return { kind: 'signature', match: fn };

    const last = tokens[tokens.length - 1];
    if (last === undefined || !Object.hasOwn(dialect.typeKeywords, last.value)) return block;
    const name = member === 0 ? 1 : member;
    if (member === 0 && tokens[0].value !== 'type') return block;
    const token = tokens[name];
    if (token?.kind !== TokenKind.Identifier || name === tokens.length - 1) return block;
    return {
        kind: 'type',
        match: { kind: dialect.typeKeywords[last.value], keyword: last.value, name: token.value, start: member }
    };
}

// --- python ---

export interface PythonHeader {
    shape: StatementShape;
    /** Position of the `:` that ends the header. */
    colon: number;
}

function headerColon(tokens: readonly Token[], from: number): number {
    let depth = 0;
    for (let k = from; k < tokens.length; k++) {
        const token = tokens[k];
        if (isPunct(token, '(') || isPunct(token, '[') || isPunct(token, '{')) depth++;
        else if (isPunct(token, ')') || isPunct(token, ']') || isPunct(token, '}')) depth = Math.max(0, depth - 1);
        else if (depth === 0 && isPunct(token, ':')) return k;
    }
    return -1;
}

/** A `def` or `class` header, with or without a body on the same line. */
export function matchPythonHeader(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor
): PythonHeader | undefined {
    let k = 0;
    while (k < tokens.length && dialect.qualifiers.has(tokens[k].value)) k++;
    const keyword = tokens[k];
    const name = tokens[k + 1];
    if (keyword?.kind !== TokenKind.Keyword || name?.kind !== TokenKind.Identifier) return undefined;

    let j = k + 2;
    if (isPunct(tokens[j], '[')) {
        const close = matchForward(tokens, j);
        if (close < 0) return undefined;
        j = close + 1;
    }

    if (keyword.value === dialect.functionKeyword) {
        if (!isPunct(tokens[j], '(')) return undefined;
        const close = matchForward(tokens, j);
        if (close < 0) return undefined;
        const colon = headerColon(tokens, close + 1);
        if (colon < 0) return undefined;
        const trailer = tokens.slice(close + 1, colon);
        return {
            colon,
            shape: {
                kind: 'signature',
                match: {
                    name: name.value,
                    parameters: parseParameters(tokens.slice(j + 1, close), text, dialect),
                    hasReturnType: trailer.some(t => dialect.trailerIntroducers.has(t.value)),
                    isDestructor: false,
                    isOperator: false,
                    start: 0,
                    trailer
                }
            }
        };
    }

    if (Object.hasOwn(dialect.typeKeywords, keyword.value)) {
        const colon = headerColon(tokens, j);
        if (colon < 0) return undefined;
        return {
            colon,
            shape: {
                kind: 'type',
                match: { kind: dialect.typeKeywords[keyword.value], keyword: keyword.value, name: name.value, start: 0 }
            }
        };
    }
    return undefined;
}

/** Shape of a statement whose block follows on the next, indented lines. */
export function classifyPython(tokens: readonly Token[], text: string, dialect: DialectDescriptor): StatementShape {
    const header = matchPythonHeader(tokens, text, dialect);
    return header !== undefined && header.colon === tokens.length - 1 ? header.shape : block;
}
