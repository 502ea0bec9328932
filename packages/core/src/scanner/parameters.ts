import { ParameterRecord, Token, TokenKind } from '../types';
import { DialectDescriptor } from '../dialects/dialect';

const openers = new Set(['(', '[', '{']);
const closers = new Set([')', ']', '}']);

// Modifiers allowed in front of a parameter name that are not part of it.
const scriptParameterModifiers = new Set(['public', 'private', 'protected', 'readonly', 'override']);

function isPunct(token: Token | undefined, value: string): boolean {
    return token !== undefined && token.kind === TokenKind.Punctuation && token.value === value;
}

function sliceText(text: string, tokens: readonly Token[]): string {
    if (tokens.length === 0) return '';
    return text.slice(tokens[0].start, tokens[tokens.length - 1].end);
}

/**
 * Splits the tokens between a parameter list's parentheses on top-level
 * commas. Angle brackets only group before a default value, where they can
 * only be generic arguments.
 */
export function splitParameters(tokens: readonly Token[]): Token[][] {
    const parts: Token[][] = [];
    let current: Token[] = [];
    let depth = 0;
    let angles = 0;
    let afterDefault = false;

    for (const token of tokens) {
        if (token.kind === TokenKind.Comment) continue;
        const value = token.kind === TokenKind.Punctuation ? token.value : '';

        if (openers.has(value)) depth++;
        else if (closers.has(value)) depth = Math.max(0, depth - 1);
        else if (!afterDefault && value === '<') angles++;
        else if (!afterDefault && value === '>') angles = Math.max(0, angles - 1);
        else if (!afterDefault && value === '>>') angles = Math.max(0, angles - 2);
        else if (depth === 0 && angles === 0 && value === '=') afterDefault = true;

        if (depth === 0 && angles === 0 && value === ',') {
            parts.push(current);
            current = [];
            afterDefault = false;
            continue;
        }
        current.push(token);
    }
    if (current.length > 0 || parts.length > 0) parts.push(current);
    return parts;
}

function stripAnnotations(tokens: Token[], prefix: string | undefined): Token[] {
    if (!prefix) return tokens;
    let k = 0;
    while (isPunct(tokens[k], prefix) && tokens[k + 1] !== undefined) {
        k += 2;
        while (isPunct(tokens[k], '.') && tokens[k + 1] !== undefined) k += 2;
        if (isPunct(tokens[k], '(')) {
            let depth = 0;
            for (; k < tokens.length; k++) {
                if (isPunct(tokens[k], '(')) depth++;
                else if (isPunct(tokens[k], ')') && --depth === 0) {
                    k++;
                    break;
                }
            }
        }
    }
    return tokens.slice(k);
}

function defaultIndex(tokens: readonly Token[]): number {
    let depth = 0;
    for (let k = 0; k < tokens.length; k++) {
        const value = tokens[k].kind === TokenKind.Punctuation ? tokens[k].value : '';
        if (openers.has(value)) depth++;
        else if (closers.has(value)) depth = Math.max(0, depth - 1);
        else if (depth === 0 && value === '=') return k;
    }
    return -1;
}

function typedParameter(decl: Token[], text: string): Omit<ParameterRecord, 'hasDefault'> {
    // `int values[]`, `char buf[16]`
    while (isPunct(decl[decl.length - 1], ']')) {
        const open = decl.map(t => t.value).lastIndexOf('[');
        if (open <= 0) break;
        decl = decl.slice(0, open);
    }

    const last = decl[decl.length - 1];
    if (decl.length === 1) {
        return last.kind === TokenKind.Identifier
            ? { type: '', name: last.value }
            : { type: last.value, name: '' };
    }
    if (last.kind === TokenKind.Identifier) {
        return { type: sliceText(text, decl.slice(0, -1)), name: last.value };
    }
    return { type: sliceText(text, decl), name: '' };
}

function annotatedParameter(decl: Token[], text: string): Omit<ParameterRecord, 'hasDefault'> | undefined {
    let k = 0;
    while (k < decl.length - 1 && scriptParameterModifiers.has(decl[k].value)) k++;
    decl = decl.slice(k);

    let depth = 0;
    let colon = -1;
    for (let j = 0; j < decl.length; j++) {
        const value = decl[j].kind === TokenKind.Punctuation ? decl[j].value : '';
        if (openers.has(value)) depth++;
        else if (closers.has(value)) depth = Math.max(0, depth - 1);
        else if (depth === 0 && value === ':') {
            colon = j;
            break;
        }
    }

    let nameTokens = colon >= 0 ? decl.slice(0, colon) : decl;
    const type = colon >= 0 ? sliceText(text, decl.slice(colon + 1)) : '';
    if (isPunct(nameTokens[0], '...')) nameTokens = nameTokens.slice(1);
    if (isPunct(nameTokens[nameTokens.length - 1], '?')) nameTokens = nameTokens.slice(0, -1);
    if (nameTokens.length === 0) return undefined;

    const name = nameTokens.length === 1 ? nameTokens[0].value : sliceText(text, nameTokens);
    // `this: Foo` only types the receiver
    if (name === 'this') return undefined;
    return { type, name };
}

// `self: Foo` and `cls` only bind the receiver.
const pythonReceivers = new Set(['self', 'cls']);

function pythonParameter(decl: Token[], text: string): Omit<ParameterRecord, 'hasDefault'> | undefined {
    let prefix = '';
    if (isPunct(decl[0], '*') || isPunct(decl[0], '**')) {
        prefix = decl[0].value;
        decl = decl.slice(1);
    }
    // bare `*` and `/` only mark keyword-only and positional-only parameters
    const first = decl[0];
    if (first === undefined || first.kind !== TokenKind.Identifier) return undefined;
    if (!prefix && pythonReceivers.has(first.value)) return undefined;

    const type = isPunct(decl[1], ':') ? sliceText(text, decl.slice(2)) : '';
    return { type, name: prefix + first.value };
}

/**
 * Go groups names in front of a shared type (`a, b int`). A list is named
 * when any entry starts with a name followed by a type; otherwise every
 * entry is a bare type (`(int, error)`).
 */
function goParameters(parts: readonly Token[][], text: string): ParameterRecord[] {
    const named = parts.some(part => part.length >= 2
        && part[0].kind === TokenKind.Identifier && !isPunct(part[1], '.'));
    if (!named) {
        return parts.filter(part => part.length > 0)
            .map(part => ({ type: sliceText(text, part), name: '', hasDefault: false }));
    }

    const parameters: ParameterRecord[] = [];
    let waiting: string[] = [];
    for (const part of parts) {
        if (part.length === 0) continue;
        if (part.length === 1) {
            waiting.push(part[0].value);
            continue;
        }
        const type = sliceText(text, part.slice(1));
        for (const name of [...waiting, part[0].value]) parameters.push({ type, name, hasDefault: false });
        waiting = [];
    }
    for (const name of waiting) parameters.push({ type: '', name, hasDefault: false });
    return parameters;
}

/**
 * Builds parameter records from the tokens between a signature's
 * parentheses. C-like dialects put the type first (`int a = 0`), script
 * and python dialects annotate the name (`a: number = 0`), and Go lists
 * names before their type.
 */
export function parseParameters(
    tokens: readonly Token[],
    text: string,
    dialect: DialectDescriptor
): ParameterRecord[] {
    const parts = splitParameters(tokens);
    if (dialect.signatureStyle === 'go') return goParameters(parts, text);

    // `f(void)` declares no parameters
    if (parts.length === 1 && parts[0].length === 1 && parts[0][0].value === 'void') {
        return [];
    }

    const parameters: ParameterRecord[] = [];
    for (const part of parts) {
        const eq = defaultIndex(part);
        const hasDefault = eq >= 0;
        const decl = stripAnnotations(eq >= 0 ? part.slice(0, eq) : part, dialect.annotationPrefix);
        if (decl.length === 0) continue;

        if (dialect.signatureStyle === 'python') {
            const parameter = pythonParameter(decl, text);
            if (parameter) parameters.push({ ...parameter, hasDefault });
        } else if (dialect.signatureStyle === 'script') {
            const parameter = annotatedParameter(decl, text);
            if (parameter) parameters.push({ ...parameter, hasDefault });
        } else {
            parameters.push({ ...typedParameter(decl, text), hasDefault });
        }
    }
    return parameters;
}
