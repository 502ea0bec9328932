import { Token, TokenKind } from '../types';
import { ComplexityNodeType, DialectDescriptor } from '../dialects/dialect';

// `?` directly followed by one of these is an optional marker or a nullable type, not a conditional.
const notTernaryFollowers = new Set([':', ')', ',', '=', ';', '>', ']', '.']);

// Keywords that end an expression rather than a type, so `return a && b` stays a condition.
const expressionKeywords = new Set([
    'return', 'co_return', 'co_yield', 'throw', 'case', 'sizeof', 'this', 'true', 'false', 'nullptr',
    'new', 'delete', 'else', 'do', 'not', 'and', 'or'
]);

// What may follow the declared name: `= init`, `;`, `, next`, `)` of a parameter, `:` of a range-for.
const declaratorFollowers = new Set(['=', ';', ',', ')', ':', '{', '[']);

// Tokens that may directly precede a declaration's type.
const statementStarts = new Set(['::', ';', '{', '}']);

export function getComplexityType(token: Token, dialect: DialectDescriptor): ComplexityNodeType | undefined {
    if (token.kind !== TokenKind.Keyword && token.kind !== TokenKind.Punctuation) return undefined;
    return Object.hasOwn(dialect.decisions, token.value) ? dialect.decisions[token.value] : undefined;
}

function significant(tokens: readonly Token[], from: number, step: 1 | -1): number {
    let k = from;
    while (tokens[k]?.kind === TokenKind.Comment) k += step;
    return k;
}

/**
 * A `?` opens a conditional only when a matching `:` follows at the same
 * bracket depth before the expression ends.
 */
export function isConditional(tokens: readonly Token[], at: number, end: number): boolean {
    let k = at + 1;
    while (k < end && tokens[k].kind === TokenKind.Comment) k++;
    const next = tokens[k];
    if (next === undefined || (next.kind === TokenKind.Punctuation && notTernaryFollowers.has(next.value))) {
        return false;
    }

    let depth = 0;
    let open = 1;
    for (; k < end; k++) {
        const token = tokens[k];
        if (token.kind !== TokenKind.Punctuation) continue;
        switch (token.value) {
            case '(':
            case '[':
            case '{':
                depth++;
                break;
            case ')':
            case ']':
            case '}':
                if (depth === 0) return false;
                depth--;
                break;
            case ';':
            case ',':
                if (depth === 0) return false;
                break;
            case '?':
                if (depth === 0) open++;
                break;
            case ':':
                if (depth === 0 && --open === 0) return true;
                break;
        }
    }
    return false;
}

/**
 * `auto&& r = g()`, `std::string&& s = ...`, `for (auto&& x : xs)`: the `&&`
 * at `at` declares an rvalue reference. The type before it ends in a type
 * keyword, a `>`, or a name that starts the statement or follows `::`.
 */
export function isReferenceDeclarator(tokens: readonly Token[], at: number): boolean {
    const prevAt = significant(tokens, at - 1, -1);
    const prev = tokens[prevAt];
    const nextAt = significant(tokens, at + 1, 1);
    const next = tokens[nextAt];
    const after = tokens[significant(tokens, nextAt + 1, 1)];
    if (prev === undefined || next?.kind !== TokenKind.Identifier) return false;
    if (after?.kind !== TokenKind.Punctuation || !declaratorFollowers.has(after.value)) return false;

    if (prev.kind === TokenKind.Punctuation) return prev.value === '>';
    if (prev.kind === TokenKind.Keyword) return !expressionKeywords.has(prev.value);
    if (prev.kind !== TokenKind.Identifier) return false;
    const before = tokens[significant(tokens, prevAt - 1, -1)];
    return before === undefined || (before.kind === TokenKind.Punctuation && statementStarts.has(before.value));
}

/** A `&&`/`||`/`and`/`or` that joins conditions. */
export function isBooleanOperator(tokens: readonly Token[], at: number, dialect: DialectDescriptor): boolean {
    if (getComplexityType(tokens[at], dialect) !== 'BINARY') return false;
    return !(dialect.rvalueReferences && tokens[at].value === '&&' && isReferenceDeclarator(tokens, at));
}
