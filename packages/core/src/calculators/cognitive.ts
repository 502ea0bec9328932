import { Token, TokenKind, TokenSpan } from '../types';
import { DialectDescriptor, FlowKind } from '../dialects/dialect';
import { getComplexityType, isBooleanOperator, isConditional } from './common';

export interface CognitiveResult {
    cognitive: number;
    nestingDepth: number;
}

interface Block {
    flow: boolean;
    nests: boolean;
    kind?: FlowKind;
}

/**
 * A control-flow keyword waiting for its block:
 *   header  - expects `(` (or the block itself, for `try` and `catch`)
 *   inside  - in the parenthesised header
 *   ready   - the next opener at `parens` is the block
 */
interface PendingFlow {
    kind: FlowKind;
    state: 'header' | 'inside' | 'ready';
    parens: number;
}

// Blocks that count toward nesting depth but add no cognitive nesting.
const flatKinds = new Set<FlowKind>(['TRY', 'FINALLY', 'WITH']);
// Keywords whose header sits in parentheses in brace dialects.
const headedKinds = new Set<FlowKind>(['IF', 'LOOP', 'SWITCH', 'CATCH', 'TRY']);
// `for await (`, `if constexpr (`
const headerWords = new Set(['await', 'constexpr']);

const synthetic = new Set([TokenKind.Newline, TokenKind.Indent, TokenKind.Dedent]);

function isPunct(token: Token | undefined, value: string): boolean {
    return token !== undefined && token.kind === TokenKind.Punctuation && token.value === value;
}

/**
 * Cognitive complexity and maximum nesting depth of one body.
 *
 * Scoring follows the usual structural rules:
 *   if, loops, switch, catch   +1, plus the current nesting
 *   else if, elif, else        +1, no nesting bonus
 *   ternary                    +1
 *   boolean operators          +1 for each run of the same operator
 *
 * Nesting grows inside the blocks of those structures. `try`, `finally` and
 * `with` blocks count toward the nesting depth only.
 */
export function evaluateCognitive(
    tokens: readonly Token[],
    body: TokenSpan,
    dialect: DialectDescriptor,
    nested: readonly TokenSpan[] = []
): CognitiveResult {
    const offside = dialect.offside === true;
    const parenthesized = dialect.signatureStyle === 'c-like' || dialect.signatureStyle === 'script';
    const isOpener = (token: Token) => offside ? token.kind === TokenKind.Indent : isPunct(token, '{');
    const isCloser = (token: Token) => offside ? token.kind === TokenKind.Dedent : isPunct(token, '}');

    const blocks: Block[] = [];
    let nesting = 0;
    let depth = 0;
    let maxDepth = 0;
    let cognitive = 0;
    let parens = 0;
    // last boolean operator of the expression in progress, per bracket level
    const operators: (string | undefined)[] = [undefined];
    let pending: PendingFlow | undefined;
    let afterDo = false;
    let prev: Token | undefined;

    const nextSignificant = (from: number): Token | undefined => {
        let k = from + 1;
        while (k < body.end && tokens[k].kind === TokenKind.Comment) k++;
        return k < body.end ? tokens[k] : undefined;
    };

    const open = (kind?: FlowKind) => {
        const flow = kind !== undefined;
        const nests = kind !== undefined && !flatKinds.has(kind);
        blocks.push({ flow, nests, kind });
        if (flow) maxDepth = Math.max(maxDepth, ++depth);
        if (nests) nesting++;
    };

    const close = () => {
        const block = blocks.pop();
        if (!block) return;
        if (block.flow) depth--;
        if (block.nests) nesting--;
        afterDo = block.kind === 'DO';
    };

    const structure = (kind: FlowKind, i: number) => {
        switch (kind) {
            case 'IF':
                cognitive += prev?.kind === TokenKind.Keyword && prev.value === 'else' ? 1 : 1 + nesting;
                break;
            case 'ELSE_IF':
                cognitive += 1;
                break;
            case 'ELSE': {
                const next = nextSignificant(i);
                // `else if`: the `if` scores and opens the block
                if (next?.kind === TokenKind.Keyword && Object.hasOwn(dialect.flow, next.value)
                    && dialect.flow[next.value] === 'IF') return;
                cognitive += 1;
                break;
            }
            case 'LOOP':
            case 'DO':
            case 'SWITCH':
            case 'CATCH':
                cognitive += 1 + nesting;
                break;
            case 'TRY':
            case 'FINALLY':
            case 'WITH':
                break;
        }
        // a flow keyword inside another's header (a lambda in a condition) scores but keeps the outer header
        if (pending?.state === 'inside') return;
        const state = parenthesized && headedKinds.has(kind) ? 'header' : 'ready';
        pending = { kind, state, parens };
    };

    for (let i = body.start + 1; i < body.end; i++) {
        const inner = nested.find(span => i >= span.start && i < span.end);
        if (inner) {
            i = inner.end - 1;
            continue;
        }
        const token = tokens[i];
        if (token.kind === TokenKind.Comment || token.kind === TokenKind.Directive) continue;
        const lineStart = prev === undefined || synthetic.has(prev.kind);

        // `} while (c);` closes a do-while rather than opening a loop
        const closesDo = afterDo && token.kind === TokenKind.Keyword && token.value === 'while';
        afterDo = false;

        if (pending && parenthesized) {
            if (pending.state === 'header') {
                if (isPunct(token, '(')) pending.state = 'inside';
                else if (!isOpener(token) && !headerWords.has(token.value)) pending = undefined;
            } else if (pending.state === 'ready' && !isOpener(token)) {
                pending = undefined;
            }
        }

        if (isOpener(token)) {
            if (pending && pending.state !== 'inside' && pending.parens === parens) {
                open(pending.kind);
                pending = undefined;
            } else {
                open();
            }
        } else if (isCloser(token)) {
            close();
        } else if (token.kind === TokenKind.Newline) {
            operators[operators.length - 1] = undefined;
            if (pending && nextSignificant(i)?.kind !== TokenKind.Indent) pending = undefined;
        } else if (isPunct(token, '(') || isPunct(token, '[')) {
            parens++;
            operators.push(undefined);
        } else if (isPunct(token, ')') || isPunct(token, ']')) {
            parens = Math.max(0, parens - 1);
            if (operators.length > 1) operators.pop();
            if (pending?.state === 'inside' && parens === pending.parens) pending.state = 'ready';
        } else if (isPunct(token, ';') || isPunct(token, ',')) {
            operators[operators.length - 1] = undefined;
        } else if (token.kind === TokenKind.Keyword && Object.hasOwn(dialect.flow, token.value) && !closesDo) {
            const kind = dialect.flow[token.value];
            if (offside && !lineStart) {
                // `a if c else b` and comprehension filters
                if (kind === 'IF') cognitive++;
            } else {
                structure(kind, i);
            }
        } else if (getComplexityType(token, dialect) === 'TERNARY') {
            if (isConditional(tokens, i, body.end)) cognitive++;
        } else if (isBooleanOperator(tokens, i, dialect)) {
            const level = operators.length - 1;
            if (operators[level] !== token.value) cognitive++;
            operators[level] = token.value;
        }
        prev = token;
    }

    return { cognitive, nestingDepth: maxDepth };
}
