import { LineCounts, Token, TokenKind } from './types';
import { todoMarkers } from './lexer/rules';

function physicalLines(text: string): number {
    if (text.length === 0) return 0;
    const breaks = text.split('\n').length - 1;
    return text.endsWith('\n') ? breaks : breaks + 1;
}

/**
 * Classifies every physical line as code, comment or blank. A line holding
 * any non-comment token is code; a line touched only by comments is a
 * comment line.
 */
export function countLines(text: string, tokens: readonly Token[]): LineCounts {
    const total = physicalLines(text);
    const code = new Set<number>();
    const comment = new Set<number>();

    for (const token of tokens) {
        // EOF, Newline, Indent and Dedent are zero-width
        if (token.start === token.end) continue;
        const last = Math.min(total, token.line + (token.value.match(/\n/g)?.length ?? 0));
        const target = token.kind === TokenKind.Comment ? comment : code;
        for (let line = token.line; line <= last; line++) target.add(line);
    }

    let commentOnly = 0;
    for (const line of comment) {
        if (!code.has(line)) commentOnly++;
    }

    return {
        total,
        code: code.size,
        comment: commentOnly,
        blank: Math.max(0, total - code.size - commentOnly)
    };
}

export function countTodos(tokens: readonly Token[]): number {
    let count = 0;
    for (const token of tokens) {
        if (token.kind === TokenKind.Comment) count += token.value.match(todoMarkers)?.length ?? 0;
    }
    return count;
}
