/**
 * Lexer
 * =====
 *
 * Turns source text into a token stream for the structural scanner.
 *
 *   Source → [lexer.ts] → Token[] → [scanner.ts] → DeclarationRecord[]
 *
 * The lexer never fails. Comments, string literals and preprocessor lines are
 * emitted as single opaque tokens so that nothing inside them is ever seen as
 * a keyword or a brace. An unterminated literal or comment is closed at end of
 * input and reported as a lexical diagnostic. A `'` or `"` literal never
 * crosses a line break: it ends at the newline, is reported, and lexing
 * resumes on the next line.
 *
 * STATEMENT ENDS AND INDENTATION
 *   Offside dialects get a Newline token at the end of every logical line
 *   (outside brackets, after any backslash continuation) and Indent/Dedent
 *   tokens where the indentation of the next logical line changes. Dialects
 *   with automatic semicolons get a Newline token wherever a line ends after
 *   an operand or a closer. All three are zero-width.
 *
 * PREPROCESSOR BRANCHES
 *   Only the first branch of an `#if`/`#else` group is lexed. Everything from
 *   `#else` (or `#elif`) to the matching `#endif` becomes one Directive token,
 *   which keeps braces balanced when both branches open the same function.
 *   `#if 0` is the exception: its first branch is the one skipped.
 */

import { Diagnostic, Token, TokenKind } from '../types';
import { DialectDescriptor } from '../dialects/dialect';
import { identifierPart, identifierStart, threeCharOps, twoCharOps } from './rules';

export interface LexResult {
    tokens: Token[];
    diagnostics: Diagnostic[];
}

// Tokens after which a line break ends the statement in dialects with automatic semicolons.
const statementEndingKeywords = new Set(['break', 'continue', 'fallthrough', 'return']);
const statementEndingPunctuation = new Set([')', ']', '}', '++', '--']);

const synthetic = new Set([TokenKind.Newline, TokenKind.Indent, TokenKind.Dedent]);

// End offset of a literal, and whether its closing delimiter was found.
interface Literal {
    end: number;
    closed: boolean;
}

// Tokens after which a `/` starts a regular expression rather than a division.
const regexPrecedingKeywords = new Set([
    'return', 'typeof', 'case', 'do', 'else', 'in', 'of', 'new', 'delete', 'void', 'throw',
    'instanceof', 'yield', 'await'
]);

export function lex(text: string, dialect: DialectDescriptor): LexResult {
    const tokens: Token[] = [];
    const diagnostics: Diagnostic[] = [];
    let i = 0;

    // offsets only ever grow, so line numbers are tracked incrementally
    let lineCursor = 0;
    let lineAtCursor = 1;
    const lineAt = (offset: number): number => {
        while (lineCursor < offset) {
            if (text[lineCursor] === '\n') lineAtCursor++;
            lineCursor++;
        }
        return lineAtCursor;
    };

    const emit = (kind: TokenKind, start: number, end: number) => {
        tokens.push({ kind, value: text.slice(start, end), start, end, line: lineAt(start) });
    };

    // offside state: indentation widths of the open blocks, bracket nesting, and
    // whether the next significant token starts a logical line
    const indents = [0];
    let brackets = 0;
    let lineStart = true;

    const push = (kind: TokenKind, start: number, end = i) => {
        if (dialect.offside && kind !== TokenKind.Comment) {
            if (lineStart) {
                lineStart = false;
                indent(start);
            }
            if (kind === TokenKind.Punctuation) {
                const value = text.slice(start, end);
                if (value === '(' || value === '[' || value === '{') brackets++;
                else if (value === ')' || value === ']' || value === '}') brackets = Math.max(0, brackets - 1);
            }
        }
        emit(kind, start, end);
    };

    const report = (message: string, start: number) => {
        diagnostics.push({ severity: 'warning', category: 'lexical', message, line: lineAt(start) });
    };

    const atLineStart = (pos: number): boolean => {
        for (let j = pos - 1; j >= 0; j--) {
            const c = text[j];
            if (c === '\n') return true;
            if (c !== ' ' && c !== '\t' && c !== '\r') return false;
        }
        return true;
    };

    const columnOf = (pos: number): number => {
        let from = pos;
        while (from > 0 && text[from - 1] !== '\n') from--;
        let column = 0;
        for (let j = from; j < pos; j++) column = text[j] === '\t' ? column + 8 - (column % 8) : column + 1;
        return column;
    };

    const indent = (start: number) => {
        const column = columnOf(start);
        if (column > indents[indents.length - 1]) {
            indents.push(column);
            emit(TokenKind.Indent, start, start);
            return;
        }
        while (column < indents[indents.length - 1]) {
            indents.pop();
            emit(TokenKind.Dedent, start, start);
        }
        if (column !== indents[indents.length - 1]) {
            report('Unindent does not match any outer indentation level', start);
            indents.push(column);
            emit(TokenKind.Indent, start, start);
        }
    };

    const endsStatement = (token: Token | undefined): boolean => {
        if (token === undefined) return false;
        if (dialect.offside) return !synthetic.has(token.kind);
        switch (token.kind) {
            case TokenKind.Identifier:
            case TokenKind.Number:
            case TokenKind.String:
                return true;
            case TokenKind.Keyword:
                return statementEndingKeywords.has(token.value);
            case TokenKind.Punctuation:
                return statementEndingPunctuation.has(token.value);
            default:
                return false;
        }
    };

    const lineBreak = (pos: number) => {
        if (dialect.offside) {
            if (brackets > 0) return;
            if (endsStatement(lastSignificant())) emit(TokenKind.Newline, pos, pos);
            lineStart = true;
        } else if (dialect.automaticSemicolons && endsStatement(lastSignificant())) {
            emit(TokenKind.Newline, pos, pos);
        }
    };

    const lastSignificant = (): Token | undefined => {
        for (let j = tokens.length - 1; j >= 0; j--) {
            if (tokens[j].kind !== TokenKind.Comment) return tokens[j];
        }
        return undefined;
    };

    // --- literal scanners; each returns the end offset, or -1 when input ran out ---

    const untilEnd = (endAt: number): Literal =>
        endAt === -1 ? { end: text.length, closed: false } : { end: endAt, closed: true };

    // single-line literal; an unescaped line break ends it unclosed
    const scanQuoted = (pos: number, quote: string): Literal => {
        let j = pos + 1;
        while (j < text.length) {
            const c = text[j];
            if (c === dialect.escapeChar) {
                j += 2;
                continue;
            }
            if (c === quote) return { end: j + 1, closed: true };
            if (c === '\n' || c === '\r') return { end: j, closed: false };
            j++;
        }
        return { end: text.length, closed: false };
    };

    const scanMultiLine = (pos: number, delimiter: string): number => {
        let j = pos + delimiter.length;
        while (j < text.length) {
            if (text[j] === dialect.escapeChar) {
                j += 2;
            } else if (text.startsWith(delimiter, j)) {
                return j + delimiter.length;
            } else {
                j++;
            }
        }
        return -1;
    };

    const scanVerbatim = (quotePos: number): number => {
        let j = quotePos + 1;
        while (j < text.length) {
            if (text[j] === '"') {
                if (text[j + 1] === '"') {
                    j += 2;
                    continue;
                }
                return j + 1;
            }
            j++;
        }
        return -1;
    };

    const scanBlockComment = (pos: number, open: string, close: string): number => {
        const endAt = text.indexOf(close, pos + open.length);
        return endAt === -1 ? -1 : endAt + close.length;
    };

    const scanTemplate = (pos: number): number => {
        const delimiter = dialect.templateDelimiter;
        let j = pos + 1;
        while (j < text.length) {
            const c = text[j];
            if (c === dialect.escapeChar) {
                j += 2;
            } else if (c === delimiter) {
                return j + 1;
            } else if (c === '$' && text[j + 1] === '{') {
                j = scanInterpolation(j + 2);
                if (j === -1) return -1;
            } else {
                j++;
            }
        }
        return -1;
    };

    // body of `${ ... }`, which may hold strings, templates and braces of its own
    const scanInterpolation = (pos: number): number => {
        let depth = 1;
        let j = pos;
        while (j < text.length) {
            const c = text[j];
            let next = -2;
            if (c === dialect.templateDelimiter) next = scanTemplate(j);
            else if (dialect.stringDelimiters.includes(c)) next = scanQuoted(j, c).end;
            else if (c === '/' && text[j + 1] === '*') next = scanBlockComment(j, '/*', '*/');
            if (next === -1) return -1;
            if (next !== -2) {
                j = next;
                continue;
            }
            if (c === '{') depth++;
            if (c === '}' && --depth === 0) return j + 1;
            j++;
        }
        return -1;
    };

    const scanRawString = (quotePos: number): Literal => {
        const open = text.indexOf('(', quotePos);
        const lineEnd = text.indexOf('\n', quotePos);
        if (open === -1 || (lineEnd !== -1 && open > lineEnd)) return scanQuoted(quotePos, '"');
        const terminator = ')' + text.slice(quotePos + 1, open) + '"';
        const endAt = text.indexOf(terminator, open + 1);
        return untilEnd(endAt === -1 ? -1 : endAt + terminator.length);
    };

    const scanRegex = (pos: number): number => {
        let j = pos + 1;
        let inClass = false;
        while (j < text.length) {
            const c = text[j];
            if (c === '\n' || c === '\r') return -1;
            if (c === '\\') {
                j += 2;
                continue;
            }
            if (c === '[') inClass = true;
            else if (c === ']') inClass = false;
            else if (c === '/' && !inClass) {
                j++;
                while (j < text.length && /[a-z]/.test(text[j])) j++;
                return j;
            }
            j++;
        }
        return -1;
    };

    // --- preprocessor ---

    const scanDirectiveLine = (pos: number): number => {
        let j = pos;
        while (j < text.length) {
            const c = text[j];
            if (c === '\n') {
                const prev = text[j - 1] === '\r' ? text[j - 2] : text[j - 1];
                if (prev === '\\') {
                    j++;
                    continue;
                }
                break;
            }
            if (c === '"' || c === "'") {
                // quoted text never crosses the end of the directive line
                let k = j + 1;
                while (k < text.length && text[k] !== c && text[k] !== '\n') {
                    if (text[k] === '\\') k++;
                    k++;
                }
                j = text[k] === c ? k + 1 : k;
                continue;
            }
            if (c === '/' && text[j + 1] === '/') break;
            if (c === '/' && text[j + 1] === '*') {
                const endAt = scanBlockComment(j, '/*', '*/');
                const lineEnd = text.indexOf('\n', j);
                if (endAt === -1 || (lineEnd !== -1 && endAt > lineEnd)) break;
                j = endAt;
                continue;
            }
            j++;
        }
        return j;
    };

    const directiveName = (pos: number): string => {
        const m = /^#\s*([a-z]+)/.exec(text.slice(pos, pos + 32));
        return m ? m[1] : '';
    };

    /**
     * Skips an inactive branch starting at `pos` (just after a directive line).
     * Returns the offset after the directive that ended the branch. With
     * `stopAtElse`, an `#else`/`#elif` at the same depth ends the branch too.
     */
    const skipBranch = (pos: number, stopAtElse: boolean): number => {
        let depth = 1;
        let j = pos;
        while (j < text.length) {
            const c = text[j];
            if (c === '/' && text[j + 1] === '*') {
                const endAt = scanBlockComment(j, '/*', '*/');
                if (endAt === -1) return text.length;
                j = endAt;
                continue;
            }
            if (c === '/' && text[j + 1] === '/') {
                while (j < text.length && text[j] !== '\n') j++;
                continue;
            }
            if (c === '#' && atLineStart(j)) {
                const name = directiveName(j);
                const lineEnd = scanDirectiveLine(j);
                if (name.startsWith('if')) {
                    depth++;
                } else if (name === 'endif') {
                    if (--depth === 0) return lineEnd;
                } else if (depth === 1 && stopAtElse && (name === 'else' || name.startsWith('elif'))) {
                    return lineEnd;
                }
                j = lineEnd;
                continue;
            }
            j++;
        }
        return text.length;
    };

    const lexDirective = (start: number) => {
        let end = scanDirectiveLine(start);
        const name = directiveName(start);
        if (name === 'else' || name.startsWith('elif')) {
            end = skipBranch(end, false);
        } else if (name === 'if' && /^#\s*if\s+0\b/.test(text.slice(start, end))) {
            end = skipBranch(end, true);
        }
        i = end;
        while (end > start && /\s/.test(text[end - 1])) end--;
        push(TokenKind.Directive, start, end);
    };

    // --- main loop ---

    const closeLiteral = (start: number, literal: Literal, message: string) => {
        if (!literal.closed) report(message, start);
        i = literal.end;
        push(TokenKind.String, start);
    };

    // multi-line, single-line and prefixed string literals starting at `pos`; false when none starts there
    const stringAt = (start: number, pos: number): boolean => {
        const delimiter = dialect.multiLineQuotes?.find(d => text.startsWith(d, pos));
        if (delimiter !== undefined) {
            closeLiteral(start, untilEnd(scanMultiLine(pos, delimiter)), 'Unterminated text block');
            return true;
        }
        if (dialect.stringDelimiters.includes(text[pos])) {
            closeLiteral(start, scanQuoted(pos, text[pos]), 'Unterminated string literal');
            return true;
        }
        return false;
    };

    main: while (i < text.length) {
        const ch = text[i];
        const start = i;

        if (ch === '\n') {
            lineBreak(i);
            i++;
            continue;
        }
        if (/\s/.test(ch)) {
            i++;
            continue;
        }
        // explicit line joining
        if (dialect.offside && ch === '\\' && /^\r?\n/.test(text.slice(i + 1, i + 3))) {
            i = text.indexOf('\n', i) + 1;
            continue;
        }

        for (const marker of dialect.lineComments) {
            if (text.startsWith(marker, i)) {
                while (i < text.length && text[i] !== '\n' && text[i] !== '\r') i++;
                push(TokenKind.Comment, start);
                continue main;
            }
        }

        for (const [open, close] of dialect.blockComments) {
            if (text.startsWith(open, i)) {
                const endAt = scanBlockComment(i, open, close);
                if (endAt === -1) {
                    report('Unterminated block comment', start);
                    i = text.length;
                } else {
                    i = endAt;
                }
                push(TokenKind.Comment, start);
                continue main;
            }
        }

        if (dialect.preprocessor && ch === '#' && atLineStart(i)) {
            lexDirective(start);
            continue;
        }

        // C# verbatim and interpolated strings: @"..", $"..", $@"..", @$".."
        if (dialect.verbatimStringPrefix && (ch === '$' || ch === dialect.verbatimStringPrefix)) {
            let j = i;
            while (j < i + 2 && (text[j] === '$' || text[j] === dialect.verbatimStringPrefix)) j++;
            if (text[j] === '"') {
                const prefix = text.slice(i, j);
                const verbatim = prefix.includes(dialect.verbatimStringPrefix);
                closeLiteral(start, verbatim ? untilEnd(scanVerbatim(j)) : scanQuoted(j, '"'), 'Unterminated string literal');
                continue;
            }
            if (ch === dialect.verbatimStringPrefix && identifierStart.test(text[i + 1] ?? '')) {
                // @class is an identifier that happens to be spelled like a keyword
                i++;
                while (i < text.length && identifierPart.test(text[i])) i++;
                push(TokenKind.Identifier, start);
                continue;
            }
        }

        if (dialect.templateDelimiter && ch === dialect.templateDelimiter) {
            closeLiteral(start, untilEnd(scanTemplate(i)), 'Unterminated template literal');
            continue;
        }

        if (dialect.rawQuote && ch === dialect.rawQuote) {
            const endAt = text.indexOf(dialect.rawQuote, i + 1);
            closeLiteral(start, untilEnd(endAt === -1 ? -1 : endAt + 1), 'Unterminated raw string literal');
            continue;
        }

        if (stringAt(start, i)) continue;

        if (/\d/.test(ch) || (ch === '.' && /\d/.test(text[i + 1] ?? ''))) {
            const hex = ch === '0' && (text[i + 1] === 'x' || text[i + 1] === 'X');
            i++;
            while (i < text.length) {
                const c = text[i];
                if (/[0-9A-Za-z_.]/.test(c)) {
                    i++;
                } else if ((c === '+' || c === '-') && (hex ? /[pP]/ : /[eEpP]/).test(text[i - 1])) {
                    i++;
                } else if (c === dialect.digitSeparator && /[0-9A-Za-z]/.test(text[i + 1] ?? '')) {
                    i++;
                } else {
                    break;
                }
            }
            push(TokenKind.Number, start);
            continue;
        }

        if (identifierStart.test(ch)) {
            while (i < text.length && identifierPart.test(text[i])) i++;
            const word = text.slice(start, i);
            if (text[i] === '"' && dialect.rawStringPrefixes?.has(word)) {
                closeLiteral(start, scanRawString(i), 'Unterminated raw string literal');
                continue;
            }
            if (dialect.stringPrefixes?.has(word.toLowerCase()) && stringAt(start, i)) continue;
            push(dialect.keywords.has(word) ? TokenKind.Keyword : TokenKind.Identifier, start);
            continue;
        }

        if (ch === '/' && dialect.regexLiterals) {
            const prev = lastSignificant();
            const startsRegex = !prev
                || (prev.kind === TokenKind.Punctuation && ![')', ']', '}'].includes(prev.value))
                || (prev.kind === TokenKind.Keyword && regexPrecedingKeywords.has(prev.value));
            if (startsRegex) {
                const endAt = scanRegex(i);
                if (endAt !== -1) {
                    i = endAt;
                    push(TokenKind.String, start);
                    continue;
                }
            }
        }

        const three = text.slice(i, i + 3);
        if (threeCharOps.has(three)) {
            i += 3;
            push(TokenKind.Punctuation, start);
            continue;
        }
        const two = text.slice(i, i + 2);
        // `a?.5:1` is a ternary followed by a number, not optional chaining
        if (twoCharOps.has(two) && !(two === '?.' && /\d/.test(text[i + 2] ?? ''))) {
            i += 2;
            push(TokenKind.Punctuation, start);
            continue;
        }

        i++;
        push(TokenKind.Punctuation, start);
    }

    if (dialect.offside || dialect.automaticSemicolons) {
        if (endsStatement(lastSignificant())) emit(TokenKind.Newline, text.length, text.length);
        while (indents.length > 1) {
            indents.pop();
            emit(TokenKind.Dedent, text.length, text.length);
        }
    }
    emit(TokenKind.EOF, text.length, text.length);
    return { tokens, diagnostics };
}
