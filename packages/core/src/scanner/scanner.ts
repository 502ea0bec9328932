/**
 * Structural scanner
 * ==================
 *
 * One pass over the token stream with a stack of brace scopes:
 *
 *   file → namespace → type → body → block
 *
 * Declarations are only recognised in file, namespace and type scopes (and,
 * for dialects with nested functions, `function` statements inside bodies).
 * Everything inside a function body is otherwise just brace counting, which
 * keeps lambdas, initializer lists and local blocks from being mistaken for
 * declarations.
 *
 * Indent and Dedent tokens open and close scopes exactly like braces, and a
 * Newline token ends a statement like `;`, so indentation-scoped dialects
 * share the same pass.
 *
 * The scanner never fails. A stray `}` or a scope left open at end of input
 * becomes a structural diagnostic and the pass carries on.
 */

import {
    DeclarationKind,
    DeclarationRecord,
    Diagnostic,
    IncludeRecord,
    ParameterRecord,
    Token,
    TokenKind
} from '../types';
import { DialectDescriptor } from '../dialects/dialect';
import {
    SignatureMatch,
    StatementShape,
    Terminator,
    classifyCLike,
    classifyGo,
    classifyPython,
    classifyScript,
    isPunct,
    matchForward,
    matchPythonHeader,
    withoutAnnotations
} from './signature';

type ScopeKind = 'file' | 'namespace' | 'type' | 'body' | 'block';

interface Scope {
    kind: ScopeKind;
    open: number;
    typeName?: string;
    record?: number;
    // paren depth of the enclosing statement, restored when the scope closes
    depth: number;
    // statement tokens restored when the scope closes (grouped `type ( ... )` members)
    resume?: number[];
}

interface Statement {
    tokens: Token[];
    indices: number[];
}

interface Classified {
    kind: DeclarationKind;
    name: string;
    owner?: string;
    isConstructor: boolean;
}

export interface ScanResult {
    declarations: DeclarationRecord[];
    includes: IncludeRecord[];
    diagnostics: Diagnostic[];
}

// Tokens after which a return annotation's type continues, so a `{` opens a type literal.
const typeContinuations = new Set([':', '|', '&', '<', ',']);

const synthetic = new Set([TokenKind.Newline, TokenKind.Indent, TokenKind.Dedent]);

const scopeNames: Record<ScopeKind, string> = {
    file: 'file',
    namespace: 'namespace',
    type: 'type body',
    body: 'function body',
    block: 'block'
};

export class StructuralScanner {
    private readonly declarations: DeclarationRecord[] = [];
    private readonly includes: IncludeRecord[] = [];
    private readonly diagnostics: Diagnostic[] = [];
    private readonly knownTypes = new Set<string>();
    // records whose owner is a receiver type that may be declared later in the file
    private readonly receivers: number[] = [];
    private readonly scopes: Scope[] = [{ kind: 'file', open: -1, depth: 0 }];

    private pending: number[] = [];
    private depth = 0;
    private importBraces = 0;
    private anonymous = 0;

    constructor(
        private readonly text: string,
        private readonly tokens: readonly Token[],
        private readonly dialect: DialectDescriptor
    ) { }

    scan(): ScanResult {
        let end = this.tokens.length;
        for (let i = 0; i < this.tokens.length; i++) {
            const token = this.tokens[i];
            if (token.kind === TokenKind.EOF) {
                end = i;
                break;
            }
            if (token.kind === TokenKind.Comment) continue;
            if (token.kind === TokenKind.Directive) {
                this.directive(token);
                continue;
            }
            i = this.tracksStatements() ? this.statementToken(i) : this.braceToken(i);
        }
        this.closeRemaining(end);
        this.resolveReceivers();

        return {
            declarations: this.declarations,
            includes: this.includes,
            diagnostics: this.diagnostics
        };
    }

    private get scope(): Scope {
        return this.scopes[this.scopes.length - 1];
    }

    private tracksStatements(): boolean {
        const kind = this.scope.kind;
        return kind === 'file' || kind === 'namespace' || kind === 'type' || this.dialect.nestedFunctions;
    }

    private warn(message: string, line: number) {
        this.diagnostics.push({ severity: 'warning', category: 'structural', message, line });
    }

    private braceToken(i: number): number {
        const token = this.tokens[i];
        if (isPunct(token, '{') || token.kind === TokenKind.Indent) this.openScope({ kind: 'block', open: i, depth: this.depth });
        else if (isPunct(token, '}') || token.kind === TokenKind.Dedent) this.closeScope(i);
        return i;
    }

    private statementToken(i: number): number {
        const token = this.tokens[i];
        switch (token.kind) {
            case TokenKind.Indent:
                return this.openBrace(i);
            case TokenKind.Dedent:
                this.closeScope(i);
                return i;
            case TokenKind.Newline:
                // members of `import ( ... )` and `type ( ... )` groups
                if (this.depth > 0) this.pending.push(i);
                else if (!this.headerAwaitsBlock(i)) this.endStatement(i);
                return i;
        }
        if (token.kind === TokenKind.Punctuation) {
            switch (token.value) {
                case '(':
                case '[':
                    this.depth++;
                    break;
                case ')':
                case ']':
                    this.depth = Math.max(0, this.depth - 1);
                    break;
                case '{':
                    return this.openBrace(i);
                case '}':
                    if (this.importBraces > 0) {
                        this.importBraces--;
                        break;
                    }
                    this.closeScope(i);
                    return i;
                case ';':
                    if (this.depth === 0) {
                        this.endStatement(i);
                        return i;
                    }
                    break;
                case ':':
                    if (this.scope.kind === 'type' && this.endsWithAccessLabel()) {
                        this.pending = [];
                        return i;
                    }
                    break;
            }
        } else if (token.kind === TokenKind.String && (this.moduleSpecifier(i) || this.quotedInclude(i))) {
            return i;
        }
        this.pending.push(i);
        return i;
    }

    private endsWithAccessLabel(): boolean {
        const last = this.pending[this.pending.length - 1];
        return last !== undefined && this.dialect.accessLabels.has(this.tokens[last].value);
    }

    // `def f():` NEWLINE INDENT: the header's statement carries on into the block
    private headerAwaitsBlock(i: number): boolean {
        let k = i + 1;
        while (this.tokens[k]?.kind === TokenKind.Comment) k++;
        return this.tokens[k]?.kind === TokenKind.Indent;
    }

    private statement(): Statement {
        const tokens = this.pending.map(index => this.tokens[index]);
        const kept = withoutAnnotations(tokens, this.dialect);
        return {
            tokens: kept.map(k => tokens[k]),
            indices: kept.map(k => this.pending[k])
        };
    }

    private classify(statement: Statement, terminator: Terminator): StatementShape {
        const kind = this.scope.kind;
        switch (this.dialect.signatureStyle) {
            case 'script': {
                const functionsOnly = kind === 'body' || kind === 'block';
                return classifyScript(statement.tokens, this.text, this.dialect, kind === 'type', functionsOnly);
            }
            case 'go':
                return classifyGo(statement.tokens, this.text, this.dialect);
            case 'python':
                return classifyPython(statement.tokens, this.text, this.dialect);
            case 'c-like':
                return classifyCLike(statement.tokens, this.text, this.dialect, terminator);
        }
    }

    /** Adds the balanced braces opened at `i` to the statement; the index of the `}`, or -1. */
    private consumeBraces(i: number): number {
        const close = matchForward(this.tokens, i);
        if (close < 0) return -1;
        for (let k = i; k <= close; k++) {
            const kind = this.tokens[k].kind;
            if (kind !== TokenKind.Comment && kind !== TokenKind.Directive && !synthetic.has(kind)) this.pending.push(k);
        }
        return close;
    }

    // `f({ a }: Props)`, `g({ x: 1 })`: a pattern or literal inside a declaration's parentheses
    private bracedArgument(): boolean {
        const kind = this.scope.kind;
        if (kind === 'body' || kind === 'block') return false;
        const last = this.pending[this.pending.length - 1];
        if (last === undefined) return false;
        // bodies of lambdas and callbacks stay scopes
        const before = this.tokens[last];
        return !isPunct(before, '=>') && !isPunct(before, ')');
    }

    // `f(): { a: number } {`, `f(): Promise<{ ok: boolean }> {`
    private inReturnType(): boolean {
        if (this.dialect.signatureStyle !== 'script') return false;
        const tokens = this.pending.map(index => this.tokens[index]);
        const last = tokens[tokens.length - 1];
        if (last === undefined || last.kind !== TokenKind.Punctuation || !typeContinuations.has(last.value)) return false;
        if (tokens[0].value === 'case' || tokens[0].value === 'default') return false;
        let depth = 0;
        for (let k = 0; k < tokens.length - 1; k++) {
            if (isPunct(tokens[k], '(') || isPunct(tokens[k], '[')) depth++;
            else if (isPunct(tokens[k], ']')) depth = Math.max(0, depth - 1);
            else if (isPunct(tokens[k], ')') && --depth <= 0 && isPunct(tokens[k + 1], ':')) return true;
        }
        return false;
    }

    // position in the statement where the current member of `type ( ... )` begins, or -1
    private groupMember(statement: Statement): number {
        if (this.dialect.signatureStyle !== 'go' || statement.tokens[0]?.value !== 'type') return -1;
        let member = -1;
        statement.tokens.forEach((token, k) => {
            if (isPunct(token, '(') && k === 1) member = 2;
            else if (token.kind === TokenKind.Newline || isPunct(token, ';')) member = k + 1;
        });
        return member;
    }

    private openBrace(i: number): number {
        const brace = isPunct(this.tokens[i], '{');
        if (this.isImportClause()) {
            this.importBraces++;
            this.pending.push(i);
            return i;
        }
        if (this.depth > 0) {
            const statement = this.statement();
            const member = this.groupMember(statement);
            if (member > 0) return this.openGroupMember(statement, member, i);
            if (brace && this.bracedArgument()) {
                const close = this.consumeBraces(i);
                if (close >= 0) return close;
            }
            this.openScope({ kind: 'block', open: i, depth: this.depth });
            return i;
        }
        if (brace && this.inReturnType()) {
            const close = this.consumeBraces(i);
            if (close >= 0) return close;
        }

        const statement = this.statement();
        const shape = this.classify(statement, '{');

        // `Ctor() : member{value}, other(1) {` - braces inside a member initializer list
        if (this.dialect.signatureStyle === 'c-like' && shape.kind === 'signature'
            && isPunct(shape.match.trailer[0], ':') && this.followsInitializer()) {
            const close = this.consumeBraces(i);
            if (close >= 0) return close;
        }

        switch (shape.kind) {
            case 'type': {
                const { match } = shape;
                const name = match.name ?? `<anonymous ${match.keyword} #${++this.anonymous}>`;
                const record = this.addRecord(match.kind, name, undefined, [], statement.indices[match.start], i, false);
                this.knownTypes.add(name);
                this.openScope({ kind: 'type', open: i, typeName: name, record, depth: 0 });
                break;
            }
            case 'namespace':
                this.openScope({ kind: 'namespace', open: i, depth: 0 });
                break;
            case 'signature': {
                const classified = this.classifySignature(shape.match);
                if (classified) {
                    const { match } = shape;
                    const record = this.addRecord(
                        classified.kind, classified.name, classified.owner, match.parameters,
                        statement.indices[match.start], i, classified.isConstructor
                    );
                    this.openScope({ kind: 'body', open: i, record, depth: 0 });
                } else {
                    this.warn(`Unrecognized declaration '${shape.match.name}'`, this.tokens[i].line);
                    this.openScope({ kind: 'block', open: i, depth: 0 });
                }
                break;
            }
            case 'block': {
                // module-level `if`/`try` blocks still hold module-level declarations
                const transparent = !brace && (this.scope.kind === 'file' || this.scope.kind === 'namespace');
                this.openScope({ kind: transparent ? 'namespace' : 'block', open: i, depth: 0 });
                break;
            }
        }
        return i;
    }

    private openGroupMember(statement: Statement, member: number, i: number): number {
        const shape = classifyGo(statement.tokens, this.text, this.dialect, member);
        const resume = this.pending.slice(0, this.pending.indexOf(statement.indices[member]));
        if (shape.kind !== 'type' || shape.match.name === undefined) {
            this.openScope({ kind: 'block', open: i, depth: this.depth, resume });
            return i;
        }
        const name = shape.match.name;
        const record = this.addRecord(shape.match.kind, name, undefined, [], statement.indices[member], i, false);
        this.knownTypes.add(name);
        this.openScope({ kind: 'type', open: i, typeName: name, record, depth: this.depth, resume });
        return i;
    }

    private followsInitializer(): boolean {
        const last = this.pending[this.pending.length - 1];
        if (last === undefined) return false;
        const token = this.tokens[last];
        return token.kind === TokenKind.Identifier || isPunct(token, '>');
    }

    /** Decides between method and function, or undefined when the signature is not a declaration. */
    private classifySignature(match: SignatureMatch): Classified | undefined {
        const scope = this.scope;
        const needsReturnType = this.dialect.signatureStyle === 'c-like' && !match.isOperator;
        const name = match.name || `<anonymous function #${++this.anonymous}>`;

        // receiver types are resolved once the whole file is seen
        if (this.dialect.signatureStyle === 'go' && match.qualifier !== undefined) {
            return { kind: 'Method', name, owner: match.qualifier, isConstructor: false };
        }
        if (match.qualifier !== undefined) {
            const owner = match.qualifier;
            const isConstructor = !match.hasReturnType && name === owner;
            if (needsReturnType && !match.hasReturnType && !isConstructor && name !== `~${owner}`) {
                return undefined;
            }
            return this.knownTypes.has(owner)
                ? { kind: 'Method', name, owner, isConstructor }
                : { kind: 'Function', name: `${owner}::${name}`, isConstructor: false };
        }

        if (scope.kind === 'type' && scope.typeName !== undefined) {
            const isConstructor = this.dialect.constructorName !== undefined
                ? name === this.dialect.constructorName
                : name === scope.typeName && !match.hasReturnType;
            if (needsReturnType && !match.hasReturnType && !isConstructor && !match.isDestructor) {
                return undefined;
            }
            return { kind: 'Method', name, owner: scope.typeName, isConstructor };
        }

        if (needsReturnType && !match.hasReturnType) return undefined;
        return { kind: 'Function', name, isConstructor: false };
    }

    private addRecord(
        kind: DeclarationKind,
        name: string,
        owner: string | undefined,
        parameters: ParameterRecord[],
        start: number,
        open: number,
        isConstructor: boolean
    ): number {
        const record: DeclarationRecord = {
            kind,
            name,
            parameters,
            span: { start, end: open + 1 },
            body: { start: open, end: open + 1 },
            startLine: this.tokens[start].line,
            endLine: this.tokens[open].line,
            isConstructor
        };
        if (owner !== undefined) record.owner = owner;
        this.declarations.push(record);
        if (owner !== undefined && this.dialect.signatureStyle === 'go' && kind === 'Method') {
            this.receivers.push(this.declarations.length - 1);
        }
        return this.declarations.length - 1;
    }

    // a declaration whose body ends on the statement's own terminator at `close`
    private addClosedRecord(classified: Classified, parameters: ParameterRecord[], start: number, open: number, close: number) {
        const index = this.addRecord(
            classified.kind, classified.name, classified.owner, parameters, start, open, classified.isConstructor
        );
        const record = this.declarations[index];
        record.span.end = close + 1;
        record.body.end = close + 1;
        record.endLine = this.tokens[close].line;
    }

    // `func (c *Calculator) Add()` before or without `type Calculator struct`
    private resolveReceivers() {
        for (const index of this.receivers) {
            const record = this.declarations[index];
            if (record.owner === undefined || this.knownTypes.has(record.owner)) continue;
            record.kind = 'Function';
            record.name = `${record.owner}::${record.name}`;
            delete record.owner;
        }
    }

    private openScope(scope: Scope) {
        this.scopes.push(scope);
        this.pending = [];
        this.depth = 0;
        this.importBraces = 0;
    }

    private closeScope(i: number) {
        if (this.scopes.length === 1) {
            this.warn('Unmatched closing brace', this.tokens[i].line);
            this.pending = [];
            this.depth = 0;
            return;
        }
        const scope = this.scopes.pop();
        if (scope) this.finishScope(scope, i + 1, this.closingLine(i));
    }

    // a Dedent sits on the next statement's line; the block ended on the last token before it
    private closingLine(i: number): number {
        if (this.tokens[i].kind !== TokenKind.Dedent) return this.tokens[i].line;
        for (let k = i - 1; k >= 0; k--) {
            const kind = this.tokens[k].kind;
            if (kind !== TokenKind.Comment && !synthetic.has(kind)) return this.tokens[k].line;
        }
        return this.tokens[i].line;
    }

    private finishScope(scope: Scope, end: number, endLine: number) {
        if (scope.record !== undefined) {
            const record = this.declarations[scope.record];
            record.span.end = end;
            record.body.end = end;
            record.endLine = endLine;
        }
        this.pending = scope.resume ?? [];
        this.depth = scope.depth;
        this.importBraces = 0;
    }

    private closeRemaining(end: number) {
        const endLine = this.tokens[end]?.line ?? this.tokens[this.tokens.length - 1]?.line ?? 1;
        while (this.scopes.length > 1) {
            const scope = this.scopes.pop();
            if (!scope) break;
            this.warn(
                `Unclosed ${scopeNames[scope.kind]} opened on line ${this.tokens[scope.open].line}`,
                endLine
            );
            this.finishScope(scope, end, endLine);
        }
    }

    private endStatement(i: number) {
        const kind = this.scope.kind;
        if (kind !== 'body' && kind !== 'block' && !this.statementInclude()) {
            this.declarationStatement(i);
        }
        this.pending = [];
    }

    /**
     * Declarations ended by the statement terminator at `i`: C# expression
     * bodies (`int F() => x;`), positional records, one-line python
     * definitions and, where the dialect records them, prototypes.
     */
    private declarationStatement(i: number) {
        const statement = this.statement();
        if (statement.tokens.length === 0) return;
        if (this.dialect.signatureStyle === 'python') {
            this.inlineDefinition(statement, i);
            return;
        }

        const shape = this.classify(statement, ';');
        if (shape.kind === 'type' && shape.match.keyword === 'record' && shape.match.name !== undefined) {
            const name = shape.match.name;
            this.knownTypes.add(name);
            this.addClosedRecord(
                { kind: shape.match.kind, name, isConstructor: false }, [], statement.indices[shape.match.start], i, i
            );
            return;
        }
        if (shape.kind !== 'signature') return;

        const { match } = shape;
        const arrow = this.dialect.signatureStyle === 'c-like' ? match.trailer.findIndex(t => isPunct(t, '=>')) : -1;
        if (arrow < 0 && !this.dialect.declarationsWithoutBody) return;
        const classified = this.classifySignature(match);
        if (!classified) {
            if (arrow >= 0) this.warn(`Unrecognized declaration '${match.name}'`, this.tokens[i].line);
            return;
        }
        const open = arrow >= 0 ? statement.indices[statement.tokens.length - match.trailer.length + arrow] : i;
        this.addClosedRecord(classified, match.parameters, statement.indices[match.start], open, i);
    }

    // `def f(self): return 1` and `class Empty: pass`
    private inlineDefinition(statement: Statement, i: number) {
        const header = matchPythonHeader(statement.tokens, this.text, this.dialect);
        if (!header || header.colon === statement.tokens.length - 1) return;
        const open = statement.indices[header.colon];
        const { shape } = header;
        if (shape.kind === 'type' && shape.match.name !== undefined) {
            this.knownTypes.add(shape.match.name);
            this.addClosedRecord(
                { kind: shape.match.kind, name: shape.match.name, isConstructor: false }, [], statement.indices[0], open, i
            );
        } else if (shape.kind === 'signature') {
            const classified = this.classifySignature(shape.match);
            if (classified) this.addClosedRecord(classified, shape.match.parameters, statement.indices[0], open, i);
        }
    }

    /** Records an include statement at file or namespace scope; true when the statement was one. */
    private statementInclude(): boolean {
        const kind = this.scope.kind;
        if (kind !== 'file' && kind !== 'namespace') return false;
        const rule = this.dialect.include;
        const tokens = this.pending.map(index => this.tokens[index]);
        if (rule.style === 'import-from') return this.importFromInclude(tokens);
        if (rule.style !== 'statement') return false;

        const { keywords, skip } = rule;
        let k = 0;
        while (k < tokens.length && skip.has(tokens[k].value)) k++;
        if (k >= tokens.length || !keywords.has(tokens[k].value)) return false;

        let parts = tokens.slice(k + 1).filter(t => !skip.has(t.value));
        // `using Json = Newtonsoft.Json;`
        const alias = parts.findIndex(t => isPunct(t, '='));
        if (alias >= 0) parts = parts.slice(alias + 1);

        const path = parts.map(t => t.value).join('');
        if (path) this.includes.push({ path, line: tokens[k].line });
        return true;
    }

    // `import a.b as c, d` gives `a.b` and `d`; `from ..pkg import x` gives `..pkg`
    private importFromInclude(tokens: readonly Token[]): boolean {
        const first = tokens[0];
        if (first?.kind !== TokenKind.Keyword) return false;
        if (first.value === 'from') {
            const end = tokens.findIndex(t => t.value === 'import' && t.kind === TokenKind.Keyword);
            const path = tokens.slice(1, end < 0 ? tokens.length : end).map(t => t.value).join('');
            if (path) this.includes.push({ path, line: first.line });
            return true;
        }
        if (first.value !== 'import') return false;
        let module: Token[] = [];
        const flush = () => {
            const path = module.map(t => t.value).join('');
            if (path) this.includes.push({ path, line: first.line });
            module = [];
        };
        let aliased = false;
        for (const token of tokens.slice(1)) {
            if (isPunct(token, ',')) {
                flush();
                aliased = false;
            } else if (token.value === 'as') {
                aliased = true;
            } else if (!aliased && !isPunct(token, '(') && !isPunct(token, ')')) {
                module.push(token);
            }
        }
        flush();
        return true;
    }

    /** `import "fmt"` and each path of `import ( ... )`; the statement goes on. */
    private quotedInclude(i: number): boolean {
        const rule = this.dialect.include;
        const first = this.pending[0];
        if (rule.style !== 'quoted' || this.scope.kind !== 'file' || first === undefined) return false;
        if (!rule.keywords.has(this.tokens[first].value)) return false;
        const token = this.tokens[i];
        this.includes.push({ path: token.value.slice(1, -1), line: token.line });
        return false;
    }

    private directive(token: Token) {
        const rule = this.dialect.include;
        if (rule.style !== 'preprocessor') return;
        const match = rule.pattern.exec(token.value);
        if (match?.[1] !== undefined) this.includes.push({ path: match[1], line: token.line });
    }

    private isImportClause(): boolean {
        if (this.dialect.include.style !== 'module' || this.pending.length === 0) return false;
        const first = this.tokens[this.pending[0]].value;
        if (first === 'import') return true;
        return first === 'export' && this.pending.every(index => ['export', 'type'].includes(this.tokens[index].value));
    }

    /** Records `import ... from 'x'`, `export ... from 'x'` and `require('x')`; true when the statement ends here. */
    private moduleSpecifier(i: number): boolean {
        const kind = this.scope.kind;
        if (this.dialect.include.style !== 'module' || (kind !== 'file' && kind !== 'namespace')) return false;

        const token = this.tokens[i];
        const at = (offset: number) => {
            const index = this.pending[this.pending.length - offset];
            return index === undefined ? undefined : this.tokens[index];
        };
        const first = this.pending.length > 0 ? this.tokens[this.pending[0]].value : '';
        const path = token.value.slice(1, -1);

        if (isPunct(at(1), '(') && at(2)?.value === 'require') {
            this.includes.push({ path, line: token.line });
            return false;
        }
        const fromClause = at(1)?.value === 'from' && (first === 'import' || first === 'export');
        const bareImport = first === 'import' && this.pending.length === 1;
        if (fromClause || bareImport) {
            this.includes.push({ path, line: token.line });
            this.pending = [];
            this.depth = 0;
            return true;
        }
        return false;
    }
}

export function scan(text: string, tokens: readonly Token[], dialect: DialectDescriptor): ScanResult {
    return new StructuralScanner(text, tokens, dialect).scan();
}
