import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";

const code = `
import { readFile } from 'fs';
import * as path from "path";
import './polyfill';
export { helper } from './helper';
const legacy = require('legacy');

@Injectable()
export class Service extends Base {
    private cache = new Map<string, number>();
    handler = (e: Event) => { if (e) {} };

    constructor(private readonly repo: Repo, name?: string) {
        super();
    }

    async load(id: string, retries = 3): Promise<number> {
        return id ? 1 : 0;
    }

    get size(): number { return this.cache.size; }
}

export default function (a: number) { return a; }

function outer(x: number) {
    function inner(y: number) {
        return y > 0 && x > 0;
    }
    const cb = function () { if (x) return; };
    return inner(x) || x;
}
`;

describe("TypeScript", () => {
    const { report, diagnostics } = analyzeSource(code, 'ts');

    test("collects module specifiers", () => {
        expect(report.language).toBe('typescript');
        expect(report.includes.map(i => i.path)).toEqual(['fs', 'path', './polyfill', './helper', 'legacy']);
    });

    test("recognises classes, members and functions", () => {
        expect(report.declarations.map(d => d.key)).toEqual([
            'Service',
            'Service::constructor/2',
            'Service::load/2',
            'Service::size/0',
            '<anonymous function #1>/1',
            'outer/1',
            'inner/1'
        ]);
        expect(report.declarations[1].isConstructor).toBe(true);
        expect(diagnostics).toEqual([]);
    });

    test("reads annotated parameters", () => {
        expect(report.declarations[1].parameters).toEqual([
            { type: 'Repo', name: 'repo', hasDefault: false },
            { type: 'string', name: 'name', hasDefault: false }
        ]);
        expect(report.declarations[2].parameters).toEqual([
            { type: 'string', name: 'id', hasDefault: false },
            { type: '', name: 'retries', hasDefault: true }
        ]);
    });

    test("scores each function on its own body", () => {
        expect(report.complexity['Service::load/2'].cyclomatic).toBe(2);
        expect(report.complexity['inner/1'].cyclomatic).toBe(2);
        // the function expression's if and the ||
        expect(report.complexity['outer/1'].cyclomatic).toBe(3);
    });
});

describe("TypeScript edge cases", () => {
    test("an apostrophe in JSX text does not swallow the following declarations", () => {
        const code = [
            'function A() {',
            "    return <p>Don't</p>;",
            '}',
            '',
            'function B(x) {',
            '    if (x) { return 1; }',
            '    return 0;',
            '}',
            '',
            'function C() { return 2; }',
            '',
            'function D() { return 3; }'
        ].join('\n');
        const { report, diagnostics } = analyzeSource(code, 'typescript', { file: 'view.tsx' });

        expect(report.declarations.map(d => d.key)).toEqual(['A/0', 'B/1', 'C/0', 'D/0']);
        expect(report.complexity['B/1'].cyclomatic).toBe(2);
        expect(diagnostics).toEqual([
            { severity: 'warning', category: 'lexical', message: 'Unterminated string literal', line: 2 }
        ]);
    });

    test("reads object type literals in return annotations", () => {
        const code = [
            'function f(): { a: number } {',
            '    return { a: 1 };',
            '}',
            'class C {',
            '    get(): Promise<{ ok: boolean }> {',
            '        return this.x ? { ok: true } : { ok: false };',
            '    }',
            '}'
        ].join('\n');
        const { report, diagnostics } = analyzeSource(code, 'typescript');

        expect(report.declarations.map(d => [d.key, d.startLine, d.endLine])).toEqual([
            ['f/0', 1, 3],
            ['C', 4, 8],
            ['C::get/0', 5, 7]
        ]);
        expect(report.complexity['f/0'].cyclomatic).toBe(1);
        expect(report.complexity['C::get/0'].cyclomatic).toBe(2);
        expect(diagnostics).toEqual([]);
    });
});
