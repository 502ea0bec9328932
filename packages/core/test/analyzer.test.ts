import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";

describe("analyzeSource", () => {
    test("reports an unsupported language instead of throwing", () => {
        const { report, diagnostics } = analyzeSource('a\nb', 'cobol', { file: 'x.cbl' });

        expect(report.file).toBe('x.cbl');
        expect(report.language).toBe('cobol');
        expect(report.declarations).toEqual([]);
        expect(report.lines).toEqual({ total: 2, code: 0, comment: 0, blank: 2 });
        expect(diagnostics).toEqual([
            { severity: 'error', category: 'input', message: "Unsupported language 'cobol'", line: 1 }
        ]);
    });

    test("resolves language aliases", () => {
        expect(analyzeSource('', 'c++').report.language).toBe('cpp');
        expect(analyzeSource('', 'C#').report.language).toBe('csharp');
        expect(analyzeSource('', 'js').report.language).toBe('typescript');
    });

    test("leaves file out when not given", () => {
        expect('file' in analyzeSource('', 'cpp').report).toBe(false);
    });

    test("puts lexical diagnostics before structural ones", () => {
        const { report, diagnostics } = analyzeSource('void f() {\n  const char* s = "abc;\n', 'cpp');

        expect(diagnostics.map(d => [d.category, d.message])).toEqual([
            ['lexical', 'Unterminated string literal'],
            ['structural', 'Unclosed function body opened on line 1']
        ]);
        expect(report.declarations.map(d => d.key)).toEqual(['f/0']);
    });

    test("a file of comments and includes declares nothing", () => {
        const { report, diagnostics } = analyzeSource('// header\n#include <a.h>\n/* x */\n#include "b.h"\n', 'cpp');

        expect([report.classCount, report.structCount, report.methodCount, report.functionCount]).toEqual([0, 0, 0, 0]);
        expect(report.includes).toEqual([{ path: 'a.h', line: 2 }, { path: 'b.h', line: 4 }]);
        expect(report.complexity).toEqual({});
        expect(diagnostics).toEqual([]);
    });

    test("counts TODO markers", () => {
        expect(analyzeSource('// TODO a\n// FIXME b\n', 'java').report.todoCount).toBe(2);
    });
});
