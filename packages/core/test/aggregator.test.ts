import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";
import { summarizeReports } from "../src/aggregator";

describe("File report", () => {
    const code = `void f(int a) {}
void f(int b) {}
void f() { while (1) {} }
`;

    test("suffixes repeated keys in source order", () => {
        const { report } = analyzeSource(code, 'cpp');
        expect(report.declarations.map(d => d.key)).toEqual(['f/1', 'f/1#2', 'f/0']);
        expect(report.complexity['f/1#2'].cyclomatic).toBe(1);
        expect(report.complexity['f/0'].cyclomatic).toBe(2);
    });

    test("is frozen", () => {
        const { report } = analyzeSource(code, 'cpp');
        expect(Object.isFrozen(report)).toBe(true);
        expect(Object.isFrozen(report.declarations)).toBe(true);
        expect(Object.isFrozen(report.declarations[0])).toBe(true);
        expect(Object.isFrozen(report.complexity)).toBe(true);
        expect(Object.isFrozen(report.lines)).toBe(true);
    });

    test("is the same for the same input", () => {
        expect(analyzeSource(code, 'cpp')).toEqual(analyzeSource(code, 'cpp'));
    });

    test("only scores functions and methods", () => {
        const { report } = analyzeSource('class A { void m() {} };\n', 'cpp');
        expect(Object.keys(report.complexity)).toEqual(['A::m/0']);
    });
});

describe("Project summary", () => {
    const reports = [
        analyzeSource('struct A {};\nint f() { return 0; }\n', 'cpp').report,
        analyzeSource('function g() {}\n', 'typescript').report,
        analyzeSource('class C {}\n', 'java').report,
        analyzeSource('class B { void m() {} };\n', 'cpp').report
    ];

    test("adds up every file", () => {
        const summary = summarizeReports(reports);
        expect(summary.fileCount).toBe(4);
        expect(summary.classCount).toBe(2);
        expect(summary.structCount).toBe(1);
        expect(summary.methodCount).toBe(1);
        expect(summary.functionCount).toBe(2);
        expect(summary.includeCount).toBe(0);
        expect(summary.lines).toEqual({ total: 5, code: 5, comment: 0, blank: 0 });
    });

    test("orders languages by file count, then name", () => {
        const summary = summarizeReports(reports);
        expect(summary.languages.map(l => [l.language, l.fileCount])).toEqual([
            ['cpp', 2],
            ['java', 1],
            ['typescript', 1]
        ]);
        expect(summary.languages[0].classCount).toBe(1);
        expect(summary.languages[0].structCount).toBe(1);
    });

    test("is empty for no reports", () => {
        const summary = summarizeReports([]);
        expect(summary.fileCount).toBe(0);
        expect(summary.languages).toEqual([]);
    });
});
