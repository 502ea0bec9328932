import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";

const code = `
using System;
using static System.Math;
using Json = System.Text.Json;

namespace Demo.Tools
{
    [Serializable]
    public struct Vec { public int X; }

    public partial class Runner<T> : IRunner where T : new()
    {
        public Runner() : base() { }

        public async Task<int> RunAsync(T item, int retries = 2)
        {
            foreach (var x in Items) { if (x is null) continue; }
            return retries > 0 ? 1 : 0;
        }

        public int Count { get { return 0; } }
    }
}
`;

describe("C#", () => {
    const { report, diagnostics } = analyzeSource(code, 'csharp');

    test("collects using directives", () => {
        expect(report.includes.map(i => i.path)).toEqual(['System', 'System.Math', 'System.Text.Json']);
    });

    test("recognises types inside a namespace", () => {
        expect(report.declarations.map(d => d.key)).toEqual([
            'Vec',
            'Runner',
            'Runner::Runner/0',
            'Runner::RunAsync/2'
        ]);
        expect(report.structCount).toBe(1);
        expect(report.classCount).toBe(1);
        expect(report.declarations[2].isConstructor).toBe(true);
        expect(report.declarations[3].parameters).toEqual([
            { type: 'T', name: 'item', hasDefault: false },
            { type: 'int', name: 'retries', hasDefault: true }
        ]);
        expect(diagnostics).toEqual([]);
    });

    test("counts foreach as a loop", () => {
        expect(report.complexity['Runner::RunAsync/2']).toEqual({ decisionPoints: 3, cyclomatic: 4, cognitive: 4, nestingDepth: 1 });
    });

    test("leaves property accessors out", () => {
        expect(report.methodCount).toBe(2);
    });
});

describe("C# members", () => {
    test("records expression-bodied methods and positional records", () => {
        const code = [
            'class Calc',
            '{',
            '    private int x;',
            '    public int F() => x;',
            '    public int Abs(int a) => a > 0 ? a : -a;',
            '    public int Total => x;',
            '}',
            'public record Point(int X, int Y);'
        ].join('\n');
        const { report, diagnostics } = analyzeSource(code, 'csharp');

        expect(report.declarations.map(d => [d.key, d.startLine, d.endLine])).toEqual([
            ['Calc', 1, 7],
            ['Calc::F/0', 4, 4],
            ['Calc::Abs/1', 5, 5],
            ['Point', 8, 8]
        ]);
        expect([report.classCount, report.methodCount]).toEqual([2, 2]);
        expect(report.complexity['Calc::F/0'].cyclomatic).toBe(1);
        expect(report.complexity['Calc::Abs/1']).toEqual({ decisionPoints: 1, cyclomatic: 2, cognitive: 1, nestingDepth: 0 });
        expect(diagnostics).toEqual([]);
    });

    test("a property named record is not a type", () => {
        const code = 'class A\n{\n    public Record record { get; set; }\n    void M() { }\n}\n';
        const { report, diagnostics } = analyzeSource(code, 'csharp');

        expect(report.declarations.map(d => d.key)).toEqual(['A', 'A::M/0']);
        expect(report.classCount).toBe(1);
        expect(diagnostics).toEqual([]);
    });
});
