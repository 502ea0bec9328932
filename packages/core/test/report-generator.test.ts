import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";
import { generateHtmlReport, rankDeclarations } from "../src/utils/report-generator";

describe("HTML report", () => {
    const first = analyzeSource('void f() { if (a) {} }\n', 'cpp', { file: 'a&b.cpp' }).report;
    const second = analyzeSource('export default function () { return 1; }\n', 'typescript', { file: 'z.ts' }).report;

    test("ranks functions by complexity, then file", () => {
        expect(rankDeclarations([second, first])).toEqual([
            { key: 'f/0', file: 'a&b.cpp', line: 1, cyclomatic: 2, cognitive: 1 },
            { key: '<anonymous function #1>/0', file: 'z.ts', line: 1, cyclomatic: 1, cognitive: 0 }
        ]);
    });

    test("escapes names and paths", () => {
        const html = generateHtmlReport([first, second]);
        expect(html).toContain('<td>a&amp;b.cpp</td>');
        expect(html).toContain('<td>&lt;anonymous function #1&gt;/0</td>');
    });

    test("shows cognitive complexity beside the cyclomatic score", () => {
        const html = generateHtmlReport([first]);
        expect(html).toContain('<th>Cognitive</th>');
        expect(html).toContain('<td class="score low">2</td>\n                    <td>1</td>');
    });

    test("colours scores against the thresholds", () => {
        expect(generateHtmlReport([first])).toContain('<td class="score low">2</td>');
        expect(generateHtmlReport([first], { warning: 1, error: 5 })).toContain('<td class="score medium">2</td>');
        expect(generateHtmlReport([first], { warning: 0, error: 1 })).toContain('<td class="score high">2</td>');
    });

    test("averages over every function", () => {
        expect(generateHtmlReport([first, second])).toContain('<div class="stat-value">1.5</div>');
        expect(generateHtmlReport([])).toContain('<div class="stat-value">0.0</div>');
    });
});
