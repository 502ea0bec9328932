import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";

const code = `
package shapes

import "fmt"

import (
    "math"
    str "strings"
)

type Shape interface {
    Area() float64
}

type (
    Point struct {
        X, Y int
    }
    ID int
)

func (c *Circle) Area() float64 {
    return math.Pi * c.r * c.r
}

type Circle struct {
    r float64
}

func (s *Stack[T]) Push(v T) {}

func Classify(n int) string {
    if n > 0 {
        for i := 0; i < n; i++ {
            if i%2 == 0 && n > 10 {
                return "big"
            }
        }
    } else if n < 0 {
        return "neg"
    } else {
        return "zero"
    }
    return fmt.Sprint(n)
}

func div(a, b int) (int, error) {
    return a / b, nil
}
`;

describe("Go", () => {
    const { report, diagnostics } = analyzeSource(code, 'golang');

    test("collects single and grouped imports", () => {
        expect(report.includes).toEqual([
            { path: 'fmt', line: 4 },
            { path: 'math', line: 7 },
            { path: 'strings', line: 8 }
        ]);
    });

    test("recognises types, including members of a type group", () => {
        expect(report.declarations.map(d => d.key)).toEqual([
            'Shape',
            'Point',
            'Circle::Area/0',
            'Circle',
            'Stack::Push/1',
            'Classify/1',
            'div/2'
        ]);
        expect(report.declarations[1]).toMatchObject({ kind: 'Struct', startLine: 16, endLine: 18 });
        expect([report.classCount, report.structCount, report.methodCount, report.functionCount]).toEqual([1, 2, 1, 3]);
        expect(diagnostics).toEqual([]);
    });

    test("attaches receiver methods to types declared later in the file", () => {
        const area = report.declarations[2];
        expect(area).toMatchObject({ kind: 'Method', name: 'Area', owner: 'Circle', startLine: 22, endLine: 24 });
        // Stack is never declared here
        expect(report.declarations[4].owner).toBeUndefined();
        expect(report.declarations[4].parameters).toEqual([{ type: 'T', name: 'v', hasDefault: false }]);
    });

    test("shares a type across grouped parameter names", () => {
        expect(report.declarations[6].parameters).toEqual([
            { type: 'int', name: 'a', hasDefault: false },
            { type: 'int', name: 'b', hasDefault: false }
        ]);
    });

    test("scores nested flow without parentheses", () => {
        expect(report.complexity['Classify/1']).toEqual({ decisionPoints: 5, cyclomatic: 6, cognitive: 9, nestingDepth: 3 });
        expect(report.complexity['div/2'].cyclomatic).toBe(1);
    });
});
