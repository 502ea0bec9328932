import { describe, expect, test } from "vitest";
import { analyzeSource } from '@codeshape/core';
import { findViolations } from '../src/commands/check';
import { formatCounts } from '../src/commands/analyze';

const analyses = [
    { file: 'a.cpp', ...analyzeSource('void f() { if (a) {} if (b) {} }\nvoid g() {}\n', 'cpp') },
    { file: 'b.java', ...analyzeSource('class B {\n  int m(int x) { return x > 0 && x < 9 ? 1 : 0; }\n}\n', 'java') }
];

describe("check", () => {
    test("lists functions above the threshold in file order", () => {
        expect(findViolations(analyses, 2)).toEqual([
            { file: 'a.cpp', key: 'f/0', line: 1, cyclomatic: 3 },
            { file: 'b.java', key: 'B::m/1', line: 2, cyclomatic: 3 }
        ]);
    });

    test("a score equal to the threshold passes", () => {
        expect(findViolations(analyses, 3)).toEqual([]);
    });

    test("formats declaration counts", () => {
        expect(formatCounts(analyses[1].report)).toBe('classes 1  structs 0  methods 1  functions 0  includes 0');
    });
});
