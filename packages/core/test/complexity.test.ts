import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";
import { evaluateComplexity } from "../src/calculators/cyclomatic";
import { lex } from "../src/lexer/lexer";
import { scan } from "../src/scanner/scanner";
import { typescriptDialect } from "../src/dialects";

function complexityOf(code: string, key: string, language = 'typescript') {
    return analyzeSource(code, language).report.complexity[key];
}

describe("Cyclomatic Complexity", () => {
    test("Simple function", () => {
        const code = `function hello() { console.log('hello'); }`;
        expect(complexityOf(code, 'hello/0')).toEqual({ decisionPoints: 0, cyclomatic: 1, cognitive: 0, nestingDepth: 0 });
    });

    test("If statement", () => {
        const code = `function test(a) { if (a) { return true; } }`;
        expect(complexityOf(code, 'test/1').cyclomatic).toBe(2);
    });

    test("If else", () => {
        const code = `
        function test(a) {
            if (a) {
                return true;
            } else {
                return false;
            }
        }`;
        expect(complexityOf(code, 'test/1').cyclomatic).toBe(2);
    });

    test("If else if else", () => {
        const code = `
        function test(a, b) {
            if (a) {
                return true;
            } else if (b) {
                return false;
            } else {
                return 0;
            }
        }`;
        expect(complexityOf(code, 'test/2').cyclomatic).toBe(3);
    });

    test("Switch counts each case", () => {
        const code = `
        function pick(x) {
            switch (x) {
                case 1: return 'a';
                case 2: return 'b';
                case 3: return 'c';
                default: return 'd';
            }
        }`;
        expect(complexityOf(code, 'pick/1').cyclomatic).toBe(4);
    });

    test("Loops, including do-while once", () => {
        const code = `
        function loops(n) {
            for (let i = 0; i < n; i++) {}
            while (n > 0) { n--; }
            do { n++; } while (n < 3);
        }`;
        expect(complexityOf(code, 'loops/1').cyclomatic).toBe(4);
    });

    test("Logical operators", () => {
        const code = `function l(a, b, c) { return a && b || c; }`;
        expect(complexityOf(code, 'l/3').cyclomatic).toBe(3);
    });

    test("Optional chaining and nullish coalescing add nothing", () => {
        const code = `function t(a?: number, o?: Opts) { const v = o?.x ?? 0; return a ? v : 1; }`;
        expect(complexityOf(code, 't/2')).toEqual({ decisionPoints: 1, cyclomatic: 2, cognitive: 1, nestingDepth: 0 });
    });

    test("Nested conditionals", () => {
        const code = `function n(a, b) { return a ? (b ? 1 : 2) : 3; }`;
        expect(complexityOf(code, 'n/2').cyclomatic).toBe(3);
    });

    test("Catch", () => {
        const code = `function c() { try { run(); } catch (e) { log(e); } finally {} }`;
        expect(complexityOf(code, 'c/0').cyclomatic).toBe(2);
    });

    test("Decision keywords inside strings and comments are ignored", () => {
        const code = `function q() { const s = "if (a && b)"; // while (x) || y
        }`;
        expect(complexityOf(code, 'q/0').cyclomatic).toBe(1);
    });

    test("Template defaults with parentheses", () => {
        const code = 'template <typename T, int N = sizeof(T)>\nT f(T a) { return a ? a : T(); }';
        expect(complexityOf(code, 'f/1', 'cpp').cyclomatic).toBe(2);
    });

    test("Rvalue reference declarators are not conditions", () => {
        const code = 'void f(int a) {\n auto&& r = g();\n std::string&& s = std::move(t);\n}';
        expect(complexityOf(code, 'f/1', 'cpp')).toEqual({ decisionPoints: 0, cyclomatic: 1, cognitive: 0, nestingDepth: 0 });
    });

    test("Range-for reference beside a real condition", () => {
        const code = 'void f(std::vector<int>& xs, bool a) {\n for (auto&& x : xs) { if (a && x) {} }\n}';
        expect(complexityOf(code, 'f/2', 'cpp').cyclomatic).toBe(4);
    });

    test("evaluateComplexity skips nested spans", () => {
        const code = `function a() { if (x) {} function b() { if (y) {} } }`;
        const { tokens } = lex(code, typescriptDialect);
        const { declarations } = scan(code, tokens, typescriptDialect);
        const [outer, inner] = declarations;

        expect(evaluateComplexity(tokens, outer, typescriptDialect).decisionPoints).toBe(2);
        expect(evaluateComplexity(tokens, outer, typescriptDialect, [inner.span]).decisionPoints).toBe(1);
    });
});
