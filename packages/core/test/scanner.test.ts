import { describe, expect, test } from "vitest";
import { lex } from "../src/lexer/lexer";
import { scan } from "../src/scanner/scanner";
import { cppDialect, DialectDescriptor, getDialect, registerDialect } from "../src/dialects";

function scanSource(text: string, dialect: DialectDescriptor = cppDialect) {
    return scan(text, lex(text, dialect).tokens, dialect);
}

function shapes(text: string, dialect: DialectDescriptor = cppDialect) {
    return scanSource(text, dialect).declarations.map(d => ({ kind: d.kind, name: d.name, owner: d.owner }));
}

describe("Structural scanner", () => {
    test("attaches out-of-line definitions to known types", () => {
        const code = `
class Shape {
public:
    Shape();
    ~Shape();
    virtual double area() const;
};

Shape::Shape() : sides{0} {}
Shape::~Shape() {}
double Shape::area() const { return 0.0; }
void Other::run() {}
static int twice(int v) { return v * 2; }
`;
        const { declarations, diagnostics } = scanSource(code);
        expect(declarations.map(d => ({ kind: d.kind, name: d.name, owner: d.owner }))).toEqual([
            { kind: 'Class', name: 'Shape', owner: undefined },
            { kind: 'Method', name: 'Shape', owner: 'Shape' },
            { kind: 'Method', name: '~Shape', owner: 'Shape' },
            { kind: 'Method', name: 'area', owner: 'Shape' },
            { kind: 'Function', name: 'Other::run', owner: undefined },
            { kind: 'Function', name: 'twice', owner: undefined }
        ]);
        expect(declarations.map(d => d.isConstructor)).toEqual([false, true, false, false, false, false]);
        expect(declarations[5].parameters).toEqual([{ type: 'int', name: 'v', hasDefault: false }]);
        expect(diagnostics).toEqual([]);
    });

    test("records body and span ranges", () => {
        const { declarations } = scanSource('int f() {\n  return 1;\n}\n');
        const [f] = declarations;
        // int f ( ) { return 1 ; }
        expect(f.span).toEqual({ start: 0, end: 9 });
        expect(f.body).toEqual({ start: 4, end: 9 });
        expect([f.startLine, f.endLine]).toEqual([1, 3]);
    });

    test("looks inside namespaces and linkage blocks", () => {
        const code = `
namespace outer {
namespace {
int hidden() { return 1; }
}
extern "C" {
void exported(void) {}
}
}
`;
        const { declarations } = scanSource(code);
        expect(declarations.map(d => d.name)).toEqual(['hidden', 'exported']);
        expect(declarations[1].parameters).toEqual([]);
    });

    test("handles templates, attributes and operators", () => {
        const code = `
template <typename T>
struct Box {
    T value;
    [[nodiscard]] bool operator==(const Box& other) const { return value == other.value; }
    explicit operator bool() const { return true; }
};
`;
        const { declarations } = scanSource(code);
        expect(declarations.map(d => [d.kind, d.name])).toEqual([
            ['Struct', 'Box'],
            ['Method', 'operator=='],
            ['Method', 'operator bool']
        ]);
        expect(declarations[1].parameters).toEqual([{ type: 'const Box&', name: 'other', hasDefault: false }]);
    });

    test("skips parentheses inside template parameter defaults", () => {
        const { declarations, diagnostics } = scanSource('template <typename T, int N = sizeof(T)>\nT f(T a) { return a; }');
        expect(declarations.map(d => ({ kind: d.kind, name: d.name, startLine: d.startLine }))).toEqual([
            { kind: 'Function', name: 'f', startLine: 2 }
        ]);
        expect(declarations[0].parameters).toEqual([{ type: 'T', name: 'a', hasDefault: false }]);
        expect(diagnostics).toEqual([]);
    });

    test("keeps lambdas and initializer lists inside the enclosing body", () => {
        const code = `
int run() {
    auto f = [](int a) { return a > 0 ? a : -a; };
    std::vector<int> v{1, 2};
    return f(v[0]);
}
`;
        expect(shapes(code)).toEqual([{ kind: 'Function', name: 'run', owner: undefined }]);
    });

    test("parses parameter types verbatim", () => {
        const { declarations } = scanSource('void g(const std::map<int, std::string>& m, int n = 3, char buf[16]) {}');
        expect(declarations[0].parameters).toEqual([
            { type: 'const std::map<int, std::string>&', name: 'm', hasDefault: false },
            { type: 'int', name: 'n', hasDefault: true },
            { type: 'char', name: 'buf', hasDefault: false }
        ]);
    });

    test("names anonymous types", () => {
        const { declarations } = scanSource('struct { int x; } point;\nstruct { int y; } other;');
        expect(declarations.map(d => d.name)).toEqual(['<anonymous struct #1>', '<anonymous struct #2>']);
    });

    test("reports stray and unclosed braces", () => {
        const { declarations, diagnostics } = scanSource('}\nint f() {\n  if (x) {\n');
        expect(diagnostics.map(d => [d.message, d.line])).toEqual([
            ['Unmatched closing brace', 1],
            ['Unclosed block opened on line 3', 4],
            ['Unclosed function body opened on line 2', 4]
        ]);
        expect(diagnostics.every(d => d.category === 'structural')).toBe(true);
        expect(declarations.map(d => [d.name, d.endLine])).toEqual([['f', 4]]);
    });

    test("reports a body without a recognisable declaration", () => {
        const { declarations, diagnostics } = scanSource('TEST(Suite, Case) {\n}\n');
        expect(declarations).toEqual([]);
        expect(diagnostics).toEqual([
            { severity: 'warning', category: 'structural', message: "Unrecognized declaration 'TEST'", line: 1 }
        ]);
    });

    test("records prototypes for dialects that ask for them", () => {
        registerDialect({ ...cppDialect, id: 'cpp-prototypes', declarationsWithoutBody: true });
        const dialect = getDialect('cpp-prototypes');
        expect(dialect).toBeDefined();
        if (!dialect) return;

        const { declarations } = scanSource('int add(int a, int b);\nclass P { void run(); };', dialect);
        expect(declarations.map(d => [d.kind, d.name])).toEqual([
            ['Function', 'add'],
            ['Class', 'P'],
            ['Method', 'run']
        ]);
        expect(declarations[0].body.end - declarations[0].body.start).toBe(1);
    });
});
