import { describe, expect, test } from "vitest";
import { analyzeSource } from "../src/analyzer";

const code = `
package demo;
import java.util.List;
import static java.lang.Math.max;

@Service
public class Greeter extends Base implements Api {
    private final List<String> names;

    public Greeter(List<String> names) { this.names = names; }

    @Override
    public String greet(String who) {
        for (String n : names) { if (n.equals(who)) return "hi"; }
        return who == null ? "none" : "bye";
    }

    interface Callback { void call(); }
}
`;

describe("Java", () => {
    const { report, diagnostics } = analyzeSource(code, 'java');

    test("collects imports", () => {
        expect(report.includes.map(i => i.path)).toEqual(['java.util.List', 'java.lang.Math.max']);
        expect(report.includes.map(i => i.line)).toEqual([3, 4]);
    });

    test("recognises annotated classes, constructors and methods", () => {
        expect(report.declarations.map(d => d.key)).toEqual([
            'Greeter',
            'Greeter::Greeter/1',
            'Greeter::greet/1',
            'Callback'
        ]);
        expect(report.declarations[1].isConstructor).toBe(true);
        expect(report.declarations[1].parameters).toEqual([{ type: 'List<String>', name: 'names', hasDefault: false }]);
        expect(diagnostics).toEqual([]);
    });

    test("counts for, if and the conditional", () => {
        expect(report.complexity['Greeter::greet/1']).toEqual({ decisionPoints: 3, cyclomatic: 4, cognitive: 4, nestingDepth: 1 });
    });
});
