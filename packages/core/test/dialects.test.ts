import { describe, expect, test } from "vitest";
import {
    cppDialect,
    dialectForFile,
    getDialect,
    goDialect,
    javaDialect,
    listDialects,
    pythonDialect,
    registerDialect,
    typescriptDialect
} from "../src/dialects";

describe("Dialect registry", () => {
    test("looks dialects up by id or alias, ignoring case", () => {
        expect(getDialect('CPP')).toBe(cppDialect);
        expect(getDialect('c')).toBe(cppDialect);
        expect(getDialect('javascript')).toBe(typescriptDialect);
        expect(getDialect('golang')).toBe(goDialect);
        expect(getDialect('py')).toBe(pythonDialect);
    });

    test("does not resolve object prototype names", () => {
        expect(getDialect('constructor')).toBeUndefined();
        expect(getDialect('toString')).toBeUndefined();
    });

    test("maps file extensions", () => {
        expect(dialectForFile('src/vec.HPP')).toBe(cppDialect);
        expect(dialectForFile('Main.java')).toBe(javaDialect);
        expect(dialectForFile('types.d.ts')).toBe(typescriptDialect);
        expect(dialectForFile('cmd/main.go')).toBe(goDialect);
        expect(dialectForFile('stubs.pyi')).toBe(pythonDialect);
        expect(dialectForFile('README.md')).toBeUndefined();
        expect(dialectForFile('Makefile')).toBeUndefined();
    });

    test("lists the built-in dialects", () => {
        expect(listDialects().map(d => d.id)).toEqual(['cpp', 'csharp', 'go', 'java', 'python', 'typescript']);
    });

    test("rejects an empty id", () => {
        expect(() => registerDialect({ ...cppDialect, id: ' ' })).toThrow('Dialect id must not be empty');
    });
});
