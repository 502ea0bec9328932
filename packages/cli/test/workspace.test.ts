import { afterAll, beforeAll, describe, expect, test } from "vitest";
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultSettings } from '@codeshape/core';
import { analyzeFiles, collectFiles, excludePatterns } from '../src/workspace';

let dir: string;

function write(file: string, content: string) {
    const target = path.join(dir, file);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
}

beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'codeshape-'));
    write('src/a.cpp', '#include <vector>\nint main() { return 0; }\n');
    write('src/b.ts', 'export function b(x: number) { return x ? 1 : 2; }\n');
    write('src/notes.md', '# notes\n');
    write('node_modules/dep/c.cpp', 'void c() {}\n');
    write('dist/d.ts', 'function d() {}\n');
});

afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
});

describe("Workspace", () => {
    test("expands plain exclude names to directories anywhere", () => {
        expect(excludePatterns(['node_modules', 'build/**', '*.gen.ts'])).toEqual([
            '**/node_modules/**',
            'build/**',
            '*.gen.ts'
        ]);
    });

    test("collects analyzable files outside excluded directories", async () => {
        expect(await collectFiles('**/*', defaultSettings, dir)).toEqual(['src/a.cpp', 'src/b.ts']);
    });

    test("honours a custom exclude list", async () => {
        const settings = { ...defaultSettings, exclude: ['src'] };
        expect(await collectFiles('**/*.{cpp,ts}', settings, dir)).toEqual(['dist/d.ts', 'node_modules/dep/c.cpp']);
    });

    test("analyzes each file with the dialect of its extension", async () => {
        const { analyses, failures } = await analyzeFiles(['src/a.cpp', 'src/b.ts'], dir);

        expect(failures).toEqual([]);
        expect(analyses.map(a => [a.file, a.report.language])).toEqual([
            ['src/a.cpp', 'cpp'],
            ['src/b.ts', 'typescript']
        ]);
        expect(analyses[0].report.includes).toEqual([{ path: 'vector', line: 1 }]);
        expect(analyses[1].report.complexity['b/1'].cyclomatic).toBe(2);
    });

    test("keeps going when a file cannot be read", async () => {
        const { analyses, failures } = await analyzeFiles(['missing.cpp', 'src/a.cpp', 'src/notes.md'], dir);

        expect(analyses.map(a => a.file)).toEqual(['src/a.cpp']);
        expect(failures.map(f => f.file)).toEqual(['missing.cpp', 'src/notes.md']);
        expect(failures[1].error).toEqual(new Error('No dialect for src/notes.md'));
    });
});
