import * as path from 'path';
import { DialectDescriptor } from './dialect';
import { cppDialect } from './cpp';
import { csharpDialect } from './csharp';
import { goDialect } from './go';
import { javaDialect } from './java';
import { pythonDialect } from './python';
import { typescriptDialect } from './typescript';

export * from './dialect';
export { cppDialect, csharpDialect, goDialect, javaDialect, pythonDialect, typescriptDialect };

const dialects: Record<string, DialectDescriptor> = {
    'cpp': cppDialect,
    'csharp': csharpDialect,
    'go': goDialect,
    'java': javaDialect,
    'python': pythonDialect,
    'typescript': typescriptDialect
};

// Convenience names accepted wherever a dialect id is expected.
const aliases: Record<string, string> = {
    'c': 'cpp',
    'c++': 'cpp',
    'cs': 'csharp',
    'golang': 'go',
    'py': 'python',
    'c#': 'csharp',
    'ts': 'typescript',
    'javascript': 'typescript',
    'js': 'typescript'
};

export function getDialect(language: string): DialectDescriptor | undefined {
    const id = language.toLowerCase();
    const key = Object.hasOwn(dialects, id) ? id : Object.hasOwn(aliases, id) ? aliases[id] : undefined;
    return key === undefined ? undefined : dialects[key];
}

export function registerDialect(dialect: DialectDescriptor) {
    if (!dialect.id.trim()) {
        throw new Error('Dialect id must not be empty');
    }
    dialects[dialect.id.toLowerCase()] = dialect;
}

export function listDialects(): DialectDescriptor[] {
    return Object.values(dialects);
}

export function dialectForFile(file: string): DialectDescriptor | undefined {
    const ext = path.extname(file).toLowerCase();
    if (!ext) return undefined;
    return listDialects().find(d => d.extensions.includes(ext));
}
