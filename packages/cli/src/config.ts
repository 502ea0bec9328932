import * as fs from 'fs';
import * as path from 'path';
import { AnalyzerSettings, normalizeSettings } from '@codeshape/core';

export const configFileName = '.codeshaperc.json';

/**
 * Settings from `configPath`, or from `.codeshaperc.json` in `cwd` when no
 * path is given. A missing default file means defaults; a missing explicit
 * file is an error.
 */
export async function loadSettings(configPath?: string, cwd = process.cwd()): Promise<AnalyzerSettings> {
    const file = path.resolve(cwd, configPath ?? configFileName);
    if (!fs.existsSync(file)) {
        if (configPath !== undefined) throw new Error(`Config file not found: ${configPath}`);
        return normalizeSettings(undefined);
    }

    const content = await fs.promises.readFile(file, 'utf-8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (e) {
        throw new Error(`Invalid JSON in ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return normalizeSettings(parsed);
}
