export interface AnalyzerSettings {
    threshold: {
        warning: number;
        error: number;
    };
    exclude: string[];
    failOnDiagnostics: boolean;
}

export const defaultSettings: AnalyzerSettings = {
    threshold: {
        warning: 10,
        error: 20
    },
    exclude: ['node_modules', 'dist', '.git'],
    failOnDiagnostics: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}

function toBoolean(value: unknown): boolean | undefined {
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    return undefined;
}

function toStringList(value: unknown): string[] | undefined {
    if (typeof value === 'string') return value.split(',').map(s => s.trim()).filter(Boolean);
    if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
    return undefined;
}

function apply(settings: AnalyzerSettings, key: string, value: unknown) {
    switch (key) {
        case 'threshold.warning':
            settings.threshold.warning = toNumber(value) ?? settings.threshold.warning;
            break;
        case 'threshold.error':
            settings.threshold.error = toNumber(value) ?? settings.threshold.error;
            break;
        case 'exclude':
            settings.exclude = toStringList(value) ?? settings.exclude;
            break;
        case 'failOnDiagnostics':
            settings.failOnDiagnostics = toBoolean(value) ?? settings.failOnDiagnostics;
            break;
    }
}

export function normalizeSettings(input: unknown): AnalyzerSettings {
    // Start from a copy so the defaults are never mutated
    const settings: AnalyzerSettings = {
        threshold: { ...defaultSettings.threshold },
        exclude: [...defaultSettings.exclude],
        failOnDiagnostics: defaultSettings.failOnDiagnostics
    };
    if (!isRecord(input)) return settings;

    // Nested form, as written in .codeshaperc.json
    if (isRecord(input.threshold)) {
        apply(settings, 'threshold.warning', input.threshold.warning);
        apply(settings, 'threshold.error', input.threshold.error);
    }
    apply(settings, 'exclude', input.exclude);
    apply(settings, 'failOnDiagnostics', input.failOnDiagnostics);

    // Flat dot-notation keys, e.g. `codeshape.threshold.warning`
    for (const key of Object.keys(input)) {
        const cleanKey = key.replace(/^codeshape\./, '');
        if (cleanKey.includes('.') || cleanKey !== key) apply(settings, cleanKey, input[key]);
    }

    return settings;
}
