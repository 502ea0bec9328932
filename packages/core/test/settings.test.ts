import { describe, expect, test } from "vitest";
import { defaultSettings, normalizeSettings } from "../src/settings";

describe("Settings Normalization", () => {
    test("returns defaults for null/undefined input", () => {
        expect(normalizeSettings(null)).toEqual(defaultSettings);
        expect(normalizeSettings(undefined)).toEqual(defaultSettings);
        expect(normalizeSettings([1, 2])).toEqual(defaultSettings);
    });

    test("preserves nested structure", () => {
        const result = normalizeSettings({
            threshold: { warning: 5, error: 8 },
            failOnDiagnostics: true
        });

        expect(result.threshold).toEqual({ warning: 5, error: 8 });
        expect(result.failOnDiagnostics).toBe(true);
        expect(result.exclude).toEqual(defaultSettings.exclude);
    });

    test("handles flat keys", () => {
        const result = normalizeSettings({
            "codeshape.threshold.warning": "15",
            "threshold.error": 30,
            "codeshape.exclude": "vendor, build",
            "codeshape.failOnDiagnostics": "true"
        });

        expect(result.threshold).toEqual({ warning: 15, error: 30 });
        expect(result.exclude).toEqual(['vendor', 'build']);
        expect(result.failOnDiagnostics).toBe(true);
    });

    test("flat keys override nested ones", () => {
        const result = normalizeSettings({
            threshold: { warning: 10, error: 20 },
            "threshold.warning": 999
        });
        expect(result.threshold.warning).toBe(999);
        expect(result.threshold.error).toBe(20);
    });

    test("ignores values of the wrong type", () => {
        const result = normalizeSettings({
            threshold: { warning: "lots", error: null },
            exclude: 42,
            failOnDiagnostics: "yes"
        });
        expect(result).toEqual(defaultSettings);
    });

    test("never mutates the defaults", () => {
        const result = normalizeSettings({ exclude: ['out'] });
        result.threshold.warning = 1;
        expect(defaultSettings.threshold.warning).toBe(10);
        expect(defaultSettings.exclude).toEqual(['node_modules', 'dist', '.git']);
    });
});
