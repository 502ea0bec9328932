import { FileReport } from '../types';
import { AnalyzerSettings, defaultSettings } from '../settings';

export interface RankedDeclaration {
    key: string;
    file: string;
    line: number;
    cyclomatic: number;
    cognitive: number;
}

function escapeHtml(unsafe: string): string {
    return unsafe
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#039;");
}

/** Functions and methods of every report, most complex first. */
export function rankDeclarations(reports: readonly FileReport[]): RankedDeclaration[] {
    return reports
        .flatMap(r => r.declarations
            .filter(d => r.complexity[d.key] !== undefined)
            .map(d => ({
                key: d.key,
                file: r.file ?? '<input>',
                line: d.startLine,
                cyclomatic: r.complexity[d.key].cyclomatic,
                cognitive: r.complexity[d.key].cognitive
            })))
        .sort((a, b) => b.cyclomatic - a.cyclomatic || a.file.localeCompare(b.file) || a.line - b.line);
}

export function generateHtmlReport(
    reports: readonly FileReport[],
    threshold: AnalyzerSettings['threshold'] = defaultSettings.threshold
): string {
    const ranked = rankDeclarations(reports);
    const totalTypes = reports.reduce((acc, r) => acc + r.classCount + r.structCount, 0);
    const totalComplexity = ranked.reduce((acc, d) => acc + d.cyclomatic, 0);
    const average = ranked.length > 0 ? (totalComplexity / ranked.length).toFixed(1) : '0.0';
    const topDeclarations = ranked.slice(0, 10);

    const scoreClass = (score: number): string => {
        if (score > threshold.error) return 'high';
        if (score > threshold.warning) return 'medium';
        return 'low';
    };

    return `
<!DOCTYPE html>
<html>
<head>
    <title>Code Structure Report</title>
    <style>
        body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; padding: 20px; max-width: 1200px; margin: 0 auto; }
        .card { background: #f5f5f5; padding: 20px; border-radius: 8px; margin-bottom: 20px; }
        .stats { display: grid; grid-template-columns: repeat(4, 1fr); gap: 20px; margin-bottom: 30px; }
        .stat-box { background: white; padding: 20px; border-radius: 8px; text-align: center; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
        .stat-value { font-size: 32px; font-weight: bold; color: #007acc; }
        table { width: 100%; border-collapse: collapse; background: white; }
        th, td { padding: 12px; text-align: left; border-bottom: 1px solid #ddd; }
        th { background: #f8f9fa; }
        .score { font-weight: bold; }
        .high { color: #d32f2f; }
        .medium { color: #f57c00; }
        .low { color: #388e3c; }
    </style>
</head>
<body>
    <h1>Code Structure Report</h1>

    <div class="stats">
        <div class="stat-box">
            <div class="stat-value">${reports.length}</div>
            <div>Files</div>
        </div>
        <div class="stat-box">
            <div class="stat-value">${totalTypes}</div>
            <div>Classes &amp; Structs</div>
        </div>
        <div class="stat-box">
            <div class="stat-value">${ranked.length}</div>
            <div>Functions &amp; Methods</div>
        </div>
        <div class="stat-box">
            <div class="stat-value">${average}</div>
            <div>Average Cyclomatic Complexity</div>
        </div>
    </div>

    <div class="card">
        <h2>Top 10 Most Complex Functions</h2>
        <table>
            <thead>
                <tr>
                    <th>CC</th>
                    <th>Cognitive</th>
                    <th>Declaration</th>
                    <th>File</th>
                    <th>Line</th>
                </tr>
            </thead>
            <tbody>
                ${topDeclarations.map(d => `
                <tr>
                    <td class="score ${scoreClass(d.cyclomatic)}">${d.cyclomatic}</td>
                    <td>${d.cognitive}</td>
                    <td>${escapeHtml(d.key)}</td>
                    <td>${escapeHtml(d.file)}</td>
                    <td>${d.line}</td>
                </tr>
                `).join('')}
            </tbody>
        </table>
    </div>
</body>
</html>
    `;
}
