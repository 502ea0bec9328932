export * from './types';
export * from './dialects';
export { lex } from './lexer/lexer';
export type { LexResult } from './lexer/lexer';
export { scan, StructuralScanner } from './scanner/scanner';
export type { ScanResult } from './scanner/scanner';
export { parseParameters } from './scanner/parameters';
export { evaluateComplexity } from './calculators/cyclomatic';
export { evaluateCognitive } from './calculators/cognitive';
export type { CognitiveResult } from './calculators/cognitive';
export { buildFileReport, declarationKey, summarizeReports } from './aggregator';
export type { FileReportInput } from './aggregator';
export { analyzeSource } from './analyzer';
export type { AnalyzeOptions } from './analyzer';
export { countLines, countTodos } from './line-counter';
export { defaultSettings, normalizeSettings } from './settings';
export type { AnalyzerSettings } from './settings';
export { generateHtmlReport, rankDeclarations } from './utils/report-generator';
export type { RankedDeclaration } from './utils/report-generator';
