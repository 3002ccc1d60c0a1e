export { AnalysisCatalog, parseAnalysisStep } from './AnalysisCatalog';
export { PatternScanner } from './PatternScanner';
export { LocalAnalysisRunner, LocalAnalysisRunnerOptions } from './LocalAnalysisRunner';
