export * from './OddsAnalyzer.js';
export * from './report.js';
