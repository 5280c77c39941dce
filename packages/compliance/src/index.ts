export * from './types.js';
export * from './errors.js';
export * from './scores.js';
export * from './csv-parser.js';
export * from './normalizer.js';
export * from './summary-path.js';
export * from './summary-reader.js';
export * from './dashboard-tile.js';
export * from './gap-analysis.js';
export * from './report-sections.js';
export * from './report-documents.js';
export * from './report-renderers.js';
