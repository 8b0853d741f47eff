export * from './interfaces/analytics.interface';
export * from './analytics.errors';
export * from './sample-filter';
export * from './aggregator';
export * from './metrics-calculator';
export * from './alert-classifier';
export * from './deviation-ranker';
export * from './performance-report.builder';
