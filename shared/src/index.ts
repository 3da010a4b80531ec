/**
 * AI Maturity Engine - Shared Types
 */

export * from './types/assessment.js';
export * from './types/benchmark.js';
export * from './types/roadmap.js';
export * from './types/pilot.js';
export * from './types/report.js';
export * from './types/events.js';
