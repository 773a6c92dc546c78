/**
 * Pipeline exports
 */

export * from './probe-report.js';
export * from './probe-pipeline.js';
