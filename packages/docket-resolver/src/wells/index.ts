/**
 * Wells: record loading, survey joins, window classification and
 * trajectory selection.
 *
 * @module wells
 */

export * from './field-names.js';
export * from './well-records.js';
export * from './survey.js';
export * from './classifier.js';
export * from './priority.js';
export * from './render-adapter.js';
export * from './docket-wells.js';
