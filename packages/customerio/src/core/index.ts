// Pure functional core: request building and outcome classification

export * from './error-classifier.js';
export * from './http-utils.js';
export * from './types.js';
