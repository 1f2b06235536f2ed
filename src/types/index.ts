export * from './verdict.js';
export * from './policy.js';
export * from './request.js';
export * from './response.js';
