export { hashOf } from './structural-hash.js';
export type { HashOptions } from './structural-hash.js';
