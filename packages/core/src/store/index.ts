export { BaseTransaction } from './base-transaction.js';
