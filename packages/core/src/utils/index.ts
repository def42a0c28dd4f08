export {
  compareBytes,
  bytesEqual,
  toHex,
  fromHex,
  utf8,
  fromUtf8,
  idToBytes,
} from './bytes.js';
export { WriteLock } from './write-lock.js';
export { view, update } from './transactions.js';
