export type {
  KVEntry,
  KVCursor,
  KVBucket,
  StoreTransaction,
  TransactionalStore,
} from './store.js';
export type { PayloadCodec } from './codec.js';
