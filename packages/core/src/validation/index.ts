export {
  namespaceNameSchema,
  keyFieldSchema,
  applyLimitSchema,
  queueCapacitySchema,
} from './schemas.js';
export type { NamespaceNameInput } from './schemas.js';
