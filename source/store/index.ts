export type * from './types.js';
export {MemoryStore, requiredMatches} from './memory.js';
export {OpenSearchStore, type OpenSearchStoreOptions} from './opensearch.js';
