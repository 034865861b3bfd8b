export type {
	Service,
	ServiceRepository,
	UserClaims,
	UserTokenVerifier,
} from './types.js';
export {InMemoryServiceRepository} from './memory-repository.js';
export {TenancyRegistry, extractToken} from './registry.js';
