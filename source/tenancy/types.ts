/**
 * Tenancy types.
 *
 * Registration records live outside the engine; the registry only reads them
 * through ServiceRepository.
 */

/**
 * A registered tenant application.
 */
export interface Service {
	/** Slug, also the index namespace (`<indexPrefix><name>`) */
	name: string;
	/** Audience claim of end-user tokens issued for this service */
	clientId: string;
	isActive: boolean;
	/** Opaque bearer token used by the service for indexing calls */
	token: string;
	/**
	 * Services this one may fan searches out to, in order.
	 * Directed: A listing B does not let B search A.
	 */
	allowedPartners: string[];
}

/**
 * Read access to service registrations.
 * Lookups return inactive services too; the registry decides what to do with them.
 */
export interface ServiceRepository {
	findByToken(token: string): Promise<Service | null>;
	findByAudience(audience: string): Promise<Service | null>;
	findByName(name: string): Promise<Service | null>;
}

/**
 * Claims of a verified end-user token.
 */
export interface UserClaims {
	/** User identifier; absent for anonymous contexts */
	sub?: string;
	/** Group slugs the user belongs to */
	groups?: string[];
	/** Client id of the service the token was issued for */
	audience: string;
}

/**
 * Verifies end-user tokens (resource server introspection, JWT, ...).
 * Rejects with UnauthenticatedError when the token is invalid.
 */
export interface UserTokenVerifier {
	verify(token: string): Promise<UserClaims>;
}
