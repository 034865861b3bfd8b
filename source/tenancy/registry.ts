/**
 * Tenancy Registry - credentials to services, services to search targets.
 *
 * Pure lookups over a ServiceRepository. Deactivated services cannot
 * authenticate and are never searched, but their indices are left alone.
 */

import {ForbiddenError, UnauthenticatedError} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {Service, ServiceRepository} from './types.js';

const COMPONENT = 'Tenancy';

/**
 * Extract the token from a raw value or an Authorization header
 * (`Bearer x`, `Token x`): the last word wins.
 */
export function extractToken(
	authorization: string | null | undefined,
): string {
	const words = (authorization ?? '').trim().split(/\s+/);
	return words[words.length - 1] ?? '';
}

export class TenancyRegistry {
	private readonly repository: ServiceRepository;
	private readonly logger: Logger;

	constructor(repository: ServiceRepository, logger?: Logger) {
		this.repository = repository;
		this.logger = logger ?? createNullLogger();
	}

	/**
	 * Resolve a service bearer token (or Authorization header value).
	 */
	async resolve(bearerToken: string | null | undefined): Promise<Service> {
		const token = extractToken(bearerToken);
		if (!token) {
			throw new UnauthenticatedError(
				'Authentication credentials were not provided.',
			);
		}
		const service = await this.repository.findByToken(token);
		if (!service?.isActive) {
			this.logger.debug(COMPONENT, 'Rejected service token', {
				known: service !== null,
			});
			throw new UnauthenticatedError();
		}
		return service;
	}

	/**
	 * Resolve the service an end-user token was issued for.
	 */
	async resolveAudience(
		audience: string | null | undefined,
	): Promise<Service> {
		if (!audience) {
			throw new UnauthenticatedError('Missing token audience.');
		}
		const service = await this.repository.findByAudience(audience);
		if (!service?.isActive) {
			this.logger.debug(COMPONENT, 'Rejected token audience', {audience});
			throw new UnauthenticatedError(
				`No active service for audience "${audience}".`,
			);
		}
		return service;
	}

	/**
	 * Services a search from `caller` fans out to. The caller always comes first.
	 *
	 * Without requested names: the caller plus every active allowed partner.
	 * With requested names: each must be the caller, or an allowed and active
	 * partner, else ForbiddenError naming every offending service.
	 */
	async authorizeSearchTargets(
		caller: Service,
		requestedNames?: readonly string[],
	): Promise<Service[]> {
		const targets: Service[] = [caller];
		const seen = new Set([caller.name]);

		if (!requestedNames || requestedNames.length === 0) {
			for (const name of caller.allowedPartners) {
				if (seen.has(name)) continue;
				seen.add(name);
				const partner = await this.repository.findByName(name);
				if (partner?.isActive) {
					targets.push(partner);
				}
			}
			return targets;
		}

		const forbidden: string[] = [];
		for (const name of requestedNames) {
			if (seen.has(name)) continue;
			seen.add(name);

			if (!caller.allowedPartners.includes(name)) {
				forbidden.push(name);
				continue;
			}
			const partner = await this.repository.findByName(name);
			if (!partner?.isActive) {
				forbidden.push(name);
				continue;
			}
			targets.push(partner);
		}

		if (forbidden.length > 0) {
			this.logger.warn(COMPONENT, 'Search target not allowed', {
				caller: caller.name,
				forbidden,
			});
			throw new ForbiddenError(
				`Service ${caller.name} is not allowed to search: ${forbidden.join(', ')}`,
				forbidden,
			);
		}

		return targets;
	}
}
