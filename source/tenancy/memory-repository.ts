/**
 * In-memory ServiceRepository for tests and local runs.
 */

import type {Service, ServiceRepository} from './types.js';

export class InMemoryServiceRepository implements ServiceRepository {
	private readonly services = new Map<string, Service>();

	constructor(services: Service[] = []) {
		for (const service of services) {
			this.save(service);
		}
	}

	/**
	 * Insert or replace a registration (keyed by name).
	 */
	save(service: Service): void {
		this.services.set(service.name, {
			...service,
			allowedPartners: [...service.allowedPartners],
		});
	}

	async findByToken(token: string): Promise<Service | null> {
		for (const service of this.services.values()) {
			if (service.token === token) return service;
		}
		return null;
	}

	async findByAudience(audience: string): Promise<Service | null> {
		for (const service of this.services.values()) {
			if (service.clientId === audience) return service;
		}
		return null;
	}

	async findByName(name: string): Promise<Service | null> {
		return this.services.get(name) ?? null;
	}
}
