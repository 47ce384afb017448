/**
 * Host Service
 * CRUD and bulk import of host records (name mapped to SIP and media addresses)
 */

import { getLogger } from '@jitsi/logger';

import { Host } from '../../../../shared/types';
import { ResourceNotFoundError } from '../../types/errors';

import { IHostRepository, IStoredHost } from './HostRepository';

const logger = getLogger('backend/src/services/host/HostService');

export class HostService {
    private repository: IHostRepository;

    constructor(repository: IHostRepository) {
        this.repository = repository;
    }

    public list(): Promise<IStoredHost[]> {
        return this.repository.findAll();
    }

    /**
     * @throws {ResourceNotFoundError} when no host has this name
     */
    public async getByName(name: string): Promise<IStoredHost> {
        const host = await this.repository.findByName(name);

        if (!host) {
            throw new ResourceNotFoundError(`Host '${name}' not found`);
        }

        return host;
    }

    /**
     * @throws {DuplicateResourceError} when the name is taken
     */
    public async create(host: Host): Promise<IStoredHost> {
        const created = await this.repository.insert(host);

        logger.info(`Host '${host.name}' created`);

        return created;
    }

    /**
     * @throws {ResourceNotFoundError} when no host has this name
     */
    public async update(host: Host): Promise<IStoredHost> {
        const updated = await this.repository.replace(host);

        if (!updated) {
            throw new ResourceNotFoundError(`Host '${host.name}' not found`);
        }

        logger.info(`Host '${host.name}' updated`);

        return updated;
    }

    /**
     * @throws {ResourceNotFoundError} when no host has this name
     */
    public async deleteByName(name: string): Promise<void> {
        if (!await this.repository.deleteByName(name)) {
            throw new ResourceNotFoundError(`Host '${name}' not found`);
        }

        logger.info(`Host '${name}' deleted`);
    }

    public async saveAll(hosts: Host[]): Promise<void> {
        await this.repository.upsertAll(hosts);

        logger.info(`Imported ${hosts.length} hosts`);
    }
}
