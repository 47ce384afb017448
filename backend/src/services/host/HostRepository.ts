/**
 * Host persistence contract and its in-memory implementation
 */

import { Host } from '../../../../shared/types';
import { DuplicateResourceError } from '../../types/errors';

export interface IStoredHost extends Host {
    id: string;
}

export interface IHostRepository {
    deleteByName(name: string): Promise<boolean>;
    findAll(): Promise<IStoredHost[]>;
    findByName(name: string): Promise<IStoredHost | null>;

    /**
     * @throws {DuplicateResourceError} when a host with the same name exists
     */
    insert(host: Host): Promise<IStoredHost>;

    /**
     * Replaces the addresses of the host with the same name.
     * Resolves to `null` when there is none.
     */
    replace(host: Host): Promise<IStoredHost | null>;

    /**
     * Inserts or replaces every host by name.
     */
    upsertAll(hosts: Host[]): Promise<void>;
}

/**
 * Map-backed repository, kept in name order.
 */
export class InMemoryHostRepository implements IHostRepository {
    private hosts = new Map<string, IStoredHost>();
    private nextId = 1;

    public async deleteByName(name: string): Promise<boolean> {
        return this.hosts.delete(name);
    }

    public async findAll(): Promise<IStoredHost[]> {
        return [ ...this.hosts.values() ]
            .sort((a, b) => a.name.localeCompare(b.name))
            .map(host => ({ ...host }));
    }

    public async findByName(name: string): Promise<IStoredHost | null> {
        const host = this.hosts.get(name);

        return host ? { ...host } : null;
    }

    public async insert(host: Host): Promise<IStoredHost> {
        if (this.hosts.has(host.name)) {
            throw new DuplicateResourceError(`Host '${host.name}' already exists`);
        }

        return this.store(host);
    }

    public async replace(host: Host): Promise<IStoredHost | null> {
        const existing = this.hosts.get(host.name);

        if (!existing) {
            return null;
        }

        const updated = { ...host, id: existing.id };

        this.hosts.set(host.name, updated);

        return { ...updated };
    }

    public async upsertAll(hosts: Host[]): Promise<void> {
        for (const host of hosts) {
            if (!await this.replace(host)) {
                this.store(host);
            }
        }
    }

    private store(host: Host): IStoredHost {
        const stored = { ...host, id: `host-${this.nextId++}` };

        this.hosts.set(host.name, stored);

        return { ...stored };
    }
}
