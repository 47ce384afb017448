/**
 * MongoDB host repository backed by a mongoose model
 */

import { Connection, Model, Schema } from 'mongoose';

import { Host } from '../../../../shared/types';
import { DuplicateResourceError } from '../../types/errors';

import { IHostRepository, IStoredHost } from './HostRepository';

const DUPLICATE_KEY = 11000;

const hostSchema = new Schema<Host>(
    {
        name: {
            type: String,
            required: true,
            unique: true,
            index: true
        },
        sip: {
            type: [ String ],
            default: []
        },
        media: {
            type: [ String ],
            default: []
        }
    },
    {
        collection: 'hosts',
        versionKey: false
    }
);

function isDuplicateKeyError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;
}

interface IHostRecord extends Host {
    _id: unknown;
}

function toStoredHost(record: IHostRecord): IStoredHost {
    return {
        id: String(record._id),
        name: record.name,
        sip: [ ...record.sip ],
        media: [ ...record.media ]
    };
}

export class MongoHostRepository implements IHostRepository {
    private model: Model<Host>;

    constructor(connection: Connection) {
        this.model = connection.model<Host>('Host', hostSchema);
    }

    public async deleteByName(name: string): Promise<boolean> {
        const result = await this.model.deleteOne({ name });

        return result.deletedCount > 0;
    }

    public async findAll(): Promise<IStoredHost[]> {
        const records = await this.model.find().sort({ name: 1 }).lean();

        return records.map(toStoredHost);
    }

    public async findByName(name: string): Promise<IStoredHost | null> {
        const record = await this.model.findOne({ name }).lean();

        return record ? toStoredHost(record) : null;
    }

    public async insert(host: Host): Promise<IStoredHost> {
        try {
            const document = await this.model.create(host);

            return toStoredHost(document.toObject());
        } catch (error) {
            if (isDuplicateKeyError(error)) {
                throw new DuplicateResourceError(`Host '${host.name}' already exists`);
            }
            throw error;
        }
    }

    public async replace(host: Host): Promise<IStoredHost | null> {
        const record = await this.model.findOneAndUpdate(
            { name: host.name },
            { $set: { sip: host.sip, media: host.media } },
            { new: true }
        ).lean();

        return record ? toStoredHost(record) : null;
    }

    public async upsertAll(hosts: Host[]): Promise<void> {
        if (hosts.length === 0) {
            return;
        }

        await this.model.bulkWrite(hosts.map(host => ({
            updateOne: {
                filter: { name: host.name },
                update: { $set: { sip: host.sip, media: host.media } },
                upsert: true
            }
        })));
    }
}
