/**
 * Application Configuration
 * Reads every setting from the environment (see .env.example) with defaults.
 *
 * Session settings are handed to the services explicitly, so nothing below
 * the route layer reads process.env.
 */

export type CollectionSuffix = 'yyyyMMdd' | 'yyyyMMddHH';

export interface IAppConfig {
    frontendUrl: string;
    hosts: {
        importMaxSize: number; // bytes
    };
    logLevel: string;
    mongo: {
        collectionSuffix: CollectionSuffix;
        database: string;
        uri: string;
    };
    port: number;
    security: {
        enabled: boolean;
        // username -> password for the static authentication provider
        users: Map<string, string>;
    };
    session: {
        call: {
            terminationTimeout: number; // milliseconds
        };
        media: {
            blockCount: number;
            terminationTimeout: number; // milliseconds
        };
    };
}

const LOG_LEVELS = [ 'trace', 'debug', 'info', 'log', 'warn', 'error' ];

function parseInteger(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);

    return Number.isNaN(parsed) ? fallback : parsed;
}

function parsePositiveInteger(value: string | undefined, fallback: number): number {
    const parsed = parseInteger(value, fallback);

    return parsed > 0 ? parsed : fallback;
}

function parseCollectionSuffix(value: string | undefined): CollectionSuffix {
    return value === 'yyyyMMddHH' ? 'yyyyMMddHH' : 'yyyyMMdd';
}

/**
 * Parses `user:password` pairs separated by commas. The password may itself
 * contain colons; entries without one are ignored.
 */
export function parseUsers(value: string | undefined): Map<string, string> {
    const users = new Map<string, string>();

    for (const entry of (value || '').split(',')) {
        const separator = entry.indexOf(':');

        if (separator <= 0) {
            continue;
        }

        users.set(entry.slice(0, separator).trim(), entry.slice(separator + 1));
    }

    return users;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IAppConfig {
    const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();

    return {
        frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
        hosts: {
            importMaxSize: parsePositiveInteger(env.HOSTS_IMPORT_MAX_SIZE, 10 * 1024 * 1024)
        },
        logLevel: LOG_LEVELS.includes(logLevel) ? logLevel : 'info',
        mongo: {
            collectionSuffix: parseCollectionSuffix(env.MONGO_COLLECTION_SUFFIX),
            database: env.MONGO_DB || 'sip3',
            uri: env.MONGO_URI || 'mongodb://localhost:27017'
        },
        port: parsePositiveInteger(env.PORT, 8080),
        security: {
            enabled: env.SECURITY_ENABLED === 'true',
            users: parseUsers(env.SECURITY_USERS)
        },
        session: {
            call: {
                terminationTimeout: parseInteger(env.SESSION_CALL_TERMINATION_TIMEOUT, 10000)
            },
            media: {
                blockCount: parsePositiveInteger(env.SESSION_MEDIA_BLOCK_COUNT, 28),
                terminationTimeout: parseInteger(env.SESSION_MEDIA_TERMINATION_TIMEOUT, 60000)
            }
        }
    };
}
