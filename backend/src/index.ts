/**
 * SIP Session Explorer - Backend Entry Point
 * Media/call session reconstruction and host management over MongoDB
 */

// IMPORTANT: This must be the very first import to load environment variables
import './env';

import { getLogger, setLogLevel } from '@jitsi/logger';
import http from 'http';
import mongoose, { Connection } from 'mongoose';

import { createApp } from './app';
import { IAppConfig, loadConfig } from './config/app';
import { StaticUserProvider } from './middleware/security';
import { CallSessionService } from './services/call/CallSessionService';
import { HostService } from './services/host/HostService';
import { MongoHostRepository } from './services/host/MongoHostRepository';
import { MediaSessionService } from './services/media/MediaSessionService';
import { MongoReportStore } from './services/MongoReportStore';

const logger = getLogger('backend/src/index');

/**
 * Main application class for the SIP Session Explorer backend.
 *
 * Owns the MongoDB connection and the HTTP server; services are created once
 * the database connection is open.
 */
export class SessionExplorer {
    private config: IAppConfig;
    private connection?: Connection;
    private server?: http.Server;

    constructor(config: IAppConfig) {
        this.config = config;
        setLogLevel(config.logLevel);
    }

    /**
     * Connects to MongoDB, wires the services and starts listening.
     *
     * @example
     * ```typescript
     * const explorer = new SessionExplorer(loadConfig());
     * await explorer.start();
     * ```
     */
    public async start(): Promise<void> {
        const { mongo, session, security } = this.config;
        const connection = await mongoose.createConnection(mongo.uri, { dbName: mongo.database }).asPromise();

        this.connection = connection;
        logger.info(`Connected to MongoDB database ${mongo.database}`);

        const store = new MongoReportStore(connection, mongo.collectionSuffix);
        const app = createApp({
            callSessionService: new CallSessionService(store, session.call),
            frontendUrl: this.config.frontendUrl,
            hostService: new HostService(new MongoHostRepository(connection)),
            importMaxSize: this.config.hosts.importMaxSize,
            isDatabaseConnected: () => connection.readyState === mongoose.ConnectionStates.connected,
            mediaSessionService: new MediaSessionService(store, session.media),
            security: {
                enabled: security.enabled,
                providers: [ new StaticUserProvider(security.users) ]
            }
        });

        const server = http.createServer(app);

        this.server = server;
        await new Promise<void>(resolve => server.listen(this.config.port, resolve));

        logger.info(`SIP Session Explorer running on port ${this.config.port}`);
        logger.info(`Security ${security.enabled ? 'enabled' : 'disabled'}`);
    }

    /**
     * Stops accepting requests and closes the database connection.
     */
    public async stop(): Promise<void> {
        const server = this.server;

        if (server) {
            await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
        }
        await this.connection?.close();
        logger.info('SIP Session Explorer stopped');
    }
}

// Start the application
if (require.main === module) {
    const explorer = new SessionExplorer(loadConfig());

    explorer.start().catch(error => {
        logger.error('Failed to start SIP Session Explorer:', error);
        process.exit(1);
    });

    process.on('SIGTERM', () => {
        explorer.stop().catch(error => logger.error('Failed to stop cleanly:', error));
    });
}
