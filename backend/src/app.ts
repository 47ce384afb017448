/**
 * Express application assembly
 */
import cors from 'cors';
import express, { Application, Request, Response } from 'express';
import helmet from 'helmet';

import { apiResponseMiddleware, globalErrorHandler, notFoundHandler, requestLogger } from './middleware/apiResponse';
import { IAuthenticationProvider, SecurityFilter } from './middleware/security';
import { createHostsRouter } from './routes/hosts';
import { createSessionsRouter } from './routes/sessions';
import { CallSessionService } from './services/call/CallSessionService';
import { HostService } from './services/host/HostService';
import { MediaSessionService } from './services/media/MediaSessionService';
import { IHealthResponse } from './types/api';

export interface IAppDependencies {
    callSessionService: CallSessionService;
    frontendUrl: string;
    hostService: HostService;
    importMaxSize: number;
    isDatabaseConnected: () => boolean;
    mediaSessionService: MediaSessionService;
    security: {
        enabled: boolean;
        providers: IAuthenticationProvider[];
    };
}

/**
 * Builds the HTTP application without binding a port.
 */
export function createApp(deps: IAppDependencies): Application {
    const app = express();

    // Security and basic middleware
    app.use(helmet());
    app.use(
        cors({
            origin: deps.frontendUrl,
            credentials: true
        })
    );

    // Must precede the body parsers, whose errors are answered through res.apiError
    app.use(apiResponseMiddleware);
    app.use(express.json({ limit: '10mb' }));
    app.use(express.urlencoded({ extended: true }));
    app.use(requestLogger);
    app.use(new SecurityFilter(deps.security).router());

    // Health check endpoint
    app.get('/health', (_req: Request, res: Response) => {
        const connected = deps.isDatabaseConnected();
        const health: IHealthResponse = {
            services: {
                database: connected ? 'connected' : 'disconnected'
            },
            status: connected ? 'healthy' : 'degraded',
            timestamp: Date.now()
        };

        res.apiSuccess(health);
    });

    app.use('/session', createSessionsRouter(deps));
    app.use('/hosts', createHostsRouter(deps));

    app.use(notFoundHandler);
    app.use(globalErrorHandler);

    return app;
}
