/**
 * HTTP security filter
 * Public allow-list, HTTP Basic and form login against pluggable providers
 */
import { getLogger } from '@jitsi/logger';
import crypto from 'crypto';
import { NextFunction, Request, Response, Router } from 'express';

import { AccessDeniedError } from '../types/errors';

import { sendError } from './apiResponse';

const logger = getLogger('backend/src/middleware/security');

// Ant-style patterns; a trailing `/**` matches the path and everything below it
export const PUBLIC_PATHS = [
    '/swagger-resources/**',
    '/swagger-ui/**',
    '/v3/api-docs/**',
    '/management/configuration/hoof',
    '/health'
];

export interface IAuthenticationProvider {
    readonly name: string;
    authenticate(username: string, password: string): Promise<boolean>;
}

export interface ISecurityOptions {
    enabled: boolean;
    providers: IAuthenticationProvider[];
}

interface ICredentials {
    password: string;
    username: string;
}

/**
 * Checks credentials against a fixed user table.
 */
export class StaticUserProvider implements IAuthenticationProvider {
    public readonly name = 'static';
    private users: Map<string, string>;

    constructor(users: Map<string, string>) {
        this.users = users;
    }

    public async authenticate(username: string, password: string): Promise<boolean> {
        const expected = this.users.get(username);

        if (expected === undefined) {
            return false;
        }

        const expectedBuffer = Buffer.from(expected, 'utf8');
        const actualBuffer = Buffer.from(password, 'utf8');

        return expectedBuffer.length === actualBuffer.length && crypto.timingSafeEqual(expectedBuffer, actualBuffer);
    }
}

export function isPublicPath(path: string): boolean {
    return PUBLIC_PATHS.some(pattern => {
        if (pattern.endsWith('/**')) {
            const base = pattern.slice(0, -3);

            return path === base || path.startsWith(`${base}/`);
        }

        return path === pattern;
    });
}

/**
 * Decodes an `Authorization: Basic` header. The scheme is matched
 * case-insensitively.
 */
export function parseBasicCredentials(header: string | undefined): ICredentials | null {
    const match = /^basic\s+(\S+)$/i.exec(header?.trim() || '');

    if (!match) {
        return null;
    }

    const decoded = Buffer.from(match[1], 'base64').toString('utf8');
    const separator = decoded.indexOf(':');

    if (separator < 0) {
        return null;
    }

    return {
        password: decoded.slice(separator + 1),
        username: decoded.slice(0, separator)
    };
}

function readLoginBody(body: unknown): ICredentials | null {
    if (typeof body !== 'object' || body === null) {
        return null;
    }

    const username = 'username' in body ? body.username : undefined;
    const password = 'password' in body ? body.password : undefined;

    if (typeof username !== 'string' || typeof password !== 'string') {
        return null;
    }

    return { password, username };
}

export class SecurityFilter {
    private enabled: boolean;
    private providers: IAuthenticationProvider[] = [];

    constructor(options: ISecurityOptions) {
        this.enabled = options.enabled;

        if (this.enabled) {
            for (const provider of options.providers) {
                this.providers.push(provider);
                logger.info(`Authentication provider '${provider.name}' added.`);
            }
        }
    }

    /**
     * Resolves to true when any provider accepts the credentials.
     */
    public async authenticate({ username, password }: ICredentials): Promise<boolean> {
        for (const provider of this.providers) {
            if (await provider.authenticate(username, password)) {
                return true;
            }
        }

        return false;
    }

    /**
     * Login endpoint and request filter. With security disabled every request
     * passes and no login endpoint is mounted.
     */
    public router(): Router {
        const router = Router();

        if (!this.enabled) {
            return router;
        }

        // POST /login - Form or JSON login
        router.post('/login', async (req: Request, res: Response) => {
            try {
                const credentials = readLoginBody(req.body);

                if (credentials && await this.authenticate(credentials)) {
                    logger.info(`Login attempt. User: ${credentials.username}, State: SUCCESSFUL`);

                    return res.apiSuccess({ username: credentials.username });
                }

                logger.info(`Login attempt. User: ${credentials?.username ?? '<none>'}, State: FAILED`);
                sendError(res, new AccessDeniedError('Bad credentials'), 'Login failed');
            } catch (error) {
                sendError(res, error, 'Login failed');
            }
        });

        router.use(async (req: Request, res: Response, next: NextFunction) => {
            if (isPublicPath(req.path)) {
                return next();
            }

            try {
                const credentials = parseBasicCredentials(req.get('Authorization'));

                if (credentials && await this.authenticate(credentials)) {
                    req.principal = credentials.username;

                    return next();
                }

                sendError(res, new AccessDeniedError(), 'Access denied');
            } catch (error) {
                next(error);
            }
        });

        return router;
    }
}
