/**
 * Configuration loading tests
 */
import { loadConfig, parseUsers } from '../src/config/app';

describe('loadConfig', () => {
    it('should apply defaults to an empty environment', () => {
        const config = loadConfig({});

        expect(config.port).toBe(8080);
        expect(config.logLevel).toBe('info');
        expect(config.mongo).toEqual({ collectionSuffix: 'yyyyMMdd', database: 'sip3', uri: 'mongodb://localhost:27017' });
        expect(config.session).toEqual({
            call: { terminationTimeout: 10000 },
            media: { blockCount: 28, terminationTimeout: 60000 }
        });
        expect(config.security.enabled).toBe(false);
        expect(config.hosts.importMaxSize).toBe(10 * 1024 * 1024);
    });

    it('should read overrides', () => {
        const config = loadConfig({
            LOG_LEVEL: 'DEBUG',
            MONGO_COLLECTION_SUFFIX: 'yyyyMMddHH',
            SECURITY_ENABLED: 'true',
            SECURITY_USERS: 'admin:test-secret',
            SESSION_MEDIA_BLOCK_COUNT: '10'
        });

        expect(config.logLevel).toBe('debug');
        expect(config.mongo.collectionSuffix).toBe('yyyyMMddHH');
        expect(config.security.enabled).toBe(true);
        expect(config.security.users.get('admin')).toBe('test-secret');
        expect(config.session.media.blockCount).toBe(10);
    });

    it('should fall back on invalid values', () => {
        const config = loadConfig({ LOG_LEVEL: 'verbose', PORT: 'http', SESSION_MEDIA_BLOCK_COUNT: '0' });

        expect(config.logLevel).toBe('info');
        expect(config.port).toBe(8080);
        expect(config.session.media.blockCount).toBe(28);
    });
});

describe('parseUsers', () => {
    it('should split at the first colon only', () => {
        expect([ ...parseUsers('admin:test:secret, ops:pw') ]).toEqual([
            [ 'admin', 'test:secret' ],
            [ 'ops', 'pw' ]
        ]);
    });

    it('should skip entries without a password separator', () => {
        expect(parseUsers('admin,:pw').size).toBe(0);
    });
});
