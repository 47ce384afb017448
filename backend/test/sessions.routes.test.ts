/**
 * Session API integration tests against an in-process server
 */
import { MediaSessionDetails } from '../../shared/types';
import { CallSessionService } from '../src/services/call/CallSessionService';
import { MediaSessionService } from '../src/services/media/MediaSessionService';

import { InMemoryReportStore } from './support/InMemoryReportStore';
import { report } from './support/reports';
import { ITestServer, readBody, startTestServer, testDependencies } from './support/testServer';

describe('Sessions API', () => {
    let server: ITestServer;

    beforeEach(async () => {
        const store = new InMemoryReportStore({
            rtpr_rtp_index: [ report({ duration: 400, started_at: 1000, terminated_at: 1400 }) ],
            rtpr_rtp_raw: [ report({ duration: 400, started_at: 1000 }) ],
            sip_call_raw: [
                { call_id: 'call-1', created_at: 1000, method: 'INVITE' },
                { call_id: 'call-9', created_at: 1000, method: 'INVITE' }
            ]
        });

        server = await startTestServer(testDependencies({
            callSessionService: new CallSessionService(store, { terminationTimeout: 10000 }),
            mediaSessionService: new MediaSessionService(store, { blockCount: 4, terminationTimeout: 60000 })
        }));
    });

    afterEach(async () => {
        await server.close();
    });

    function post(route: string, body: unknown): Promise<Response> {
        return fetch(`${server.baseUrl}/session${route}`, {
            body: JSON.stringify(body),
            headers: { 'Content-Type': 'application/json' },
            method: 'POST'
        });
    }

    describe('POST /session/media', () => {
        it('should return merged legs with their blocks', async () => {
            const response = await post('/media', { call_id: [ 'call-1' ], created_at: 1000, terminated_at: 1400 });
            const body = await readBody<MediaSessionDetails[]>(response);

            expect(response.status).toBe(200);
            expect(body.data).toHaveLength(1);

            const [ details ] = body.data ?? [];

            expect(details.rtcp).toBeNull();
            expect(details.rtp?.legId).toBe('call-1:10.0.0.1:10000:10.0.0.2:20000');
            expect(details.rtp?.out.blocks.map(block => block.packets.expected)).toEqual([ 100, 100, 100, 100 ]);
        });

        it('should accept a single call id string', async () => {
            const response = await post('/media', { call_id: 'call-1', created_at: 1000, terminated_at: 1400 });

            expect((await readBody<MediaSessionDetails[]>(response)).data).toHaveLength(1);
        });

        it('should return an empty list for an unknown call', async () => {
            const response = await post('/media', { call_id: [ 'call-9' ], created_at: 1000, terminated_at: 1400 });

            expect((await readBody(response)).data).toEqual([]);
        });

        it('should name a missing field', async () => {
            const response = await post('/media', { created_at: 1000, terminated_at: 1400 });
            const body = await readBody(response);

            expect(response.status).toBe(400);
            expect(body.error).toMatchObject({ code: 'MISSING_PARAMETER', field: 'call_id', message: 'call_id' });
        });

        it('should reject fields of the wrong type', async () => {
            const response = await post('/media', { call_id: [ 'call-1' ], created_at: 'yesterday', terminated_at: 1400 });

            expect(response.status).toBe(400);
            expect((await readBody(response)).error?.code).toBe('INVALID_REQUEST');
        });

        it('should reject malformed JSON', async () => {
            const response = await fetch(`${server.baseUrl}/session/media`, {
                body: '{ "call_id": ',
                headers: { 'Content-Type': 'application/json' },
                method: 'POST'
            });

            expect(response.status).toBe(400);
        });
    });

    describe('POST /session/call', () => {
        it('should return raw call documents of the requested calls', async () => {
            const response = await post('/call', { call_id: [ 'call-1' ], created_at: 1000, terminated_at: 1400 });

            expect(response.status).toBe(200);
            expect((await readBody(response)).data).toEqual([ { call_id: 'call-1', created_at: 1000, method: 'INVITE' } ]);
        });

        it('should name the first missing field', async () => {
            const response = await post('/call', { call_id: [ 'call-1' ] });

            expect((await readBody(response)).error?.field).toBe('created_at');
        });
    });
});
