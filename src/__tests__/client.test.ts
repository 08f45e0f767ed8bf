jest.mock('../utils/logger', () => ({
    createLogger: () => ({
        info: () => {},
        warn: () => {},
        error: () => {},
        debug: () => {},
    }),
}));

import { SearchClient, SearchClientOptions } from '../client';
import { registerTransport } from '../transport/registry';
import type { TransportOptions } from '../transport/types';
import { MissingError, ParamError } from '../errors/transport.error';
import { FakeTransport, identity } from './helpers/fake-transport';

const A = '10.0.0.1:9200';
const B = '10.0.0.2:9200';

class TwoNodeTransport extends FakeTransport {
    constructor(options?: TransportOptions) {
        super(options);
        this.cluster([A, B]);
        this.serve(B, (request) => {
            if (request.path === '/tweets/tweet/404') {
                throw new MissingError('Not Found (404)', { server: B, statusCode: 404, content: '{"found":false}' });
            }
            return JSON.stringify({ node: B, path: request.path });
        });
    }
}

registerTransport('two-node', TwoNodeTransport);

function makeClient(options: SearchClientOptions = {}): { client: SearchClient; transport: FakeTransport } {
    const client = new SearchClient({
        servers: `${A},${B}`,
        transport: 'two-node',
        noRefresh: true,
        traceCalls: false,
        shuffle: identity,
        ...options,
    });
    const transport = client.dispatcher.transport;
    if (!(transport instanceof FakeTransport)) {
        throw new Error('expected FakeTransport');
    }
    return { client, transport };
}

describe('SearchClient', () => {
    it('엔드포인트 호출을 요청으로 변환해 전송한다', async () => {
        const { client, transport } = makeClient();

        await expect(client.call('get', { index: 'tweets', type: 'tweet', id: 1 })).resolves.toEqual({ node: A });
        expect(transport.calls[0].request).toEqual({
            method: 'GET',
            path: '/tweets/tweet/1',
            query: {},
            data: undefined,
        });
    });

    it('exists는 없는 문서에 undefined를 반환한다', async () => {
        const { client } = makeClient();
        await client.call('refreshIndex');

        await expect(client.call('exists', { index: 'tweets', type: 'tweet', id: 404 })).resolves.toBeUndefined();
    });

    it('파라미터 오류는 전송 전에 Param 에러', async () => {
        const { client, transport } = makeClient();

        await expect(client.call('get', { index: 'tweets' })).rejects.toBeInstanceOf(ParamError);
        expect(transport.calls).toEqual([]);
    });

    it('errorTrace / camelCase는 모든 요청에 쿼리를 붙인다', async () => {
        const { client, transport } = makeClient({ errorTrace: true });

        expect(client.errorTrace()).toBe(true);
        expect(client.camelCase(true)).toBe(true);
        await client.call('clusterHealth');
        await client.request({ path: '/_stats', query: { level: 'indices' } });

        expect(transport.calls.map(c => c.request.query)).toEqual([
            { error_trace: 'true', case: 'camelCase' },
            { error_trace: 'true', case: 'camelCase', level: 'indices' },
        ]);

        expect(client.errorTrace(false)).toBe(false);
    });

    it('timeout()은 값을 바꾸고 캐시된 클라이언트를 비운다', () => {
        const { client, transport } = makeClient({ timeout: 2000 });

        expect(client.timeout()).toBe(2000);
        expect(client.timeout(5000)).toBe(5000);
        expect(transport.clearCount).toBe(1);
    });

    it('refreshServers()와 currentServer()', async () => {
        const { client, transport } = makeClient({ noRefresh: false });

        await expect(client.refreshServers()).resolves.toEqual([A, B]);
        await expect(client.currentServer()).resolves.toBe(A);
        expect(client.servers).toEqual([B, A]);
        expect(client.defaultServers).toEqual([A, B]);
        expect(transport.probeCalls()).toEqual([A]);
    });

    it('traceCalls()로 트레이스를 켠다', async () => {
        const { client } = makeClient();
        const writes: string[] = [];

        client.traceCalls({ write: (text: string) => { writes.push(text); } });
        await client.call('nodes');

        expect(writes).toHaveLength(2);
        expect(writes[0]).toContain(`Server: ${A}\ncurl -XGET 'http://127.0.0.1:9200/_cluster/nodes?pretty=1'`);
    });

    it('close()는 연결을 정리하고 트레이스를 끈다', () => {
        const { client, transport } = makeClient({ traceCalls: { write: () => {} } });

        client.close();

        expect(transport.clearCount).toBe(1);
        expect(client.dispatcher.tracing).toBe(false);
    });

    it('알 수 없는 트랜스포트는 Param 에러', () => {
        expect(() => makeClient({ transport: 'carrier-pigeon' })).toThrow(ParamError);
    });

    it('잘못된 옵션은 Param 에러', () => {
        expect(() => makeClient({ maxRequests: -3 })).toThrow(ParamError);
    });
});
