import type { NodeAddress } from '../../cluster/node-address';
import { MEMBERSHIP_PATH } from '../../cluster/dispatcher';
import { ConnectionError } from '../../errors/transport.error';
import { Transport } from '../../transport/transport';
import type { TransportRequest } from '../../transport/types';

export type NodeHandler = (request: TransportRequest) => string | Promise<string>;

export interface RecordedCall {
    server: NodeAddress;
    request: TransportRequest;
}

/**
 * 노드별 응답을 지정할 수 있는 인프로세스 트랜스포트
 * (핸들러가 없는 노드는 연결 거부)
 */
export class FakeTransport extends Transport {
    readonly protocol = 'http';
    readonly defaultPort = 9200;
    readonly calls: RecordedCall[] = [];
    clearCount = 0;

    private handlers: Map<NodeAddress, NodeHandler> = new Map();

    serve(server: NodeAddress, handler: NodeHandler): this {
        this.handlers.set(server, handler);
        return this;
    }

    /**
     * 멤버십 조회에는 members를, 그 외 요청에는 `{"node":"<server>"}`를 응답
     */
    cluster(members: NodeAddress[], servers: NodeAddress[] = members): this {
        for (const server of servers) {
            this.serve(server, (request) => (request.path === MEMBERSHIP_PATH
                ? membership(members)
                : JSON.stringify({ node: server })));
        }
        return this;
    }

    down(server: NodeAddress): this {
        this.handlers.delete(server);
        return this;
    }

    override clearClients(): void {
        this.clearCount++;
    }

    override async sendRequest(server: NodeAddress, request: TransportRequest): Promise<string> {
        this.calls.push({ server, request });
        const handler = this.handlers.get(server);
        if (!handler) {
            throw new ConnectionError('Connection refused', { server });
        }
        return handler(request);
    }

    /** 멤버십 조회를 제외한 요청이 전송된 노드 */
    dataCalls(): NodeAddress[] {
        return this.calls.filter(c => c.request.path !== MEMBERSHIP_PATH).map(c => c.server);
    }

    probeCalls(): NodeAddress[] {
        return this.calls.filter(c => c.request.path === MEMBERSHIP_PATH).map(c => c.server);
    }
}

export function membership(servers: NodeAddress[]): string {
    const nodes: Record<string, { http_address: string }> = {};
    servers.forEach((server, i) => {
        nodes[`node-${i}`] = { http_address: `inet[/${server}]` };
    });
    return JSON.stringify({ cluster_name: 'test-cluster', nodes });
}

/** 순서를 유지하는 셔플 (결정적 테스트용) */
export function identity<T>(items: readonly T[]): T[] {
    return [...items];
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
}

/** 외부에서 완료 시점을 정하는 Promise */
export function deferred<T = void>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}
