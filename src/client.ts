/**
 * ============================================================
 * SearchClient - 검색 클러스터 클라이언트
 * ============================================================
 *
 * 옵션 검증, 트랜스포트 생성, Dispatcher 소유, 엔드포인트 호출을 묶은
 * 공개 진입점입니다. 지정하지 않은 옵션은 환경 설정(getConfig)에서 가져옵니다.
 *
 * @module client
 * @example
 * ```typescript
 * const client = new SearchClient({ servers: '10.0.0.1:9200,10.0.0.2:9200' });
 *
 * await client.call('index', { index: 'tweets', type: 'tweet', id: 1, body: { text: 'hello' } });
 * const found = await client.call('exists', { index: 'tweets', type: 'tweet', id: 2 });
 * // 없으면 undefined
 * ```
 */

import { NodeAddress, parseServerList } from './cluster/node-address';
import { Dispatcher } from './cluster/dispatcher';
import { validateClientOptions } from './config/client-options.schema';
import { getConfig } from './config/env';
import { buildRequest, CallOptions, EndpointParams } from './endpoints/builder';
import type { EndpointName } from './endpoints/table';
import { TraceOption, traceOptionFromEnv } from './trace/sinks';
import type { Codec } from './transport/codec';
import { createTransport } from './transport/registry';
import type { RequestDescriptor } from './transport/types';

export interface SearchClientOptions {
    /** 시드 노드 (`"host:port,host:port"` 또는 배열) */
    servers?: string | string[];
    /** 트랜스포트 이름 (기본값: 'http') */
    transport?: string;
    /** 요청 타임아웃 (ms) */
    timeout?: number;
    /** 노드 목록 갱신 주기 (요청 수, 0: 비활성) */
    maxRequests?: number;
    noRefresh?: boolean;
    deflate?: boolean;
    /** true: stderr, 문자열: `<name>.<pid>` 파일, 객체: write(text) 대상 */
    traceCalls?: TraceOption;
    debug?: boolean;
    /** 서버 에러에 error_trace 요청 */
    errorTrace?: boolean;
    /** 응답 필드명을 camelCase로 요청 */
    camelCase?: boolean;
    codec?: Codec;
    /** 노드 순서 셔플 함수 (테스트용) */
    shuffle?: <T>(items: readonly T[]) => T[];
}

export class SearchClient {
    readonly dispatcher: Dispatcher;
    private baseQuery: Record<string, string> = {};

    constructor(options: SearchClientOptions = {}) {
        const validated = validateClientOptions(options);
        const env = getConfig();

        const servers = validated.servers !== undefined ? parseServerList(validated.servers) : env.servers;
        const transport = createTransport(validated.transport ?? env.transport, {
            timeout: validated.timeout ?? env.timeout,
            deflate: validated.deflate ?? env.deflate,
        });

        this.dispatcher = new Dispatcher({
            transport,
            servers,
            maxRequests: validated.maxRequests ?? env.maxRequests,
            noRefresh: validated.noRefresh ?? env.noRefresh,
            traceCalls: options.traceCalls ?? traceOptionFromEnv(env.traceCalls),
            debug: validated.debug ?? env.debug,
            codec: options.codec,
            shuffle: options.shuffle,
        });

        this.errorTrace(validated.errorTrace ?? false);
        this.camelCase(validated.camelCase ?? false);
    }

    /**
     * 엔드포인트 호출
     *
     * @throws {ParamError} 파라미터 오류 (전송 전)
     */
    async call(endpoint: EndpointName, params: EndpointParams = {}, options: CallOptions = {}): Promise<unknown> {
        return this.dispatcher.request(buildRequest(endpoint, params, options, this.baseQuery));
    }

    /**
     * 요청 기술자를 직접 전송
     */
    async request(descriptor: RequestDescriptor): Promise<unknown> {
        return this.dispatcher.request({
            ...descriptor,
            query: { ...this.baseQuery, ...descriptor.query },
        });
    }

    refreshServers(): Promise<NodeAddress[]> {
        return this.dispatcher.pool.refreshServers();
    }

    currentServer(): Promise<NodeAddress> {
        return this.dispatcher.pool.currentServer();
    }

    get servers(): NodeAddress[] {
        return this.dispatcher.pool.servers;
    }

    get defaultServers(): NodeAddress[] {
        return this.dispatcher.pool.defaultServers;
    }

    /**
     * error_trace 쿼리 토글
     *
     * @returns 현재 값
     */
    errorTrace(enabled?: boolean): boolean {
        return this.toggleBaseQuery('error_trace', 'true', enabled);
    }

    /**
     * 응답 필드명 camelCase 토글
     */
    camelCase(enabled?: boolean): boolean {
        return this.toggleBaseQuery('case', 'camelCase', enabled);
    }

    traceCalls(option: TraceOption): void {
        this.dispatcher.setTraceCalls(option);
    }

    /**
     * 타임아웃 조회/변경 (변경 시 캐시된 HTTP 클라이언트 재생성)
     */
    timeout(ms?: number): number {
        if (ms !== undefined) {
            this.dispatcher.transport.timeout = ms;
        }
        return this.dispatcher.transport.timeout;
    }

    /**
     * 캐시된 연결과 트레이스 파일 정리
     */
    close(): void {
        this.dispatcher.transport.clearClients();
        this.dispatcher.setTraceCalls(false);
    }

    private toggleBaseQuery(key: string, value: string, enabled?: boolean): boolean {
        if (enabled === true) {
            this.baseQuery[key] = value;
        } else if (enabled === false) {
            delete this.baseQuery[key];
        }
        return key in this.baseQuery;
    }
}

export function createSearchClient(options?: SearchClientOptions): SearchClient {
    return new SearchClient(options);
}
