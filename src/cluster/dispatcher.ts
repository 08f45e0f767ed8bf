/**
 * ============================================================
 * Dispatcher - 논리 요청 하나의 노드 선택/전송/failover
 * ============================================================
 *
 * 요청 기술자를 정규화하고 ServerPool에서 노드를 골라 트랜스포트로 전송합니다.
 * Connection 에러만 다른 노드로 재시도하며, 나머지 실패는 정리된
 * TransportError로 호출 측에 전달합니다.
 *
 * @module cluster/dispatcher
 * @description
 * - 고정 노드(pinned) 요청: failover/트레이스 없음 (멤버십 조회용)
 * - 실패 노드 집합은 논리 요청마다 새로 만들어 동시 요청끼리 공유하지 않음
 * - 연결 실패: noRefresh 모드면 목록에서 제거, 아니면 실패 표시 후 다음 선택 시 갱신
 * - Missing + ignoreMissing → undefined
 * - 서버 응답 본문의 `error` / `error.reason`으로 에러 메시지 교체
 * - debug 모드: 최종 에러를 스택과 함께 error 레벨로 로깅
 */

import {
    isTransportError,
    RequestError,
    TransportError,
} from '../errors/transport.error';
import { resolveTraceSink, TraceOption } from '../trace/sinks';
import { Tracer } from '../trace/tracer';
import { Codec, JsonCodec } from '../transport/codec';
import type { Transport } from '../transport/transport';
import type { RequestDescriptor, TransportRequest } from '../transport/types';
import { createLogger } from '../utils/logger';
import type { NodeAddress } from './node-address';
import { FailedServers, ServerPool } from './server-pool';

const logger = createLogger('Dispatcher');

/** 빈 성공 응답 대체 본문 */
const EMPTY_SUCCESS = '{"ok":true}';

/** 클러스터 멤버십 조회 경로 */
export const MEMBERSHIP_PATH = '/_cluster/nodes';

export interface DispatcherOptions {
    transport: Transport;
    /** 시드 노드 (미지정 시 `127.0.0.1:<defaultPort>`) */
    servers?: readonly NodeAddress[];
    maxRequests?: number;
    noRefresh?: boolean;
    traceCalls?: TraceOption;
    /** 최종 에러를 스택과 함께 error 레벨로 로깅 */
    debug?: boolean;
    codec?: Codec;
    shuffle?: <T>(items: readonly T[]) => T[];
    /** 트레이스 타임스탬프 소스 (테스트용) */
    now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 서버 응답 본문에서 에러 메시지 추출
 * (`{"error":"..."}` 또는 `{"error":{"type":"...","reason":"..."}}`)
 */
export function serverErrorMessage(content: unknown): string | undefined {
    if (!isRecord(content)) return undefined;
    const error = content.error;
    if (typeof error === 'string' && error) return error;
    if (isRecord(error) && typeof error.reason === 'string') {
        return typeof error.type === 'string' ? `${error.type}: ${error.reason}` : error.reason;
    }
    return undefined;
}

export class Dispatcher {
    readonly transport: Transport;
    readonly pool: ServerPool;
    debug: boolean;

    private readonly codec: Codec;
    private readonly now?: () => Date;
    private tracer: Tracer | null = null;

    constructor(options: DispatcherOptions) {
        this.transport = options.transport;
        this.codec = options.codec ?? new JsonCodec();
        this.debug = options.debug ?? false;
        this.now = options.now;

        const seeds = options.servers && options.servers.length > 0
            ? options.servers
            : [`127.0.0.1:${this.transport.defaultPort}`];

        this.pool = new ServerPool({
            defaultServers: seeds,
            protocol: this.transport.protocol,
            probe: (server) => this.request({ path: MEMBERSHIP_PATH }, server),
            maxRequests: options.maxRequests,
            noRefresh: options.noRefresh,
            shuffle: options.shuffle,
        });

        this.setTraceCalls(options.traceCalls);
    }

    /**
     * 트레이스 출력 설정 (false/null: 해제)
     */
    setTraceCalls(option: TraceOption): void {
        this.tracer?.close();
        const sink = resolveTraceSink(option);
        this.tracer = sink ? new Tracer(sink, { now: this.now }) : null;
    }

    get tracing(): boolean {
        return this.tracer !== null;
    }

    /**
     * 논리 요청 하나를 실행
     *
     * @param descriptor - 요청 기술자
     * @param pinnedServer - 지정 시 이 노드로만 전송 (failover/트레이스 없음)
     * @returns 디코딩된 결과, rawOutput이면 원본 텍스트, 무시된 Missing이면 undefined
     */
    async request(descriptor: RequestDescriptor, pinnedServer?: NodeAddress): Promise<unknown> {
        const request = this.normalize(descriptor);
        const body = await this.send(request, descriptor, pinnedServer);
        if (body === null) {
            return undefined;
        }
        return this.response(body, descriptor, pinnedServer !== undefined);
    }

    private normalize(descriptor: RequestDescriptor): TransportRequest {
        const path = descriptor.path ?? '/';
        const body = descriptor.body;

        let data: string | undefined;
        if (Buffer.isBuffer(body)) {
            data = body.toString('utf-8');
        } else if (body !== undefined) {
            data = this.codec.encode(body);
        }

        return {
            method: descriptor.method ?? 'GET',
            path: path.startsWith('/') ? path : `/${path}`,
            query: descriptor.query ?? {},
            data,
        };
    }

    /**
     * 전송 + failover 루프
     *
     * @returns 응답 본문, 무시된 Missing이면 null
     */
    private async send(
        request: TransportRequest,
        descriptor: RequestDescriptor,
        pinnedServer?: NodeAddress
    ): Promise<string | null> {
        const failed: FailedServers = new Map();
        for (;;) {
            const server = pinnedServer ?? await this.pool.nextServer(failed);
            if (pinnedServer === undefined) {
                this.tracer?.logRequest(this.transport.protocol, server, request);
            }

            try {
                const body = await this.transport.sendRequest(server, request);
                return body || EMPTY_SUCCESS;
            } catch (error: unknown) {
                if (pinnedServer === undefined && this.shouldRetry(server, error, failed)) {
                    continue;
                }

                const finalError = this.finalizeError(descriptor, error);
                if (!finalError) {
                    return null;
                }
                if (this.debug) {
                    logger.error(finalError.toDetailedString(true));
                }
                throw finalError;
            }
        }
    }

    /**
     * Connection 에러면 노드를 실패 처리하고 true 반환
     * (남은 후보가 없으면 다음 nextServer()가 NoServers로 실패)
     */
    private shouldRetry(server: NodeAddress, error: unknown, failed: FailedServers): boolean {
        if (!isTransportError(error, 'Connection')) {
            return false;
        }

        const reason = error.message || 'Unknown';
        logger.warn(`Error connecting to '${server}' : ${reason}`);

        if (this.pool.noRefresh) {
            this.pool.removeServer(server, failed, reason);
        } else {
            this.pool.markFailed(server, failed, reason);
            this.pool.scheduleRefresh();
        }

        if (!this.pool.hasCandidates(failed)) {
            logger.warn('All known servers have failed for this request');
        }
        return true;
    }

    /**
     * 에러 정리: 분류되지 않은 실패 감싸기, Missing 무시, 서버 진단 메시지 반영
     *
     * @returns 던질 에러, 무시된 Missing이면 undefined
     */
    private finalizeError(descriptor: RequestDescriptor, error: unknown): TransportError | undefined {
        const finalError = isTransportError(error)
            ? error
            : new RequestError(error instanceof Error ? error.message : String(error), { request: descriptor });

        if (descriptor.ignoreMissing && isTransportError(finalError, 'Missing')) {
            return undefined;
        }

        finalError.context.request = descriptor;

        const raw = finalError.context.content;
        if (typeof raw === 'string' && raw) {
            const content = this.tryDecode(raw);
            this.tracer?.logResponse(content ?? raw);

            const message = serverErrorMessage(content);
            if (message) {
                finalError.message = message;
                if (isRecord(content) && content.error_trace !== undefined) {
                    finalError.context.errorTrace = content.error_trace;
                }
                delete finalError.context.content;
            }
        }

        return finalError;
    }

    private tryDecode(raw: string): unknown {
        try {
            return this.codec.decode(raw);
        } catch (e: unknown) {
            // 본문이 JSON이 아니면 원본 텍스트를 그대로 유지
            logger.debug('에러 응답 본문 디코딩 실패', { error: e instanceof Error ? e.message : String(e) });
            return undefined;
        }
    }

    private response(body: string, descriptor: RequestDescriptor, pinned: boolean): unknown {
        const { rawOutput, postProcess } = descriptor;

        if (rawOutput && !postProcess) {
            if (!pinned) this.tracer?.logResponse(body);
            return body;
        }

        let result = this.codec.decode(body);
        if (!pinned) this.tracer?.logResponse(result);

        if (postProcess) {
            result = postProcess(result);
            if (rawOutput) return this.codec.encode(result);
        }
        return result;
    }
}
