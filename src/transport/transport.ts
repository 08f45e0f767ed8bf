/**
 * ============================================================
 * Transport - 트랜스포트 어댑터 기본 클래스
 * ============================================================
 *
 * 단일 노드에 요청 한 건을 보내고 응답 본문 텍스트를 반환하는 계약입니다.
 * 실패는 반드시 분류된 TransportError로 throw 해야 합니다:
 *
 * - Connection: 연결 거부/리셋/라우팅 불가 등 (다른 노드로 failover 대상)
 * - Timeout: 설정된 타임아웃 초과
 * - Missing(404) / Conflict(409) / Request(기타 실패 상태)
 *
 * 모든 Request 계열 에러는 `{ server, statusCode, statusMsg, content }` 컨텍스트를 가집니다.
 *
 * @module transport/transport
 */

import type { NodeAddress } from '../cluster/node-address';
import { InternalError, ParamError } from '../errors/transport.error';
import type { TransportOptions, TransportRequest } from './types';

/** 기본 타임아웃 (ms) */
export const DEFAULT_TIMEOUT = 120000;

export abstract class Transport {
    /** 프로토콜 이름 (멤버십 응답의 `<protocol>_address` 조회에 사용) */
    abstract readonly protocol: string;
    /** 기본 포트 (시드 노드 미지정 시 `127.0.0.1:<defaultPort>`) */
    abstract readonly defaultPort: number;

    private timeoutMs: number;
    private deflateEnabled: boolean;

    constructor(options: TransportOptions = {}) {
        this.timeoutMs = Transport.validateTimeout(options.timeout ?? DEFAULT_TIMEOUT);
        this.deflateEnabled = options.deflate ?? false;
    }

    private static validateTimeout(ms: number): number {
        if (!Number.isFinite(ms) || ms <= 0) {
            throw new ParamError(`Timeout must be a positive number of milliseconds, got '${ms}'`);
        }
        return ms;
    }

    get timeout(): number {
        return this.timeoutMs;
    }

    /** 변경 시 캐시된 클라이언트를 폐기 (다음 요청에서 새 설정으로 생성) */
    set timeout(ms: number) {
        this.timeoutMs = Transport.validateTimeout(ms);
        this.clearClients();
    }

    get deflate(): boolean {
        return this.deflateEnabled;
    }

    set deflate(enabled: boolean) {
        this.deflateEnabled = enabled;
        this.clearClients();
    }

    /**
     * 캐시된 클라이언트 폐기 (클라이언트를 캐싱하는 어댑터가 재정의)
     */
    clearClients(): void {
        // 기본 구현은 캐시가 없음
    }

    /**
     * 단일 노드로 요청 전송
     *
     * @returns 응답 본문 텍스트 (빈 문자열 가능)
     */
    async sendRequest(server: NodeAddress, request: TransportRequest): Promise<string> {
        throw new InternalError(
            `Transport '${this.constructor.name}' does not implement sendRequest()`,
            { server, method: request.method, path: request.path }
        );
    }
}

/** 어댑터 생성자 */
export type TransportConstructor = new (options?: TransportOptions) => Transport;
