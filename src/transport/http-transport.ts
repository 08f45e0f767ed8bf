/**
 * ============================================================
 * HttpTransport - axios 기반 HTTP 트랜스포트 어댑터
 * ============================================================
 *
 * 노드에 HTTP 요청을 보내고 실패를 TransportError 종류로 분류합니다.
 *
 * @module transport/http-transport
 * @description
 * - 실행 컨텍스트별 axios 인스턴스 캐시 (Keep-Alive http.Agent)
 * - 200~209: 성공, 본문 텍스트 반환
 * - 404 → Missing, 409 → Conflict, 그 외 → Request (`"<상태 메시지> (<코드>)"`)
 * - 소켓 계층 실패 → Connection, axios 타임아웃 → Timeout
 * - deflate 활성 시 `Accept-Encoding: deflate` 요청 (해제는 axios가 처리)
 *
 * @requires axios - HTTP 클라이언트
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import type { NodeAddress } from '../cluster/node-address';
import {
    ConnectionError,
    ConflictError,
    MissingError,
    RequestError,
    TimeoutError,
    TransportError,
} from '../errors/transport.error';
import { createLogger } from '../utils/logger';
import { ClientPool } from './client-pool';
import { Transport } from './transport';
import type { TransportOptions, TransportRequest } from './types';
import { buildUrl, httpStatusName } from './url';

const logger = createLogger('HttpTransport');

/** 소켓 계층 연결 실패 코드 */
const CONNECTION_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'ETIMEDOUT',
]);

const CONNECTION_ERROR_MESSAGE =
    /Connection.(?:timed.out|re(?:set|fused))|No.route.to.host|temporarily.unavailable|socket hang up/i;

const TIMEOUT_ERROR_MESSAGE = /timeout of \d+ms exceeded|read timeout/i;

interface HttpClient {
    http: AxiosInstance;
    agent: http.Agent;
}

/** 성공 상태 코드 범위 */
function isSuccess(status: number): boolean {
    return status >= 200 && status <= 209;
}

function bodyText(data: ArrayBuffer | undefined | null): string {
    return data ? Buffer.from(data).toString('utf-8') : '';
}

/**
 * 실패 상태 응답을 에러 종류로 분류
 */
export function statusError(
    server: NodeAddress,
    statusCode: number,
    statusText: string,
    content: string
): RequestError {
    const statusMsg = statusText || httpStatusName(statusCode);
    const context = { server, statusCode, statusMsg, content };
    const message = `${statusMsg} (${statusCode})`;

    if (statusCode === 404) return new MissingError(message, context);
    if (statusCode === 409) return new ConflictError(message, context);
    return new RequestError(message, context);
}

/**
 * 응답을 받지 못한 axios 실패를 에러 종류로 분류
 *
 * axios 에러가 아니면 그대로 반환합니다 (Dispatcher가 Request 에러로 감쌈).
 */
export function classifyFailure(server: NodeAddress, error: unknown): unknown {
    if (!axios.isAxiosError(error)) {
        return error;
    }

    const axiosError: AxiosError = error;
    const code = axiosError.code ?? '';
    const message = axiosError.message || code || 'Unknown error';
    const context = { server, code };

    if (CONNECTION_ERROR_CODES.has(code) || CONNECTION_ERROR_MESSAGE.test(message)) {
        return new ConnectionError(message, context);
    }
    if (code === 'ECONNABORTED' || TIMEOUT_ERROR_MESSAGE.test(message)) {
        return new TimeoutError(message, context);
    }
    return new RequestError(message, context);
}

export class HttpTransport extends Transport {
    readonly protocol = 'http';
    readonly defaultPort = 9200;

    private readonly clients: ClientPool<HttpClient>;

    constructor(options: TransportOptions = {}) {
        super(options);
        this.clients = new ClientPool<HttpClient>(
            () => this.createClient(),
            (client) => client.agent.destroy()
        );
    }

    private createClient(): HttpClient {
        const agent = new http.Agent({ keepAlive: true });
        const client = axios.create({
            timeout: this.timeout,
            httpAgent: agent,
            headers: {
                'Accept-Encoding': this.deflate ? 'deflate' : 'identity',
            },
            responseType: 'arraybuffer',
            // 상태 코드 분류는 직접 수행
            validateStatus: () => true,
            maxRedirects: 0,
        });
        logger.debug(`HTTP 클라이언트 생성 (timeout: ${this.timeout}ms, deflate: ${this.deflate})`);
        return { http: client, agent };
    }

    override clearClients(): void {
        this.clients.clear();
    }

    override async sendRequest(server: NodeAddress, request: TransportRequest): Promise<string> {
        const client = this.clients.acquire();

        let response: AxiosResponse<ArrayBuffer>;
        try {
            response = await client.http.request<ArrayBuffer>({
                method: request.method,
                url: buildUrl(server, request.path, request.query),
                data: request.data,
                headers: request.data !== undefined ? { 'Content-Type': 'application/json' } : undefined,
            });
        } catch (error: unknown) {
            const classified = classifyFailure(server, error);
            if (classified instanceof TransportError) {
                logger.debug(`${server} 요청 실패: ${classified.name}: ${classified.message}`);
            }
            throw classified;
        }

        const content = bodyText(response.data);
        if (isSuccess(response.status)) {
            return content;
        }
        throw statusError(server, response.status, response.statusText, content);
    }

    getStats() {
        return this.clients.getStats();
    }
}
