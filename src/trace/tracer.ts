/**
 * ============================================================
 * Tracer - 요청/응답 트레이스 포매터
 * ============================================================
 *
 * 요청은 재실행 가능한 curl 명령으로, 응답은 `# ` 접두사 주석 블록으로 기록합니다.
 * 요청 URL의 호스트는 항상 `127.0.0.1:9200`으로 치환되고 `pretty=1`이 붙습니다.
 *
 * @module trace/tracer
 * @example
 * ```text
 * # [2024-01-01T00:00:00.000Z] Protocol: http, Server: 10.0.0.1:9200
 * curl -XPOST 'http://127.0.0.1:9200/twitter/_search?pretty=1' -d '
 * {"query":{"match_all":{}}}'
 *
 * # [2024-01-01T00:00:00.012Z] Response:
 * # {
 * #    "took" : 1
 * # }
 * ```
 */

import type { NodeAddress } from '../cluster/node-address';
import { JsonCodec } from '../transport/codec';
import type { TransportRequest } from '../transport/types';
import { buildUrl } from '../transport/url';
import type { TraceSink } from './sinks';

/** 트레이스 URL에 사용하는 고정 호스트 */
export const TRACE_HOST = '127.0.0.1:9200';

/** 응답 라인 최대 길이 */
const WRAP_WIDTH = 65;
/** 줄바꿈된 라인에 유지할 최대 들여쓰기 */
const MAX_INDENT = 20;

export function formatRequestTrace(
    timestamp: string,
    protocol: string,
    server: NodeAddress,
    request: TransportRequest
): string {
    const uri = buildUrl(TRACE_HOST, request.path, { ...request.query, pretty: 1 });
    const data = request.data;
    const body = data && data !== '{}' && data !== '{}\n'
        ? ` -d '\n${data.replace(/'/g, '\\u0027')}'`
        : '';

    return `# [${timestamp}] Protocol: ${protocol}, Server: ${server}\n`
        + `curl -X${request.method} '${uri}'${body}\n\n`;
}

export function formatResponseTrace(timestamp: string, content: string): string {
    const pending = content.replace(/\n+$/, '').split('\n');
    let out = `# [${timestamp}] Response:\n`;

    for (let line = pending.shift(); line !== undefined; line = pending.shift()) {
        if (line.length > WRAP_WIDTH) {
            const indent = (/^(?:> )?(\s*)/.exec(line)?.[1] ?? '').slice(0, MAX_INDENT);
            pending.unshift(`> ${indent}${line.slice(WRAP_WIDTH)}`);
            line = line.slice(0, WRAP_WIDTH);
        }
        out += `# ${line}\n`;
    }

    return `${out}\n`;
}

export interface TracerOptions {
    /** 타임스탬프 소스 (테스트용) */
    now?: () => Date;
}

export class Tracer {
    private readonly now: () => Date;
    private readonly pretty = new JsonCodec(true);

    constructor(readonly sink: TraceSink, options: TracerOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    logRequest(protocol: string, server: NodeAddress, request: TransportRequest): void {
        this.sink.write(formatRequestTrace(this.timestamp(), protocol, server, request));
    }

    /**
     * @param result - 디코딩된 값 (pretty JSON으로 출력) 또는 원본 텍스트
     */
    logResponse(result: unknown): void {
        const text = typeof result === 'string' ? result : this.pretty.encode(result);
        this.sink.write(formatResponseTrace(this.timestamp(), text));
    }

    close(): void {
        this.sink.close?.();
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
