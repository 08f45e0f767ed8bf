import { STATUS_CODES } from 'http';
import type { NodeAddress } from '../cluster/node-address';
import type { QueryParams, QueryScalar, QueryValue } from './types';

function isList(value: QueryValue): value is readonly QueryScalar[] {
    return Array.isArray(value);
}

/**
 * 쿼리 스트링 인코딩
 *
 * - 배열: 콤마로 결합 (`fields=a,b`)
 * - boolean: 'true' / 'false'
 * - null / undefined: 생략
 */
export function encodeQuery(query: QueryParams = {}): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
        if (value === undefined || value === null) continue;
        params.append(key, isList(value) ? value.map(String).join(',') : String(value));
    }
    return params.toString();
}

/**
 * 노드 주소 + 경로 + 쿼리로 요청 URL 생성
 *
 * @example
 * buildUrl('10.0.0.1:9200', '/twitter/_search', { size: 10 });
 * // 'http://10.0.0.1:9200/twitter/_search?size=10'
 */
export function buildUrl(server: NodeAddress, path: string, query?: QueryParams): string {
    const qs = encodeQuery(query);
    return `http://${server}${path}${qs ? `?${qs}` : ''}`;
}

/**
 * HTTP 상태 코드 이름 (예: 404 → 'NOT_FOUND')
 */
export function httpStatusName(code: number): string {
    const text = STATUS_CODES[code];
    return text ? text.toUpperCase().replace(/[^A-Z0-9]+/g, '_') : `Unknown code ${code}`;
}
