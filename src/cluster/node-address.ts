/**
 * ============================================================
 * Node Address - 클러스터 노드 주소 파싱
 * ============================================================
 *
 * 노드 주소는 항상 `host:port` 문자열입니다.
 * 설정 문자열(콤마 구분)과 클러스터 멤버십 응답에서 주소를 추출합니다.
 *
 * @module cluster/node-address
 */

/** 클러스터 노드 주소 (`host:port`) */
export type NodeAddress = string;

const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;
const HOST_PORT = /^[^\s/\[\]]+:\d+$/;

/**
 * 서버 목록 파싱
 *
 * 형식: "host1:port1,host2:port2,..." 또는 문자열 배열.
 * 빈 항목과 공백은 제거됩니다.
 */
export function parseServerList(input: string | readonly string[]): NodeAddress[] {
    const items = typeof input === 'string' ? input.split(',') : input.flatMap(item => item.split(','));
    return items
        .map(item => item.trim().replace(SCHEME_PREFIX, '').replace(/\/+$/, ''))
        .filter(item => item.length > 0);
}

/**
 * 바운드 주소 문자열에서 `host:port` 추출
 *
 * @example
 * ```typescript
 * extractAddress('inet[/10.0.0.1:9200]');          // '10.0.0.1:9200'
 * extractAddress('inet[search-1/10.0.0.1:9200]');  // '10.0.0.1:9200'
 * extractAddress('10.0.0.1:9200');                 // '10.0.0.1:9200'
 * ```
 */
export function extractAddress(bound: string): NodeAddress | undefined {
    const value = bound.trim().replace(SCHEME_PREFIX, '');

    const slash = value.indexOf('/');
    if (slash >= 0) {
        const match = /^([^\]]+)/.exec(value.slice(slash + 1));
        return match ? match[1] : undefined;
    }

    return HOST_PORT.test(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 노드 메타데이터에서 프로토콜별 바운드 주소 필드 조회
 * (`http_address`, `httpAddress`, `http.publish_address` 순)
 */
function boundAddressOf(meta: Record<string, unknown>, protocol: string): string | undefined {
    for (const key of [`${protocol}_address`, `${protocol}Address`]) {
        const value = meta[key];
        if (typeof value === 'string' && value) {
            return value;
        }
    }

    const section = meta[protocol];
    if (isRecord(section) && typeof section.publish_address === 'string') {
        return section.publish_address;
    }

    return undefined;
}

/**
 * 클러스터 멤버십 응답에서 노드 주소 목록 추출
 *
 * 응답 형식: `{ nodes: { <nodeId>: { http_address: 'inet[/10.0.0.1:9200]', ... } } }`
 * 주소를 찾을 수 없는 노드는 건너뜁니다.
 *
 * @param response - 디코딩된 멤버십 응답
 * @param protocol - 트랜스포트 프로토콜 (예: 'http')
 */
export function nodeAddressesFromMembership(response: unknown, protocol: string): NodeAddress[] {
    if (!isRecord(response) || !isRecord(response.nodes)) {
        return [];
    }

    const addresses: NodeAddress[] = [];
    for (const meta of Object.values(response.nodes)) {
        if (!isRecord(meta)) continue;
        const bound = boundAddressOf(meta, protocol);
        const address = bound ? extractAddress(bound) : undefined;
        if (address) {
            addresses.push(address);
        }
    }
    return addresses;
}

/**
 * 배열 셔플 (Fisher-Yates). 원본은 변경하지 않습니다.
 */
export function shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
        const j = Math.floor(Math.random() * (i + 1));
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}
