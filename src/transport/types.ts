// 트랜스포트 요청/응답 타입 정의

/** 지원 HTTP 메서드 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE';

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | readonly QueryScalar[] | null | undefined;
export type QueryParams = Readonly<Record<string, QueryValue>>;

/**
 * 요청 본문
 * - Buffer: 그대로 전송 (bulk 등 이미 인코딩된 페이로드)
 * - 그 외: 코덱(JSON)으로 인코딩
 */
export type RequestBody = Buffer | object | string | number | boolean;

/**
 * 논리 요청 기술자 (마샬링 계층 → Dispatcher)
 */
export interface RequestDescriptor {
    readonly method?: HttpMethod;
    readonly path?: string;
    readonly query?: QueryParams;
    readonly body?: RequestBody;
    /** 404(Missing)를 에러 대신 undefined 결과로 처리 */
    readonly ignoreMissing?: boolean;
    /** 디코딩하지 않은 원본 응답 텍스트 반환 */
    readonly rawOutput?: boolean;
    /** 디코딩된 결과 후처리 */
    readonly postProcess?: (result: unknown) => unknown;
}

/**
 * 정규화된 요청 (Dispatcher → Transport)
 */
export interface TransportRequest {
    readonly method: HttpMethod;
    readonly path: string;
    readonly query: QueryParams;
    /** 인코딩된 본문 */
    readonly data?: string;
}

/** 트랜스포트 생성 옵션 */
export interface TransportOptions {
    /** 연결+읽기 타임아웃 (ms, 기본값: 120000) */
    timeout?: number;
    /** 응답 deflate 압축 요청 */
    deflate?: boolean;
}
