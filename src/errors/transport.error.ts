/**
 * ============================================================
 * TransportError - 트랜스포트 계층 구조화 에러
 * ============================================================
 *
 * 트랜스포트 코어에서 발생하는 모든 실패는 문자열이 아닌 타입이 있는
 * 에러 객체로 표현됩니다. 호출 측은 `kind` 또는 instanceof로 분기합니다.
 *
 * 에러 종류:
 * - Param: 잘못된 인자 조합. 재시도하지 않음
 * - NoServers: 사용 가능한 노드 없음. 재시도하지 않음
 * - Connection: 특정 노드 연결 실패. 같은 요청 안에서 다른 노드로 failover
 * - Timeout: 타임아웃 초과. 자동 재시도하지 않음
 * - Request: 노드가 응답했지만 실패 상태 코드 반환
 * - Conflict / Missing: Request의 하위 종류 (409 / 404)
 * - Json: 응답 본문 디코딩 실패
 * - Internal: 트랜스포트 구현 결함
 *
 * @module errors/transport.error
 */

import type { NodeAddress } from '../cluster/node-address';
import type { RequestDescriptor } from '../transport/types';

/** 에러 종류 */
export type TransportErrorKind =
    | 'Param'
    | 'NoServers'
    | 'Connection'
    | 'Timeout'
    | 'Request'
    | 'Conflict'
    | 'Missing'
    | 'Json'
    | 'Internal';

/**
 * 디버깅용 에러 컨텍스트
 */
export interface ErrorContext {
    /** 실패한 노드 */
    server?: NodeAddress;
    /** HTTP 상태 코드 */
    statusCode?: number;
    /** HTTP 상태 메시지 */
    statusMsg?: string;
    /** 서버가 반환한 원본 응답 본문 */
    content?: string;
    /** 실패한 요청 */
    request?: RequestDescriptor;
    /** 시도한 노드 목록 */
    servers?: NodeAddress[];
    /** 시드 노드 목록 */
    defaultServers?: NodeAddress[];
    /** 서버가 반환한 error_trace */
    errorTrace?: unknown;
    [key: string]: unknown;
}

/** 에러가 생성된 소스 위치 */
export interface ErrorLocation {
    file: string;
    line: number;
}

const STACK_FRAME = /\(?([^\s()]+):(\d+):\d+\)?$/;

function locate(stack: string | undefined): ErrorLocation | undefined {
    for (const frame of (stack ?? '').split('\n').slice(1)) {
        const match = STACK_FRAME.exec(frame.trim());
        // 팩토리(buildError) 프레임은 건너뜀
        if (!match || match[1] === __filename) continue;
        return { file: match[1], line: Number(match[2]) };
    }
    return undefined;
}

/**
 * 트랜스포트 에러 기본 클래스
 */
export class TransportError extends Error {
    /** 에러 종류 */
    public readonly kind: TransportErrorKind;
    /** 디버깅 컨텍스트 (Dispatcher가 보강할 수 있음) */
    public readonly context: ErrorContext;
    /** 에러가 생성된 위치 */
    public readonly location?: ErrorLocation;

    constructor(kind: TransportErrorKind, message: string, context: ErrorContext = {}) {
        super(message);
        this.name = `${kind}Error`;
        this.kind = kind;
        this.context = context;

        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this, new.target);
        this.location = locate(this.stack);
    }

    /**
     * 사람이 읽을 수 있는 상세 표현
     *
     * @param includeStack - 스택 트레이스 포함 여부 (debug 모드)
     */
    toDetailedString(includeStack: boolean = false): string {
        const where = this.location
            ? ` at ${this.location.file} line ${this.location.line}`
            : '';
        const vars = Object.keys(this.context).length > 0
            ? `\nWith vars: ${JSON.stringify(this.context, null, 2)}\n`
            : '';
        const stack = includeStack && this.stack ? `\n${this.stack}\n` : '';

        return `[ERROR] ** ${this.name}${where} : \n${this.message || 'Missing error message'}\n${vars}${stack}`;
    }
}

/** 잘못된 인자 */
export class ParamError extends TransportError {
    constructor(message: string, context?: ErrorContext) {
        super('Param', message, context);
    }
}

/** 사용 가능한 노드 없음 */
export class NoServersError extends TransportError {
    constructor(message: string, context?: ErrorContext) {
        super('NoServers', message, context);
    }
}

/** 노드 연결 실패 */
export class ConnectionError extends TransportError {
    constructor(message: string, context?: ErrorContext) {
        super('Connection', message, context);
    }
}

/** 타임아웃 */
export class TimeoutError extends TransportError {
    constructor(message: string, context?: ErrorContext) {
        super('Timeout', message, context);
    }
}

/** 서버가 실패 상태 코드를 반환 */
export class RequestError extends TransportError {
    constructor(message: string, context?: ErrorContext, kind: 'Request' | 'Conflict' | 'Missing' = 'Request') {
        super(kind, message, context);
    }
}

/** 버전 충돌 (409) */
export class ConflictError extends RequestError {
    constructor(message: string, context?: ErrorContext) {
        super(message, context, 'Conflict');
    }
}

/** 문서/인덱스 없음 (404) */
export class MissingError extends RequestError {
    constructor(message: string, context?: ErrorContext) {
        super(message, context, 'Missing');
    }
}

/** 응답 본문 디코딩 실패 */
export class JsonError extends TransportError {
    constructor(message: string, context?: ErrorContext) {
        super('Json', message, context);
    }
}

/** 트랜스포트 구현 결함 */
export class InternalError extends TransportError {
    constructor(message: string, context?: ErrorContext) {
        super('Internal', message, context);
    }
}

type ErrorClass = new (message: string, context?: ErrorContext) => TransportError;

const ERROR_CLASSES: Record<TransportErrorKind, ErrorClass> = {
    Param: ParamError,
    NoServers: NoServersError,
    Connection: ConnectionError,
    Timeout: TimeoutError,
    Request: RequestError,
    Conflict: ConflictError,
    Missing: MissingError,
    Json: JsonError,
    Internal: InternalError,
};

/**
 * 종류 이름으로 에러 생성
 *
 * @example
 * ```typescript
 * throw buildError('Missing', 'Not Found (404)', { server: '10.0.0.1:9200', statusCode: 404 });
 * ```
 */
export function buildError(kind: TransportErrorKind, message: string, context?: ErrorContext): TransportError {
    return new ERROR_CLASSES[kind](message, context);
}

/**
 * TransportError 여부 확인 (종류 지정 시 상속 관계 포함)
 *
 * `isTransportError(err, 'Request')`는 Conflict, Missing에도 true를 반환합니다.
 */
export function isTransportError(err: unknown, kind?: TransportErrorKind): err is TransportError {
    if (!(err instanceof TransportError)) {
        return false;
    }
    return kind === undefined || err instanceof ERROR_CLASSES[kind];
}
