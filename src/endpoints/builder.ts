/**
 * ============================================================
 * Request Builder - 엔드포인트 파라미터 → 요청 기술자
 * ============================================================
 *
 * 엔드포인트 테이블 정의에 따라 호출 파라미터를 경로 세그먼트, 쿼리 스트링,
 * 본문으로 분배하고 값 형식을 검증합니다.
 *
 * @module endpoints/builder
 * @example
 * ```typescript
 * buildRequest('search', { index: ['tweets', 'users'], query: { match_all: {} }, size: 10 });
 * // { method: 'POST', path: '/tweets,users/_search', query: {}, body: { query: {...}, size: 10 } }
 * ```
 */

import { ParamError } from '../errors/transport.error';
import type { QueryParams, RequestBody, RequestDescriptor } from '../transport/types';
import { BodySpec, EndpointSpec, getEndpoint, PathSegment, QueryParamSpec } from './table';

/** 엔드포인트 호출 파라미터 (경로 세그먼트, 쿼리, 본문 필드) */
export type EndpointParams = Readonly<Record<string, unknown>>;

/** 엔드포인트와 무관한 호출 옵션 */
export interface CallOptions {
    /** 404를 undefined로 처리 (exists는 기본 true) */
    ignoreMissing?: boolean;
    /** 원본 응답 텍스트 반환 */
    rawOutput?: boolean;
    postProcess?: (result: unknown) => unknown;
}

const DURATION = /^\d+([smh]|ms)$/i;
const INTEGER = /^-?\d+$/;
const REQUIRED_KINDS = new Set(['required', 'multiRequired']);

type Fail = (message: string) => never;
type Scalar = string | number;

function isScalar(value: unknown): value is Scalar {
    return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function isBody(value: unknown): value is RequestBody {
    return isScalar(value) || typeof value === 'boolean' || (typeof value === 'object' && value !== null);
}

/**
 * 사용법 문자열 (`[]`: 선택 파라미터)
 */
export function usage(name: string, spec: EndpointSpec): string {
    const parts = spec.segments.map(s => (REQUIRED_KINDS.has(s.kind) ? s.name : `[${s.name}]`));
    if (spec.body?.kind === 'payload') {
        parts.push(spec.body.required ? 'body' : '[body]');
    } else if (spec.body?.kind === 'fields') {
        parts.push(...spec.body.fields.map(f => `[${f}]`));
    }
    parts.push(...Object.keys(spec.query).map(k => `[${k}]`));
    return `Usage: ${name}({ ${parts.join(', ')} })`;
}

function toList(name: string, value: unknown, fail: Fail): string[] {
    if (value === undefined || value === null) return [];
    if (isScalar(value)) return String(value).split(',').map(item => item.trim()).filter(item => item !== '');
    if (Array.isArray(value)) {
        return value.map((item: unknown) => {
            if (!isScalar(item)) fail(`'${name}' must be a string or a list of strings`);
            return String(item);
        }).filter(item => item !== '');
    }
    return fail(`'${name}' must be a string or a list of strings`);
}

/**
 * 경로 세그먼트 하나 렌더링 (생략 시 undefined)
 */
function renderSegment(segment: PathSegment, value: unknown, fail: Fail): string | undefined {
    const { name, kind } = segment;

    if (kind === 'required' || kind === 'optional' || kind === 'all') {
        if (value === undefined || value === null || value === '') {
            if (kind === 'required') fail(`Missing required param '${name}'`);
            return kind === 'all' ? '_all' : undefined;
        }
        if (!isScalar(value)) fail(`'${name}' must be a single value`);
        return encodeURIComponent(String(value));
    }

    const items = toList(name, value, fail);
    if (items.length === 0) {
        if (kind === 'multiRequired') fail(`Missing required param '${name}'`);
        return kind === 'multiAll' ? '_all' : undefined;
    }
    return items.map(encodeURIComponent).join(',');
}

/**
 * 쿼리 파라미터 값 형식 검증/변환
 */
export function formatQueryValue(key: string, spec: QueryParamSpec, value: unknown, fail: Fail): string {
    switch (spec.type) {
        case 'boolean':
            if (typeof value === 'boolean') return value ? 'true' : 'false';
            if (value === 0 || value === 1) return value === 1 ? 'true' : 'false';
            return fail(`'${key}' must be a boolean`);

        case 'int':
            if ((typeof value === 'number' && Number.isInteger(value))
                || (typeof value === 'string' && INTEGER.test(value))) {
                return String(Number(value));
            }
            return fail(`'${key}' must be an integer`);

        case 'float':
            if (isScalar(value) && value !== '' && Number.isFinite(Number(value))) {
                return String(Number(value));
            }
            return fail(`'${key}' must be a number`);

        case 'string':
            if (isScalar(value)) return String(value);
            return fail(`'${key}' must be a string`);

        case 'flatten':
            return toList(key, value, fail).join(',');

        case 'duration':
            if (typeof value === 'string' && DURATION.test(value)) return value;
            return fail(`'${key}' is not in the form '10s', '5m', '1h' or '200ms'`);

        case 'enum':
            if (typeof value === 'string' && spec.values.includes(value)) return value;
            return fail(`Unrecognised value '${String(value)}' for '${key}'. Allowed values: ${spec.values.join(', ')}`);
    }
}

function buildBody(spec: BodySpec | undefined, take: (key: string) => unknown, fail: Fail): RequestBody | undefined {
    if (!spec) return undefined;

    if (spec.kind === 'payload') {
        const body = take('body');
        if (body === undefined || body === null) {
            if (spec.required) fail(`Missing required param 'body'`);
            return undefined;
        }
        if (!isBody(body)) fail(`'body' must be a Buffer, string or object`);
        return body;
    }

    const fields: Record<string, unknown> = {};
    for (const field of spec.fields) {
        const value = take(field);
        if (value !== undefined) fields[field] = value;
    }
    return Object.keys(fields).length > 0 ? fields : undefined;
}

/**
 * 엔드포인트 호출을 요청 기술자로 변환
 *
 * @param name - 엔드포인트 이름 (예: 'search')
 * @param params - 경로/쿼리/본문 파라미터
 * @param options - 호출 옵션
 * @param baseQuery - 모든 요청에 붙는 쿼리 (예: error_trace)
 * @throws {ParamError} 누락/형식 오류/알 수 없는 파라미터 (사용법 포함)
 */
export function buildRequest(
    name: string,
    params: EndpointParams = {},
    options: CallOptions = {},
    baseQuery: QueryParams = {}
): RequestDescriptor {
    const spec = getEndpoint(name);
    const fail: Fail = (message) => {
        throw new ParamError(`${message}\n${usage(name, spec)}`, { endpoint: name });
    };

    const remaining = new Map(Object.entries(params).filter(([, value]) => value !== undefined));
    const take = (key: string): unknown => {
        const value = remaining.get(key);
        remaining.delete(key);
        return value;
    };

    const parts: string[] = [];
    if (spec.prefix) parts.push(spec.prefix);
    for (const segment of spec.segments) {
        const rendered = renderSegment(segment, take(segment.name), fail);
        if (rendered !== undefined) parts.push(rendered);
    }
    if (spec.postfix) parts.push(spec.postfix);

    const query: Record<string, string> = {};
    for (const [key, paramSpec] of Object.entries(spec.query)) {
        const value = take(key);
        if (value !== undefined) {
            query[key] = formatQueryValue(key, paramSpec, value, fail);
        }
    }

    const body = buildBody(spec.body, take, fail);

    if (remaining.size > 0) {
        fail(`Unknown param(s): ${[...remaining.keys()].join(', ')}`);
    }

    return {
        method: spec.method,
        path: `/${parts.join('/')}`,
        query: { ...baseQuery, ...query, ...spec.fixedQuery },
        body,
        ignoreMissing: options.ignoreMissing ?? spec.ignoreMissing,
        rawOutput: options.rawOutput,
        postProcess: options.postProcess,
    };
}
