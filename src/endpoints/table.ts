/**
 * ============================================================
 * Endpoint Table - 엔드포인트 정의 로딩/검증
 * ============================================================
 *
 * endpoints.json의 엔드포인트 정의를 zod 스키마로 검증하여
 * 불변 EndpointSpec 레코드로 제공합니다.
 *
 * @module endpoints/table
 */

import { z } from 'zod';
import { ParamError } from '../errors/transport.error';
import rawEndpoints from './endpoints.json';

/**
 * 경로 세그먼트 종류
 * - required: 단일 값 필수
 * - optional: 단일 값, 없으면 생략
 * - all: 단일 값, 없으면 `_all`
 * - multi: 목록, 비어 있으면 생략
 * - multiAll: 목록, 비어 있으면 `_all`
 * - multiRequired: 목록, 최소 1개 필수
 */
const segmentKindSchema = z.enum(['required', 'optional', 'all', 'multi', 'multiAll', 'multiRequired']);

const segmentSchema = z.object({
    name: z.string().min(1),
    kind: segmentKindSchema,
});

const queryParamSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('boolean') }),
    z.object({ type: z.literal('int') }),
    z.object({ type: z.literal('float') }),
    z.object({ type: z.literal('string') }),
    z.object({ type: z.literal('flatten') }),
    z.object({ type: z.literal('duration') }),
    z.object({ type: z.literal('enum'), values: z.array(z.string()).min(1) }),
]);

const bodySchema = z.discriminatedUnion('kind', [
    // `body` 파라미터 값을 그대로 본문으로 사용
    z.object({ kind: z.literal('payload'), required: z.boolean() }),
    // 나열된 파라미터들을 모아 본문 객체 구성
    z.object({ kind: z.literal('fields'), fields: z.array(z.string()).min(1) }),
]);

const endpointSchema = z.object({
    description: z.string(),
    method: z.enum(['GET', 'HEAD', 'POST', 'PUT', 'DELETE']),
    prefix: z.string().optional(),
    segments: z.array(segmentSchema).default([]),
    postfix: z.string().optional(),
    query: z.record(z.string(), queryParamSchema).default({}),
    fixedQuery: z.record(z.string(), z.string()).default({}),
    body: bodySchema.optional(),
    ignoreMissing: z.boolean().default(false),
});

export const endpointTableSchema = z.record(z.string(), endpointSchema);

export type SegmentKind = z.infer<typeof segmentKindSchema>;
export type PathSegment = z.infer<typeof segmentSchema>;
export type QueryParamSpec = z.infer<typeof queryParamSchema>;
export type BodySpec = z.infer<typeof bodySchema>;
export type EndpointSpec = Readonly<z.infer<typeof endpointSchema>>;

/** 지원 엔드포인트 이름 */
export type EndpointName = keyof typeof rawEndpoints;

const parsed = endpointTableSchema.safeParse(rawEndpoints);
if (!parsed.success) {
    const details = parsed.error.issues
        .map(issue => `- ${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('\n');
    throw new Error(`Endpoint table validation failed:\n${details}`);
}

const ENDPOINTS: ReadonlyMap<string, EndpointSpec> = new Map(Object.entries(parsed.data));

export function endpointNames(): string[] {
    return [...ENDPOINTS.keys()];
}

/**
 * @throws {ParamError} 알 수 없는 엔드포인트
 */
export function getEndpoint(name: string): EndpointSpec {
    const spec = ENDPOINTS.get(name);
    if (!spec) {
        throw new ParamError(`Unknown endpoint '${name}'. Known endpoints: ${endpointNames().join(', ')}`);
    }
    return spec;
}
