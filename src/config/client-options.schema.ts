import { z } from 'zod';
import { ParamError } from '../errors/transport.error';

/**
 * SearchClient 생성 옵션 중 스칼라 값 검증 스키마
 * (traceCalls, codec 등 객체 값은 타입으로만 검사)
 */
export const clientOptionsSchema = z.object({
    servers: z.union([z.string(), z.array(z.string())]).optional(),
    transport: z.string().min(1).optional(),
    timeout: z.number().int().positive().max(600000).optional(),
    maxRequests: z.number().int().min(0).optional(),
    noRefresh: z.boolean().optional(),
    deflate: z.boolean().optional(),
    debug: z.boolean().optional(),
    errorTrace: z.boolean().optional(),
    camelCase: z.boolean().optional(),
});

export type ClientScalarOptions = z.infer<typeof clientOptionsSchema>;

/**
 * @throws {ParamError} 필드별 메시지를 포함한 검증 실패
 */
export function validateClientOptions(options: unknown): ClientScalarOptions {
    const result = clientOptionsSchema.safeParse(options);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `- ${issue.path.join('.') || 'root'}: ${issue.message}`)
            .join('\n');
        throw new ParamError(`Invalid client options:\n${details}`);
    }
    return result.data;
}
