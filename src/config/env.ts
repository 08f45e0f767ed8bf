/**
 * ============================================================
 * Environment Config - .env 로딩/검증/캐싱
 * ============================================================
 * 환경 변수 및 .env 파일을 병합하여 타입 안전한 트랜스포트 설정 객체를
 * 생성하고, 런타임 검증과 싱글톤 캐싱을 제공합니다.
 *
 * @module config/env
 */

import * as fs from 'fs';
import * as path from 'path';
import { envSchema, LogLevel } from './env.schema';
import { parseServerList, NodeAddress } from '../cluster/node-address';

export interface EnvConfig {
    // Cluster
    servers: NodeAddress[];
    transport: string;
    timeout: number;
    maxRequests: number;
    noRefresh: boolean;
    deflate: boolean;

    // Debugging
    traceCalls: string;
    debug: boolean;

    // Log
    logLevel: LogLevel;
}

export function parseEnvFile(filePath: string): Record<string, string> {
    const env: Record<string, string> = {};

    if (!fs.existsSync(filePath)) {
        return env;
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    const lines = content.split('\n');

    for (const line of lines) {
        const trimmed = line.trim();

        if (!trimmed || trimmed.startsWith('#')) {
            continue;
        }

        const equalIndex = trimmed.indexOf('=');
        if (equalIndex > 0) {
            const key = trimmed.substring(0, equalIndex).trim();
            const value = trimmed.substring(equalIndex + 1).trim();
            env[key] = value;
        }
    }

    return env;
}

/**
 * 환경 변수 + .env 파일에서 설정 로드
 *
 * 우선순위: process.env > 작업 디렉토리의 .env
 *
 * @param source - 환경 변수 맵 (기본값: process.env)
 * @throws {Error} 검증 실패 시 필드별 메시지를 포함한 에러
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
    const fileEnv = parseEnvFile(path.resolve(process.cwd(), '.env'));

    const env = (key: string): string | undefined => source[key] || fileEnv[key];

    const parsedResult = envSchema.safeParse({
        SEARCH_SERVERS: env('SEARCH_SERVERS'),
        SEARCH_TRANSPORT: env('SEARCH_TRANSPORT'),
        SEARCH_TIMEOUT: env('SEARCH_TIMEOUT'),
        SEARCH_MAX_REQUESTS: env('SEARCH_MAX_REQUESTS'),
        SEARCH_NO_REFRESH: env('SEARCH_NO_REFRESH'),
        SEARCH_DEFLATE: env('SEARCH_DEFLATE'),
        SEARCH_TRACE_CALLS: env('SEARCH_TRACE_CALLS'),
        SEARCH_DEBUG: env('SEARCH_DEBUG'),
        LOG_LEVEL: env('LOG_LEVEL'),
    });

    if (!parsedResult.success) {
        const details = parsedResult.error.issues
            .map((issue) => {
                const field = issue.path.join('.') || 'root';
                return `- ${field}: ${issue.message}`;
            })
            .join('\n');
        throw new Error(`Environment configuration validation failed:\n${details}`);
    }

    const parsed = parsedResult.data;

    return {
        servers: parseServerList(parsed.SEARCH_SERVERS),
        transport: parsed.SEARCH_TRANSPORT,
        timeout: parsed.SEARCH_TIMEOUT,
        maxRequests: parsed.SEARCH_MAX_REQUESTS,
        noRefresh: parsed.SEARCH_NO_REFRESH,
        deflate: parsed.SEARCH_DEFLATE,

        traceCalls: parsed.SEARCH_TRACE_CALLS,
        debug: parsed.SEARCH_DEBUG,

        logLevel: parsed.LOG_LEVEL,
    };
}

// 싱글톤 설정 인스턴스
let cachedConfig: EnvConfig | null = null;

export function getConfig(): EnvConfig {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
