/**
 * ============================================================
 * Logger - Winston 기반 통합 로깅 시스템
 * ============================================================
 *
 * 라이브러리 전역에서 사용되는 구조화된 로깅 시스템입니다.
 * 모든 출력은 stderr로 보내 호출 측 stdout을 오염시키지 않습니다.
 *
 * @module utils/logger
 * @description
 * - 콘솔: 컬러 포맷, 시:분:초 타임스탬프
 * - 카테고리 로거: createLogger('CategoryName')으로 [Category] 접두사 자동 추가
 * - 로그 레벨: 환경변수 LOG_LEVEL (기본: info)
 */

import winston from 'winston';
import { getConfig } from '../config/env';

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] ${level}: ${message}${metaStr}`;
    })
);

export const logger = winston.createLogger({
    level: getConfig().logLevel,
    transports: [
        new winston.transports.Console({
            format: consoleFormat,
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
        })
    ]
});

/** 카테고리 로거 인터페이스 */
export interface CategoryLogger {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
}

/**
 * 카테고리별 로거를 생성합니다.
 * 각 로그 메시지에 [category] 접두사가 자동으로 추가됩니다.
 *
 * @param category - 로거 카테고리명 (예: 'Dispatcher', 'ServerPool')
 *
 * @example
 * const log = createLogger('ServerPool');
 * log.info('서버 목록 갱신됨');  // [HH:mm:ss] info: [ServerPool] 서버 목록 갱신됨
 */
export function createLogger(category: string): CategoryLogger {
    return {
        debug: (msg: string, meta?: unknown) => logger.debug(`[${category}] ${msg}`, meta),
        info: (msg: string, meta?: unknown) => logger.info(`[${category}] ${msg}`, meta),
        warn: (msg: string, meta?: unknown) => logger.warn(`[${category}] ${msg}`, meta),
        error: (msg: string, meta?: unknown) => logger.error(`[${category}] ${msg}`, meta)
    };
}

export default logger;
