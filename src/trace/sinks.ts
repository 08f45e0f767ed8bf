/**
 * 트레이스 출력 대상 (TraceSink)
 *
 * - true: stderr
 * - 문자열: `<name>.<pid>` 파일에 append
 * - write(text)를 가진 객체: 그대로 사용 (스트림 포함)
 *
 * @module trace/sinks
 */

import * as fs from 'fs';
import { InternalError } from '../errors/transport.error';

export interface TraceSink {
    write(text: string): void;
    close?(): void;
}

/** traceCalls 옵션 값 */
export type TraceOption = boolean | string | TraceSink | null | undefined;

/**
 * 파일 트레이스 출력 (프로세스별 파일)
 */
export class FileTraceSink implements TraceSink {
    readonly path: string;
    private fd: number | null;

    constructor(baseName: string, pid: number = process.pid) {
        this.path = `${baseName}.${pid}`;
        try {
            this.fd = fs.openSync(this.path, 'a');
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new InternalError(`Couldn't open '${this.path}' for trace logging: ${reason}`, {
                file: this.path,
            });
        }
    }

    write(text: string): void {
        if (this.fd !== null) {
            fs.writeSync(this.fd, text);
        }
    }

    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }
}

/**
 * traceCalls 옵션을 출력 대상으로 변환 (비활성이면 null)
 */
export function resolveTraceSink(option: TraceOption): TraceSink | null {
    if (option === undefined || option === null || option === false || option === '') {
        return null;
    }
    if (option === true) {
        return process.stderr;
    }
    if (typeof option === 'string') {
        return new FileTraceSink(option);
    }
    return option;
}

/**
 * 환경 변수 값(SEARCH_TRACE_CALLS)을 traceCalls 옵션으로 변환
 * ('' / '0' / 'false': 해제, '1' / 'true': stderr, 그 외: 파일 이름)
 */
export function traceOptionFromEnv(value: string): TraceOption {
    const normalized = value.trim().toLowerCase();
    if (normalized === '' || normalized === '0' || normalized === 'false') return false;
    if (normalized === '1' || normalized === 'true') return true;
    return value.trim();
}
