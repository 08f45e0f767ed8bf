/**
 * 트랜스포트 어댑터 레지스트리
 *
 * 이름 → 어댑터 생성자. 기본 등록: 'http'
 *
 * @module transport/registry
 */

import { ParamError } from '../errors/transport.error';
import { HttpTransport } from './http-transport';
import type { Transport, TransportConstructor } from './transport';
import type { TransportOptions } from './types';

const transports = new Map<string, TransportConstructor>([
    ['http', HttpTransport],
]);

/**
 * 어댑터 등록 (같은 이름이면 교체)
 */
export function registerTransport(name: string, ctor: TransportConstructor): void {
    if (!name.trim()) {
        throw new ParamError('Transport name must not be empty');
    }
    transports.set(name.trim(), ctor);
}

export function availableTransports(): string[] {
    return [...transports.keys()].sort();
}

/**
 * 이름으로 어댑터 생성
 *
 * @throws {ParamError} 등록되지 않은 이름
 */
export function createTransport(name: string = 'http', options: TransportOptions = {}): Transport {
    const ctor = transports.get(name);
    if (!ctor) {
        throw new ParamError(
            `Unknown transport '${name}'. Available transports: ${availableTransports().join(', ')}`,
            { transport: name }
        );
    }
    return new ctor(options);
}
