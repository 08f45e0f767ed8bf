/**
 * ============================================================
 * ClientPool - 실행 컨텍스트별 HTTP 클라이언트 캐시
 * ============================================================
 *
 * 트랜스포트 어댑터가 노드와 통신할 때 사용하는 Keep-Alive 클라이언트를
 * 프로세스/스레드 단위로 캐싱합니다.
 *
 * @module transport/client-pool
 * @description
 * - 키: `<pid>:<threadId>` (fork/워커 간 소켓 공유 방지)
 * - 최초 acquire() 시 팩토리로 생성
 * - clear(): 타임아웃/압축 설정 변경 시 전체 폐기 (dispose 콜백 호출)
 */

import { createLogger } from '../utils/logger';
import { executionContextId } from '../utils/execution-context';

const logger = createLogger('ClientPool');

/**
 * 클라이언트 풀 통계
 */
export interface ClientPoolStats {
    /** 현재 캐시된 클라이언트 수 */
    activeClients: number;
    /** 누적 생성 수 */
    totalCreated: number;
}

export class ClientPool<T> {
    /** 실행 컨텍스트 ID -> 클라이언트 */
    private clients: Map<string, T> = new Map();
    private totalCreated = 0;

    /**
     * @param factory - 새 클라이언트 생성 함수
     * @param dispose - 폐기 시 정리 함수 (소켓 종료 등)
     */
    constructor(
        private readonly factory: () => T,
        private readonly dispose?: (client: T) => void
    ) {}

    /**
     * 현재 실행 컨텍스트의 클라이언트를 반환 (없으면 생성)
     */
    acquire(): T {
        const key = executionContextId();
        const existing = this.clients.get(key);
        if (existing !== undefined) {
            return existing;
        }

        const client = this.factory();
        this.clients.set(key, client);
        this.totalCreated++;
        logger.debug(`클라이언트 생성됨: ${key} (총 ${this.clients.size}개)`);
        return client;
    }

    /**
     * 모든 캐시된 클라이언트 폐기
     */
    clear(): void {
        if (this.clients.size === 0) {
            return;
        }
        if (this.dispose) {
            for (const client of this.clients.values()) {
                this.dispose(client);
            }
        }
        logger.debug(`클라이언트 ${this.clients.size}개 폐기됨`);
        this.clients.clear();
    }

    get size(): number {
        return this.clients.size;
    }

    getStats(): ClientPoolStats {
        return {
            activeClients: this.clients.size,
            totalCreated: this.totalCreated,
        };
    }
}
