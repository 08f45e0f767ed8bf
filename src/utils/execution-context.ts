import { threadId } from 'worker_threads';

/**
 * 현재 실행 컨텍스트 식별자 (`<pid>:<threadId>`)
 *
 * fork된 자식 프로세스나 워커 스레드는 서로 다른 키를 가지므로
 * 소켓/클라이언트를 프로세스 경계 너머로 공유하지 않습니다.
 */
export function executionContextId(): string {
    return `${process.pid}:${threadId}`;
}
