/**
 * ============================================================
 * ServerPool - 클러스터 노드 목록 관리
 * ============================================================
 *
 * 라이브 노드 목록, 시드(기본) 노드 목록, 라운드로빈 커서,
 * 갱신 카운트다운, 실패 노드 집합을 관리합니다.
 *
 * @module cluster/server-pool
 * @description
 * - nextServer(failed): 카운트다운이 0이면 멤버십 갱신(또는 noRefresh 모드에서 시드로 리셋) 후
 *   요청의 실패 집합에 없는 첫 노드를 선택하고 목록 뒤로 회전 (실패 노드는 그보다 뒤로)
 * - refreshServers(): 후보 노드에 멤버십 조회, 첫 성공 응답으로 목록 교체 (single-flight)
 * - removeServer() / markFailed(): 요청 중 연결 실패 노드 처리
 *
 * 실패 집합은 논리 요청마다 호출 측(Dispatcher)이 소유하며, 풀은 누적 실패 횟수만 통계로 유지합니다.
 *
 * 상태 흐름:
 * EMPTY → SEEDED(countdown 0) → 첫 nextServer에서 갱신/리셋 → LIVE(countdown N)
 * → N회 dispatch 후 다시 갱신/리셋
 *
 * @example
 * ```typescript
 * const pool = new ServerPool({
 *     defaultServers: ['10.0.0.1:9200'],
 *     protocol: 'http',
 *     probe: (server) => dispatcher.request({ path: '/_cluster/nodes' }, server),
 * });
 * pool.on('event', (event) => {
 *     if (event.type === 'pool:refreshed') console.log(event.servers);
 * });
 * const failed: FailedServers = new Map();
 * const server = await pool.nextServer(failed);
 * ```
 */

import { EventEmitter } from 'events';
import { NoServersError, ParamError } from '../errors/transport.error';
import { createLogger } from '../utils/logger';
import { executionContextId } from '../utils/execution-context';
import { NodeAddress, nodeAddressesFromMembership, shuffle } from './node-address';

const logger = createLogger('ServerPool');

/** 기본 갱신 주기 (요청 수) */
export const DEFAULT_MAX_REQUESTS = 10000;

export interface ServerPoolOptions {
    /** 시드 노드 목록 (비어 있으면 안 됨) */
    defaultServers: readonly NodeAddress[];
    /** 멤버십 응답에서 주소를 읽을 프로토콜 */
    protocol: string;
    /** 단일 노드에 멤버십 조회 (고정 요청, failover 없음) */
    probe: (server: NodeAddress) => Promise<unknown>;
    /** 갱신 주기 (0: 주기적 갱신 비활성) */
    maxRequests?: number;
    /** 멤버십 조회 대신 시드 목록으로 리셋 */
    noRefresh?: boolean;
    /** 셔플 함수 (테스트에서 고정 순서 주입) */
    shuffle?: <T>(items: readonly T[]) => T[];
}

/** 논리 요청 하나의 실패 노드 (주소 -> 마지막 에러 메시지) */
export type FailedServers = Map<NodeAddress, string>;

/** 풀 이벤트 */
export type ServerPoolEvent =
    | { type: 'pool:refreshed'; servers: NodeAddress[] }
    | { type: 'pool:reset'; servers: NodeAddress[] }
    | { type: 'server:removed'; server: NodeAddress };

export class ServerPool extends EventEmitter {
    private liveServers: NodeAddress[] = [];
    private readonly seeds: readonly NodeAddress[];
    /** 노드별 누적 연결 실패 횟수 (통계) */
    private failures: Map<NodeAddress, number> = new Map();
    /** 다음 갱신까지 남은 요청 수 */
    private refreshIn = 0;
    private max: number;
    private noRefreshMode: boolean;
    /** 실행 컨텍스트별 현재 노드 */
    private current: Map<string, NodeAddress> = new Map();
    private inFlightRefresh: Promise<NodeAddress[]> | null = null;

    private readonly protocol: string;
    private readonly probe: (server: NodeAddress) => Promise<unknown>;
    private readonly shuffleFn: <T>(items: readonly T[]) => T[];

    constructor(options: ServerPoolOptions) {
        super();
        this.shuffleFn = options.shuffle ?? shuffle;
        this.seeds = this.shuffleFn([...new Set(options.defaultServers)]);
        this.protocol = options.protocol;
        this.probe = options.probe;
        this.max = ServerPool.validateMaxRequests(options.maxRequests ?? DEFAULT_MAX_REQUESTS);
        this.noRefreshMode = options.noRefresh ?? false;
    }

    private static validateMaxRequests(value: number): number {
        if (!Number.isInteger(value) || value < 0) {
            throw new ParamError(`maxRequests must be a non-negative integer, got '${value}'`);
        }
        return value;
    }

    // ============================================
    // 접근자
    // ============================================

    get servers(): NodeAddress[] {
        return [...this.liveServers];
    }

    set servers(servers: NodeAddress[]) {
        this.liveServers = [...servers];
    }

    get defaultServers(): NodeAddress[] {
        return [...this.seeds];
    }

    get maxRequests(): number {
        return this.max;
    }

    set maxRequests(value: number) {
        this.max = ServerPool.validateMaxRequests(value);
        // 이미 시작된 카운트다운은 새 주기를 넘지 않도록 줄임
        if (this.refreshIn > this.countdownStart()) {
            this.refreshIn = this.countdownStart();
        }
    }

    get noRefresh(): boolean {
        return this.noRefreshMode;
    }

    set noRefresh(value: boolean) {
        this.noRefreshMode = value;
    }

    /** 다음 갱신까지 남은 요청 수 */
    get countdown(): number {
        return this.refreshIn;
    }

    get failureCounts(): ReadonlyMap<NodeAddress, number> {
        return new Map(this.failures);
    }

    // ============================================
    // 노드 선택
    // ============================================

    /**
     * 다음 노드 선택 (라운드로빈)
     *
     * @param failed - 현재 논리 요청에서 이미 실패한 노드
     * @throws {NoServersError} 실패하지 않은 노드가 하나도 없을 때
     */
    async nextServer(failed: ReadonlyMap<NodeAddress, string> = new Map()): Promise<NodeAddress> {
        if (this.refreshIn === 0) {
            if (this.noRefreshMode) {
                this.resetToDefaults();
            } else {
                await this.refreshServers();
            }
        } else {
            this.refreshIn--;
        }

        const fromPool = this.liveServers.filter(server => !failed.has(server));
        const candidates = fromPool.length > 0 ? fromPool : this.seeds.filter(server => !failed.has(server));
        const next = candidates[0];
        if (next === undefined) {
            this.refreshIn = 0;
            const lastError = [...failed.values()].pop();
            throw new NoServersError(lastError ? `No servers available:\n${lastError}` : 'No servers available', {
                defaultServers: [...this.seeds],
                failed: Object.fromEntries(failed),
            });
        }

        // 선택한 노드는 남은 후보 뒤로, 이번 요청에서 실패한 노드는 맨 뒤로
        const base = fromPool.length > 0 ? this.liveServers : candidates;
        this.liveServers = [
            ...candidates.filter(server => server !== next),
            next,
            ...base.filter(server => failed.has(server)),
        ];
        this.current.set(executionContextId(), next);
        return next;
    }

    /**
     * 현재 실행 컨텍스트가 마지막으로 사용한 노드 (없으면 nextServer())
     */
    async currentServer(): Promise<NodeAddress> {
        return this.current.get(executionContextId()) ?? this.nextServer();
    }

    /**
     * 요청의 실패 집합에 없는 후보가 남아 있는지
     */
    hasCandidates(failed: ReadonlyMap<NodeAddress, string>): boolean {
        return [...this.liveServers, ...this.seeds].some(server => !failed.has(server));
    }

    private countdownStart(): number {
        return this.max > 0 ? this.max - 1 : Number.POSITIVE_INFINITY;
    }

    // ============================================
    // 갱신 / 리셋
    // ============================================

    /**
     * 클러스터 멤버십 조회로 노드 목록 갱신
     *
     * 동시에 호출되면 진행 중인 갱신 하나를 공유합니다.
     *
     * @throws {NoServersError} 모든 후보 노드 조회 실패
     */
    refreshServers(): Promise<NodeAddress[]> {
        if (!this.inFlightRefresh) {
            this.inFlightRefresh = this.doRefresh().finally(() => {
                this.inFlightRefresh = null;
            });
        }
        return this.inFlightRefresh;
    }

    private async doRefresh(): Promise<NodeAddress[]> {
        this.refreshIn = 0;
        this.current.clear();

        const candidates = this.shuffleFn([...new Set([...this.liveServers, ...this.seeds])]);
        let lastError = 'No candidate servers';

        for (const server of candidates) {
            let response: unknown;
            try {
                response = await this.probe(server);
            } catch (error: unknown) {
                lastError = error instanceof Error ? error.message : String(error);
                logger.debug(`멤버십 조회 실패: ${server}`, { error: lastError });
                continue;
            }

            const discovered = nodeAddressesFromMembership(response, this.protocol);
            if (discovered.length === 0) {
                lastError = `No ${this.protocol} addresses in membership response from ${server}`;
                logger.debug(lastError);
                continue;
            }

            this.liveServers = this.shuffleFn(discovered);
            this.refreshIn = this.countdownStart();
            logger.info(`노드 목록 갱신됨: ${this.liveServers.join(', ')} (via ${server})`);
            this.emitEvent({ type: 'pool:refreshed', servers: [...this.liveServers] });
            return [...this.liveServers];
        }

        throw new NoServersError(`Could not retrieve a list of active servers:\n${lastError}`, {
            servers: candidates,
            defaultServers: [...this.seeds],
        });
    }

    private resetToDefaults(): void {
        this.liveServers = [...this.seeds];
        this.refreshIn = this.countdownStart();
        logger.debug(`시드 노드로 리셋: ${this.liveServers.join(', ')}`);
        this.emitEvent({ type: 'pool:reset', servers: [...this.liveServers] });
    }

    // ============================================
    // 실패 처리
    // ============================================

    /**
     * 노드를 목록에서 제거하고 요청의 실패 집합에 기록
     */
    removeServer(server: NodeAddress, failed: FailedServers, reason: string): void {
        this.markFailed(server, failed, reason);
        this.liveServers = this.liveServers.filter(s => s !== server);
        this.emitEvent({ type: 'server:removed', server });
    }

    /**
     * 노드를 목록에 남긴 채 요청의 실패 집합에 기록 (그 요청 안에서 선택 제외)
     */
    markFailed(server: NodeAddress, failed: FailedServers, reason: string): void {
        failed.set(server, reason);
        this.failures.set(server, (this.failures.get(server) ?? 0) + 1);
    }

    /** 다음 nextServer() 호출에서 갱신(또는 리셋) */
    scheduleRefresh(): void {
        this.refreshIn = 0;
    }

    private emitEvent(event: ServerPoolEvent): void {
        this.emit('event', event);
    }
}
