/**
 * 검색 클러스터 트랜스포트 공개 API
 *
 * @module index
 */

export { SearchClient, createSearchClient } from './client';
export type { SearchClientOptions } from './client';

export { Dispatcher, MEMBERSHIP_PATH } from './cluster/dispatcher';
export type { DispatcherOptions } from './cluster/dispatcher';
export { ServerPool, DEFAULT_MAX_REQUESTS } from './cluster/server-pool';
export type { ServerPoolEvent, ServerPoolOptions } from './cluster/server-pool';
export { parseServerList, extractAddress, nodeAddressesFromMembership } from './cluster/node-address';
export type { NodeAddress } from './cluster/node-address';

export { Transport, DEFAULT_TIMEOUT } from './transport/transport';
export type { TransportConstructor } from './transport/transport';
export { HttpTransport } from './transport/http-transport';
export { registerTransport, createTransport, availableTransports } from './transport/registry';
export { JsonCodec } from './transport/codec';
export type { Codec } from './transport/codec';
export type {
    HttpMethod,
    QueryParams,
    RequestBody,
    RequestDescriptor,
    TransportOptions,
    TransportRequest,
} from './transport/types';

export { buildRequest } from './endpoints/builder';
export type { CallOptions, EndpointParams } from './endpoints/builder';
export { endpointNames } from './endpoints/table';
export type { EndpointName, EndpointSpec } from './endpoints/table';

export { Tracer, formatRequestTrace, formatResponseTrace } from './trace/tracer';
export { FileTraceSink, resolveTraceSink } from './trace/sinks';
export type { TraceOption, TraceSink } from './trace/sinks';

export * from './errors';
export { getConfig, resetConfig, loadConfig } from './config/env';
export type { EnvConfig } from './config/env';
