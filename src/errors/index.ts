export {
    TransportError,
    ParamError,
    NoServersError,
    ConnectionError,
    TimeoutError,
    RequestError,
    ConflictError,
    MissingError,
    JsonError,
    InternalError,
    buildError,
    isTransportError,
} from './transport.error';
export type { TransportErrorKind, ErrorContext, ErrorLocation } from './transport.error';
