import {
    buildError,
    ConflictError,
    isTransportError,
    MissingError,
    NoServersError,
    RequestError,
    TransportError,
} from '../transport.error';

describe('TransportError', () => {
    it('종류별 이름과 컨텍스트를 가진다', () => {
        const error = new MissingError('Not Found (404)', { server: '10.0.0.1:9200', statusCode: 404 });

        expect(error).toBeInstanceOf(Error);
        expect(error).toBeInstanceOf(RequestError);
        expect(error.name).toBe('MissingError');
        expect(error.kind).toBe('Missing');
        expect(error.context).toEqual({ server: '10.0.0.1:9200', statusCode: 404 });
    });

    it('생성 위치(파일, 라인)를 기록한다', () => {
        const error = new NoServersError('No servers available');

        expect(error.location?.file).toBe(__filename);
        expect(error.location?.line).toBeGreaterThan(0);
    });

    it('buildError()는 팩토리 프레임이 아닌 호출 위치를 기록한다', () => {
        const error = buildError('Conflict', 'Conflict (409)');

        expect(error).toBeInstanceOf(ConflictError);
        expect(error.location?.file).toBe(__filename);
    });

    it('isTransportError()는 상속 관계를 따른다', () => {
        const conflict = new ConflictError('Conflict (409)');

        expect(isTransportError(conflict)).toBe(true);
        expect(isTransportError(conflict, 'Request')).toBe(true);
        expect(isTransportError(conflict, 'Conflict')).toBe(true);
        expect(isTransportError(conflict, 'Missing')).toBe(false);
        expect(isTransportError(new Error('plain'))).toBe(false);
    });

    it('toDetailedString()은 메시지와 컨텍스트를 포함한다', () => {
        const error = new TransportError('Param', 'Missing required param \'index\'', { endpoint: 'get' });
        const where = error.location ? ` at ${error.location.file} line ${error.location.line}` : '';

        expect(error.toDetailedString()).toBe(
            `[ERROR] ** ParamError${where} : \nMissing required param 'index'\n`
                + '\nWith vars: {\n  "endpoint": "get"\n}\n'
        );
    });

    it('toDetailedString(true)는 스택을 포함한다', () => {
        const error = new RequestError('boom');

        expect(error.toDetailedString(true)).toContain(error.stack ?? 'missing stack');
    });
});
