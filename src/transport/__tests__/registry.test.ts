jest.mock('../../utils/logger', () => ({
    createLogger: () => ({
        info: () => {},
        warn: () => {},
        error: () => {},
        debug: () => {},
    }),
}));

import { availableTransports, createTransport, registerTransport } from '../registry';
import { HttpTransport } from '../http-transport';
import { Transport } from '../transport';
import { InternalError, ParamError } from '../../errors/transport.error';

class NullTransport extends Transport {
    readonly protocol = 'null';
    readonly defaultPort = 1;
}

describe('transport registry', () => {
    it('http가 기본 트랜스포트이다', () => {
        const transport = createTransport();

        expect(transport).toBeInstanceOf(HttpTransport);
        expect(transport.protocol).toBe('http');
        expect(transport.defaultPort).toBe(9200);
        expect(transport.timeout).toBe(120000);
        expect(transport.deflate).toBe(false);
    });

    it('옵션을 어댑터에 전달한다', () => {
        const transport = createTransport('http', { timeout: 3000, deflate: true });

        expect(transport.timeout).toBe(3000);
        expect(transport.deflate).toBe(true);
    });

    it('알 수 없는 이름은 사용 가능한 목록과 함께 Param 에러', () => {
        expect(() => createTransport('thrift')).toThrow(
            new ParamError('Unknown transport \'thrift\'. Available transports: http')
        );
    });

    it('등록한 어댑터를 생성한다', async () => {
        registerTransport('null', NullTransport);

        const transport = createTransport('null');

        expect(availableTransports()).toEqual(['http', 'null']);
        expect(transport).toBeInstanceOf(NullTransport);
        await expect(transport.sendRequest('127.0.0.1:1', { method: 'GET', path: '/', query: {} }))
            .rejects.toBeInstanceOf(InternalError);
    });

    it('잘못된 타임아웃은 Param 에러', () => {
        expect(() => createTransport('http', { timeout: 0 })).toThrow(ParamError);
        const transport = createTransport();
        expect(() => {
            transport.timeout = -5;
        }).toThrow(ParamError);
    });
});
