import { buildUrl, encodeQuery, httpStatusName } from '../url';
import { JsonCodec } from '../codec';
import { JsonError } from '../../errors/transport.error';

describe('encodeQuery', () => {
    it('목록은 콤마로 결합하고 undefined와 null은 생략한다', () => {
        expect(encodeQuery({ fields: ['title', 'user'], size: 5, missing: undefined, none: null, flag: false }))
            .toBe('fields=title%2Cuser&size=5&flag=false');
    });

    it('비어 있으면 빈 문자열', () => {
        expect(encodeQuery()).toBe('');
    });
});

describe('buildUrl', () => {
    it('쿼리가 없으면 ?를 붙이지 않는다', () => {
        expect(buildUrl('10.0.0.1:9200', '/_cluster/nodes')).toBe('http://10.0.0.1:9200/_cluster/nodes');
    });

    it('쿼리를 붙인다', () => {
        expect(buildUrl('10.0.0.1:9200', '/', { q: 'a b' })).toBe('http://10.0.0.1:9200/?q=a+b');
    });
});

describe('httpStatusName', () => {
    it('상태 코드 이름', () => {
        expect(httpStatusName(404)).toBe('NOT_FOUND');
        expect(httpStatusName(599)).toBe('Unknown code 599');
    });
});

describe('JsonCodec', () => {
    it('인코딩/디코딩', () => {
        const codec = new JsonCodec();

        expect(codec.encode({ a: [1, 'x'] })).toBe('{"a":[1,"x"]}');
        expect(codec.decode('{"a":[1,"x"]}')).toEqual({ a: [1, 'x'] });
    });

    it('pretty 모드는 2칸 들여쓰기', () => {
        expect(new JsonCodec(true).encode({ a: 1 })).toBe('{\n  "a": 1\n}');
    });

    it('잘못된 JSON은 원본을 담은 Json 에러', () => {
        const error = (() => {
            try {
                new JsonCodec().decode('{oops');
            } catch (e: unknown) {
                return e;
            }
            return undefined;
        })();

        expect(error).toBeInstanceOf(JsonError);
        expect(error).toMatchObject({ context: { content: '{oops' } });
    });

    it('인코딩할 수 없는 값은 Json 에러', () => {
        expect(() => new JsonCodec().encode(undefined)).toThrow(JsonError);
    });
});
