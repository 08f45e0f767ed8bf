import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getConfig, loadConfig, parseEnvFile, resetConfig } from '../env';
import { validateClientOptions } from '../client-options.schema';
import { ParamError } from '../../errors/transport.error';

describe('loadConfig', () => {
    it('기본값', () => {
        expect(loadConfig({})).toEqual({
            servers: [],
            transport: 'http',
            timeout: 120000,
            maxRequests: 10000,
            noRefresh: false,
            deflate: false,
            traceCalls: '',
            debug: false,
            logLevel: 'info',
        });
    });

    it('환경 변수를 파싱한다', () => {
        const config = loadConfig({
            SEARCH_SERVERS: '10.0.0.1:9200, 10.0.0.2:9200',
            SEARCH_TIMEOUT: '5000',
            SEARCH_MAX_REQUESTS: '0',
            SEARCH_NO_REFRESH: '1',
            SEARCH_DEFLATE: 'true',
            SEARCH_TRACE_CALLS: '/tmp/search-trace',
            LOG_LEVEL: 'debug',
        });

        expect(config).toMatchObject({
            servers: ['10.0.0.1:9200', '10.0.0.2:9200'],
            timeout: 5000,
            maxRequests: 0,
            noRefresh: true,
            deflate: true,
            traceCalls: '/tmp/search-trace',
            logLevel: 'debug',
        });
    });

    it('범위를 벗어난 값은 필드별 메시지와 함께 실패한다', () => {
        expect(() => loadConfig({ SEARCH_TIMEOUT: '700000' })).toThrow(
            'Environment configuration validation failed:\n- SEARCH_TIMEOUT: SEARCH_TIMEOUT must be between 1 and 600000 milliseconds'
        );
        expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/- LOG_LEVEL: /);
    });
});

describe('parseEnvFile', () => {
    it('주석과 빈 줄을 건너뛰고 KEY=VALUE를 읽는다', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-test-'));
        const file = path.join(dir, '.env');
        fs.writeFileSync(file, '# seeds\nSEARCH_SERVERS=10.0.0.9:9200\n\nSEARCH_DEBUG = true\nbroken line\n');

        try {
            expect(parseEnvFile(file)).toEqual({ SEARCH_SERVERS: '10.0.0.9:9200', SEARCH_DEBUG: 'true' });
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('파일이 없으면 빈 객체', () => {
        expect(parseEnvFile(path.join(os.tmpdir(), 'does-not-exist.env'))).toEqual({});
    });
});

describe('getConfig', () => {
    const original = process.env.SEARCH_MAX_REQUESTS;

    afterEach(() => {
        if (original === undefined) {
            delete process.env.SEARCH_MAX_REQUESTS;
        } else {
            process.env.SEARCH_MAX_REQUESTS = original;
        }
        resetConfig();
    });

    it('설정을 캐싱하고 resetConfig()로 다시 읽는다', () => {
        process.env.SEARCH_MAX_REQUESTS = '50';
        resetConfig();
        const first = getConfig();

        process.env.SEARCH_MAX_REQUESTS = '60';
        expect(getConfig()).toBe(first);
        expect(first.maxRequests).toBe(50);

        resetConfig();
        expect(getConfig().maxRequests).toBe(60);
    });
});

describe('validateClientOptions', () => {
    it('유효한 옵션을 통과시킨다', () => {
        expect(validateClientOptions({ servers: ['10.0.0.1:9200'], timeout: 1000, noRefresh: true }))
            .toEqual({ servers: ['10.0.0.1:9200'], timeout: 1000, noRefresh: true });
    });

    it('잘못된 옵션은 Param 에러', () => {
        expect(() => validateClientOptions({ maxRequests: -1 })).toThrow(ParamError);
        expect(() => validateClientOptions({ timeout: 'soon' })).toThrow(/- timeout: /);
    });
});
