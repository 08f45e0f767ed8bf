import { JsonError } from '../errors/transport.error';

/**
 * 요청 본문 인코딩 / 응답 본문 디코딩 코덱
 */
export interface Codec {
    encode(value: unknown): string;
    decode(text: string): unknown;
}

/**
 * JSON 코덱 (기본값)
 */
export class JsonCodec implements Codec {
    constructor(private readonly pretty: boolean = false) {}

    encode(value: unknown): string {
        const text = JSON.stringify(value, null, this.pretty ? 2 : undefined);
        if (text === undefined) {
            throw new JsonError(`Cannot encode value of type '${typeof value}' as JSON`);
        }
        return text;
    }

    decode(text: string): unknown {
        try {
            return JSON.parse(text);
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new JsonError(`Malformed JSON response: ${reason}`, { content: text });
        }
    }
}
