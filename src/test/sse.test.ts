import { describe, it, expect } from 'vitest';
import { parseNDJSON, parseSSE, readBody } from '../../services/ai/sse';

async function* chunks(...parts: (string | Uint8Array)[]): AsyncGenerator<string | Uint8Array> {
    for (const part of parts) yield part;
}

const collect = async <T>(source: AsyncIterable<T>): Promise<T[]> => {
    const out: T[] = [];
    for await (const item of source) out.push(item);
    return out;
};

describe('parseSSE', () => {
    it('should reassemble events split across chunks', async () => {
        const messages = await collect(parseSSE(chunks('data: {"a"', ':1}\n\nevent: ping\r\n', 'data: x\r\n\r\n')));
        expect(messages).toEqual([
            { event: undefined, data: '{"a":1}' },
            { event: 'ping', data: 'x' },
        ]);
    });

    it('should join multi-line data and skip comments', async () => {
        const messages = await collect(parseSSE(chunks(': keep-alive\n\ndata: one\ndata: two\n\n')));
        expect(messages).toEqual([{ event: undefined, data: 'one\ntwo' }]);
    });

    it('should flush a final event without a trailing blank line', async () => {
        const messages = await collect(parseSSE(chunks('data: [DONE]')));
        expect(messages).toEqual([{ event: undefined, data: '[DONE]' }]);
    });

    it('should decode multi-byte characters split between chunks', async () => {
        const bytes = new TextEncoder().encode('data: 涨停\n\n');
        const messages = await collect(parseSSE(chunks(bytes.slice(0, 8), bytes.slice(8))));
        expect(messages).toEqual([{ event: undefined, data: '涨停' }]);
    });
});

describe('parseNDJSON', () => {
    it('should parse one value per non-empty line', async () => {
        const values = await collect(parseNDJSON(chunks('{"n":1}\n\n{"n"', ':2}\n')));
        expect(values).toEqual([{ n: 1 }, { n: 2 }]);
    });

    it('should throw a SyntaxError on a bad line', async () => {
        await expect(collect(parseNDJSON(chunks('{oops}\n')))).rejects.toThrow(SyntaxError);
    });
});

describe('readBody', () => {
    it('should iterate a fetch body', async () => {
        const body = new Response('abc').body;
        expect(body).not.toBeNull();
        if (!body) return;
        const parts = await collect(readBody(body));
        expect(new TextDecoder().decode(Buffer.concat(parts))).toBe('abc');
    });
});
