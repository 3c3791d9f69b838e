// Incremental decoders for streamed HTTP bodies: Server-Sent Events and NDJSON.

export interface SSEMessage {
    event?: string;
    data: string;
}

type Chunk = Uint8Array | string;

async function* lines(chunks: AsyncIterable<Chunk>): AsyncGenerator<string> {
    const decoder = new TextDecoder();
    let buffer = '';
    for await (const chunk of chunks) {
        buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
            const line = buffer.slice(0, newline).replace(/\r$/, '');
            buffer = buffer.slice(newline + 1);
            yield line;
            newline = buffer.indexOf('\n');
        }
    }
    buffer += decoder.decode();
    if (buffer.length > 0) yield buffer.replace(/\r$/, '');
}

/** Yields one message per blank-line-terminated block; comments are skipped. */
export async function* parseSSE(chunks: AsyncIterable<Chunk>): AsyncGenerator<SSEMessage> {
    let event: string | undefined;
    let data: string[] = [];

    const flush = (): SSEMessage | null => {
        const message = data.length > 0 ? { event, data: data.join('\n') } : null;
        event = undefined;
        data = [];
        return message;
    };

    for await (const line of lines(chunks)) {
        if (line === '') {
            const message = flush();
            if (message) yield message;
            continue;
        }
        if (line.startsWith(':')) continue;
        const colon = line.indexOf(':');
        const field = colon === -1 ? line : line.slice(0, colon);
        const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '');
        if (field === 'event') event = value;
        else if (field === 'data') data.push(value);
    }
    const last = flush();
    if (last) yield last;
}

/** One parsed JSON value per non-empty line. Throws SyntaxError on a bad line. */
export async function* parseNDJSON(chunks: AsyncIterable<Chunk>): AsyncGenerator<unknown> {
    for await (const line of lines(chunks)) {
        const trimmed = line.trim();
        if (trimmed) yield JSON.parse(trimmed);
    }
}

/**
 * Adapts a web ReadableStream (fetch body) to an async iterable.
 * A consumer that stops early cancels the body.
 */
export async function* readBody(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    let finished = false;
    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) {
                finished = true;
                return;
            }
            if (value) yield value;
        }
    } finally {
        if (!finished) {
            await reader.cancel().catch((error: unknown) => console.warn('[Stream] Body cancel failed:', error));
        }
        reader.releaseLock();
    }
}
