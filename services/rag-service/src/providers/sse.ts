import { StringDecoder } from 'string_decoder';

/**
 * Server-sent events as emitted by OpenAI-compatible streaming endpoints:
 * yields the payload of every `data:` line, stopping at `[DONE]`.
 */
export async function* sseData(source: AsyncIterable<Buffer | string>): AsyncGenerator<string> {
    const decoder = new StringDecoder('utf8');
    let pending = '';

    for await (const chunk of source) {
        pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);

        let newline = pending.indexOf('\n');
        while (newline !== -1) {
            const line = pending.slice(0, newline).replace(/\r$/, '');
            pending = pending.slice(newline + 1);

            if (line.startsWith('data:')) {
                const data = line.slice(5).trim();
                if (data === '[DONE]') return;
                if (data) yield data;
            }
            newline = pending.indexOf('\n');
        }
    }

    const last = (pending + decoder.end()).trim();
    if (last.startsWith('data:')) {
        const data = last.slice(5).trim();
        if (data && data !== '[DONE]') yield data;
    }
}
