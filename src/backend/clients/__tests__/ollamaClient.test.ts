/**
 * Unit tests for the Ollama client
 *
 * fetch is replaced by a Jest spy; no Ollama instance is needed.
 */

import { GenerationOutput } from '../../../shared/types';
import { OllamaClient, OllamaError, OllamaErrorCode, isTransientOllamaError } from '../ollamaClient';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function ndjsonResponse(...parts: string[]): Response {
    const encoder = new TextEncoder();
    async function* body(): AsyncGenerator<Uint8Array> {
        for (const part of parts) {
            yield encoder.encode(part);
        }
    }
    return new Response(body(), { status: 200 });
}

async function fragmentsOf(output: GenerationOutput): Promise<string[]> {
    if (typeof output === 'string') {
        return [output];
    }
    const fragments: string[] = [];
    for await (const fragment of output) {
        fragments.push(fragment);
    }
    return fragments;
}

function abortError(): Error {
    return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

describe('OllamaClient', () => {
    let fetchSpy: jest.SpiedFunction<typeof fetch>;

    beforeEach(() => {
        fetchSpy = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    function requestBody(call = 0): unknown {
        const init = fetchSpy.mock.calls[call]?.[1];
        return JSON.parse(String(init?.body));
    }

    describe('embed', () => {
        it('should post the batch and return the vectors', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embeddings: [[1, 2], [3, 4]] }));
            const client = new OllamaClient({ baseUrl: 'http://ollama.test' });

            await expect(client.embed(['a', 'b'])).resolves.toEqual([
                [1, 2],
                [3, 4],
            ]);
            expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://ollama.test/api/embed');
            expect(requestBody()).toEqual({ model: 'nomic-embed-text', input: ['a', 'b'] });
        });

        it('should reject a response without embeddings', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ embeddings: 'nope' }));

            await expect(new OllamaClient().embed(['a'])).rejects.toMatchObject({
                code: OllamaErrorCode.API_ERROR,
                message: 'Embedding response has no embeddings array',
            });
        });

        it.each([
            [404, { error: 'model not found' }, OllamaErrorCode.MODEL_NOT_FOUND, 'Model "nomic-embed-text" not found. Please run: ollama pull nomic-embed-text'],
            [429, { error: 'slow down' }, OllamaErrorCode.RATE_LIMITED, 'Rate limited: slow down'],
            [401, { error: 'no key' }, OllamaErrorCode.AUTHENTICATION, 'Not authorized: no key'],
            [400, { error: 'invalid input' }, OllamaErrorCode.BAD_REQUEST, 'Bad request: invalid input'],
            [500, { error: 'boom' }, OllamaErrorCode.SERVER_ERROR, 'Ollama server error: boom'],
            [418, {}, OllamaErrorCode.API_ERROR, 'Ollama API error: HTTP 418'],
        ])('should map HTTP %d', async (status, body, code, message) => {
            fetchSpy.mockResolvedValue(jsonResponse(body, status));

            await expect(new OllamaClient().embed(['a'])).rejects.toMatchObject({ code, message, status });
        });

        it('should report a refused connection', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

            const result = new OllamaClient().embed(['a']);
            await expect(result).rejects.toBeInstanceOf(OllamaError);
            await expect(result).rejects.toMatchObject({ code: OllamaErrorCode.CONNECTION_REFUSED });
        });

        it('should time out a request that never answers', async () => {
            fetchSpy.mockImplementation(
                (_input, init) =>
                    new Promise<Response>((_resolve, reject) => {
                        init?.signal?.addEventListener('abort', () => reject(abortError()));
                    })
            );

            await expect(new OllamaClient({ timeoutMs: 20 }).embed(['a'])).rejects.toMatchObject({
                code: OllamaErrorCode.TIMEOUT,
                message: 'Request timed out after 20ms',
            });
        });

        it('should report cancellation by the caller', async () => {
            fetchSpy.mockImplementation((_input, init) =>
                init?.signal?.aborted ? Promise.reject(abortError()) : Promise.resolve(jsonResponse({ embeddings: [] }))
            );
            const controller = new AbortController();
            controller.abort();

            await expect(new OllamaClient().embed(['a'], { signal: controller.signal })).rejects.toMatchObject({
                code: OllamaErrorCode.CANCELLED,
                message: 'Failed to generate embeddings: request cancelled',
            });
        });
    });

    describe('generate', () => {
        it('should return the whole text when not streaming', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ response: 'Lava is hot.', done: true }));
            const client = new OllamaClient({ stream: false });

            const output = await client.generate('prompt', { model: 'tiny', temperature: 0 });

            expect(output).toBe('Lava is hot.');
            expect(requestBody()).toEqual({
                model: 'tiny',
                prompt: 'prompt',
                stream: false,
                options: { temperature: 0, num_predict: 1024 },
            });
        });

        it('should yield streamed fragments across chunk boundaries', async () => {
            fetchSpy.mockResolvedValue(
                ndjsonResponse(
                    '{"response":"Hel","done":false}\n{"resp',
                    'onse":"lo","done":false}\n',
                    '{"response":"","done":true}'
                )
            );

            const output = await new OllamaClient().generate('prompt');
            await expect(fragmentsOf(output)).resolves.toEqual(['Hel', 'lo']);
            expect(requestBody()).toMatchObject({ model: 'llama3.1', stream: true, options: { temperature: 0.2 } });
        });

        it('should fail on an error line in the stream', async () => {
            fetchSpy.mockResolvedValue(ndjsonResponse('{"response":"Hi","done":false}\n{"error":"model crashed"}\n'));

            const output = await new OllamaClient().generate('prompt');
            await expect(fragmentsOf(output)).rejects.toMatchObject({
                code: OllamaErrorCode.API_ERROR,
                message: 'Ollama stream error: model crashed',
            });
        });

        it('should fail on a malformed stream line', async () => {
            fetchSpy.mockResolvedValue(ndjsonResponse('not json\n'));

            const output = await new OllamaClient().generate('prompt');
            await expect(fragmentsOf(output)).rejects.toThrow('Malformed line in generation stream');
        });

        it('should map HTTP errors before streaming starts', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: 'overloaded' }, 503));

            await expect(new OllamaClient().generate('prompt')).rejects.toMatchObject({
                code: OllamaErrorCode.SERVER_ERROR,
            });
        });
    });

    describe('isAvailable', () => {
        it('should be true when the tags endpoint answers', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ models: [] }));

            await expect(new OllamaClient({ baseUrl: 'http://ollama.test' }).isAvailable()).resolves.toBe(true);
            expect(fetchSpy.mock.calls[0]?.[0]).toBe('http://ollama.test/api/tags');
        });

        it('should be false when the request fails', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
            await expect(new OllamaClient().isAvailable()).resolves.toBe(false);
        });
    });
});

describe('isTransientOllamaError', () => {
    it.each([
        [OllamaErrorCode.CONNECTION_REFUSED, true],
        [OllamaErrorCode.TIMEOUT, true],
        [OllamaErrorCode.RATE_LIMITED, true],
        [OllamaErrorCode.SERVER_ERROR, true],
        [OllamaErrorCode.BAD_REQUEST, false],
        [OllamaErrorCode.MODEL_NOT_FOUND, false],
        [OllamaErrorCode.CANCELLED, false],
    ])('should classify %s', (code, transient) => {
        expect(isTransientOllamaError(new OllamaError('x', code))).toBe(transient);
    });

    it('should not retry errors from elsewhere', () => {
        expect(isTransientOllamaError(new Error('x'))).toBe(false);
    });
});
