import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
        vi.restoreAllMocks();
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('response parsing', () => {
        it('should parse JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn(async () =>
                new Response('{"answer":"yes"}', { status: 200, headers: { 'content-type': 'application/json' } })
            ));

            const response = await client.post('https://llm.example.test/api', { q: 1 });

            expect(response.data).toEqual({ answer: 'yes' });
            expect(response.ok).toBe(true);
        });

        it('should return other bodies as text', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('plain', { status: 200 })));

            const response = await client.get('https://llm.example.test/api');

            expect(response.data).toBe('plain');
        });

        it('should send object bodies as JSON', async () => {
            const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response('', { status: 200 }));
            vi.stubGlobal('fetch', fetchMock);

            await client.post('https://llm.example.test/api', { prompt: 'hi' });

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.body).toBe('{"prompt":"hi"}');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
        });
    });

    describe('errors and retries', () => {
        it('should retry a retryable status honouring Retry-After', async () => {
            const responses = [
                new Response('busy', { status: 503, headers: { 'retry-after': '0' } }),
                new Response('done', { status: 200 }),
            ];
            const fetchMock = vi.fn(async () => responses.shift() ?? new Response('', { status: 500 }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get('https://llm.example.test/api', { source: 'ollama' });

            expect(response.data).toBe('done');
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should throw a non-retryable HttpError for client errors', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 401, statusText: 'Unauthorized' })));

            const error = await client.get('https://llm.example.test/api').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (!(error instanceof HttpError)) return;
            expect(error.status).toBe(401);
            expect(error.retryable).toBe(false);
            expect(error.message).toBe('HTTP 401: Unauthorized');
            expect(error.response).toBe('nope');
        });

        it('should wrap network failures', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => {
                throw new TypeError('fetch failed');
            }));

            await expect(client.get('https://llm.example.test/api')).rejects.toThrow('Network error: fetch failed');
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests beyond the burst for a provider', async () => {
            const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
            vi.stubGlobal('fetch', fetchMock);

            const start = Date.now();

            // openai allows a burst of 5 at 5/s, so the sixth waits ~200ms
            for (let i = 0; i < 6; i++) {
                await client.get(`https://llm.example.test/${i}`, { source: 'openai' });
            }

            const elapsed = Date.now() - start;
            expect(elapsed).toBeGreaterThanOrEqual(150);
            expect(fetchMock).toHaveBeenCalledTimes(6);
        });
    });
});
