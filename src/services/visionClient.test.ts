import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    UnsupportedRequestError,
    VisionBackend,
    VisionImage,
    analyzeImage,
    createGroqBackends
} from './visionClient';

const image: VisionImage = { data: Buffer.from('png-bytes'), mimeType: 'image/png' };

function backend(name: string, analyze: VisionBackend['analyze']): VisionBackend {
    return { name, analyze };
}

const neverSettles = backend('slow', () => new Promise<string>(() => undefined));

function fakeFetch(status: number, body: string) {
    const calls: { url: string; init?: RequestInit }[] = [];
    const fetchImpl: typeof fetch = async (input, init) => {
        calls.push({ url: String(input), init });
        return new Response(body, { status });
    };
    return { fetchImpl, calls };
}

describe('analyzeImage', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('falls through an unsupported backend to the next one', async () => {
        const outcome = await analyzeImage(image, [
            backend('retired', async () => {
                throw new UnsupportedRequestError('Model retired not available');
            }),
            backend('current', async () => 'REGISTER_NUMBERS:\nTVE20CS001')
        ], { timeoutMs: 1000 });

        expect(outcome).toEqual({ status: 'ok', backend: 'current', text: 'REGISTER_NUMBERS:\nTVE20CS001' });
    });

    it('reports every attempt once the backends run out', async () => {
        const outcome = await analyzeImage(image, [
            neverSettles,
            backend('broken', async () => {
                throw new Error('boom');
            })
        ], { timeoutMs: 20 });

        expect(outcome).toEqual({
            status: 'unavailable',
            attempts: [
                { backend: 'slow', reason: 'timeout', detail: 'aborted' },
                { backend: 'broken', reason: 'failed', detail: 'boom' }
            ]
        });
    });

    it('hands each attempt a signal that aborts on timeout', async () => {
        let seen: AbortSignal | undefined;
        await analyzeImage(image, [
            backend('slow', (_image, signal) => {
                seen = signal;
                return new Promise<string>(() => undefined);
            })
        ], { timeoutMs: 10 });

        expect(seen?.aborted).toBe(true);
    });

    it('tries nothing once the caller has aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const analyze = vi.fn(async () => 'unused');

        const outcome = await analyzeImage(image, [backend('current', analyze)], {
            timeoutMs: 1000,
            signal: controller.signal
        });

        expect(outcome).toEqual({ status: 'unavailable', attempts: [] });
        expect(analyze).not.toHaveBeenCalled();
    });

    it('stops when the caller aborts mid-attempt', async () => {
        const controller = new AbortController();
        const second = vi.fn(async () => 'unused');
        setTimeout(() => controller.abort(), 10);

        const outcome = await analyzeImage(image, [neverSettles, backend('next', second)], {
            timeoutMs: 5000,
            signal: controller.signal
        });

        expect(outcome).toEqual({
            status: 'unavailable',
            attempts: [{ backend: 'slow', reason: 'failed', detail: 'aborted' }]
        });
        expect(second).not.toHaveBeenCalled();
    });
});

describe('createGroqBackends', () => {
    const signal = new AbortController().signal;

    it('creates one backend per model, in order', () => {
        const backends = createGroqBackends('test-secret', ['model-a', 'model-b'], fakeFetch(200, '{}').fetchImpl);
        expect(backends.map(b => b.name)).toEqual(['model-a', 'model-b']);
    });

    it('posts the image as a data URL and returns the message content', async () => {
        const { fetchImpl, calls } = fakeFetch(200, JSON.stringify({
            choices: [{ message: { content: 'EXAM_NAME: Practical' } }]
        }));
        const [groq] = createGroqBackends('test-secret', ['model-a'], fetchImpl);

        await expect(groq.analyze(image, signal)).resolves.toBe('EXAM_NAME: Practical');

        expect(calls).toHaveLength(1);
        expect(calls[0].url).toBe('https://api.groq.com/openai/v1/chat/completions');
        expect(calls[0].init?.headers).toEqual({
            'Authorization': 'Bearer test-secret',
            'Content-Type': 'application/json'
        });
        const payload = JSON.parse(String(calls[0].init?.body));
        expect(payload.model).toBe('model-a');
        expect(payload.messages[0].content[1].image_url.url)
            .toBe(`data:image/png;base64,${Buffer.from('png-bytes').toString('base64')}`);
    });

    it('marks a 400 about the model as unsupported', async () => {
        const { fetchImpl } = fakeFetch(400, '{"error":{"message":"The model model-a does not exist"}}');
        const [groq] = createGroqBackends('test-secret', ['model-a'], fetchImpl);

        await expect(groq.analyze(image, signal)).rejects.toThrow(UnsupportedRequestError);
        await expect(groq.analyze(image, signal)).rejects.toThrow('Model model-a not available');
    });

    it('treats other errors as transient', async () => {
        const { fetchImpl } = fakeFetch(503, 'overloaded');
        const [groq] = createGroqBackends('test-secret', ['model-a'], fetchImpl);

        await expect(groq.analyze(image, signal)).rejects.toThrow('Groq API error 503: overloaded');
    });

    it('rejects a completion without content', async () => {
        const { fetchImpl } = fakeFetch(200, '{"choices":[]}');
        const [groq] = createGroqBackends('test-secret', ['model-a'], fetchImpl);

        await expect(groq.analyze(image, signal)).rejects.toThrow('Model model-a returned no content');
    });
});
