import { describe, it, expect, vi } from 'vitest';
import { HttpQuestionGenerator } from '../src/generation/HttpQuestionGenerator.js';
import { GeneratorResponseError } from '../src/utils/errors.js';
import { makeQuestions } from './helpers.js';

const physics = { subject: ' Physics ', difficulty: 'Medium', count: 2, examType: 'IIT_JEE' };

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function generatorWith(fetchImpl: typeof fetch, timeoutMs: number = 1000): HttpQuestionGenerator {
  return new HttpQuestionGenerator({
    baseUrl: 'http://generator.test/',
    timeoutMs,
    defaultModel: { provider: 'openai', model: 'gpt-4o-mini' },
    fetch: fetchImpl,
  });
}

describe('HttpQuestionGenerator', () => {
  it('should post the request and return the questions', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(makeQuestions(2)));

    const questions = await generatorWith(fetchMock).generate(physics);

    expect(questions).toEqual(makeQuestions(2));
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://generator.test/generate');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      subject: 'Physics',
      difficulty: 'Medium',
      count: 2,
      exam_type: 'IIT_JEE',
      model_provider: 'openai',
      model_name: 'gpt-4o-mini',
    });
  });

  it('should send the model named in the request', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(makeQuestions(1)));

    await generatorWith(fetchMock).generate({ subject: 'Biology', difficulty: 'Easy', count: 1, modelProvider: 'Google' });

    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toMatchObject({
      exam_type: null,
      model_provider: 'google',
      model_name: 'gemini-1.5-flash',
    });
  });

  it('should accept a questions envelope', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ questions: makeQuestions(3) }));

    expect(await generatorWith(fetchMock).generate(physics)).toEqual(makeQuestions(3));
  });

  it('should reject non-2xx responses', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ detail: 'overloaded' }, 503));

    const failure = generatorWith(fetchMock).generate(physics);

    await expect(failure).rejects.toBeInstanceOf(GeneratorResponseError);
    await expect(failure).rejects.toMatchObject({ status: 503, message: 'Generator responded with status 503' });
  });

  it('should reject malformed payloads', async () => {
    const notJson = vi.fn<typeof fetch>(async () => new Response('<html>', { status: 200 }));
    await expect(generatorWith(notJson).generate(physics)).rejects.toThrow('Generator response is not valid JSON');

    const wrongShape = vi.fn<typeof fetch>(async () => jsonResponse({ items: [] }));
    await expect(generatorWith(wrongShape).generate(physics)).rejects.toThrow(
      'Generator response is not a list of questions'
    );

    const notObjects = vi.fn<typeof fetch>(async () => jsonResponse(['a', 'b']));
    await expect(generatorWith(notObjects).generate(physics)).rejects.toThrow(
      'Generator response is not a list of questions'
    );
  });

  it('should reject an empty list', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse([]));

    await expect(generatorWith(fetchMock).generate(physics)).rejects.toThrow('Generator returned no questions');
  });

  it('should abort requests that exceed the timeout', async () => {
    const hanging = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signal.addEventListener('abort', () => reject(signal.reason));
          }
        })
    );

    await expect(generatorWith(hanging, 10).generate(physics)).rejects.toThrow('Timed out after 10ms');
  });
});
