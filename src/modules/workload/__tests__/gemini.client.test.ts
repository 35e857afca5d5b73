import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { GEMINI_BASE_URL, GeminiTextGenerator } from '../gemini.client';
import { InvalidResponseError, ServiceUnavailableError } from '../workload.errors';

const response = (data: unknown, status = 200): AxiosResponse => ({
  data,
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('GeminiTextGenerator', () => {
  const generator = new GeminiTextGenerator({ apiKey: 'test-key', model: 'gemini-1.5-flash', timeoutMs: 5000 });
  let postSpy: jest.SpyInstance;

  beforeEach(() => {
    postSpy = jest.spyOn(axios, 'post');
  });

  it('should send the prompt with key header and timeout', async () => {
    postSpy.mockResolvedValue(response({ candidates: [{ content: { parts: [{ text: 'Hello ' }, { text: 'world' }] } }] }));

    await expect(generator.generate('Say hi')).resolves.toBe('Hello world');
    expect(postSpy).toHaveBeenCalledWith(
      `${GEMINI_BASE_URL}/models/gemini-1.5-flash:generateContent`,
      { contents: [{ role: 'user', parts: [{ text: 'Say hi' }] }] },
      { headers: { 'x-goog-api-key': 'test-key' }, timeout: 5000 }
    );
  });

  it('should report timeouts as service unavailable', async () => {
    postSpy.mockRejectedValue(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'));

    await expect(generator.generate('x')).rejects.toThrow(new ServiceUnavailableError('Gemini request failed: ECONNABORTED'));
  });

  it('should report error statuses as service unavailable', async () => {
    postSpy.mockRejectedValue(
      new AxiosError('Request failed with status code 429', 'ERR_BAD_REQUEST', undefined, undefined, response({}, 429))
    );

    await expect(generator.generate('x')).rejects.toThrow('Gemini request failed with status 429');
  });

  it('should reject responses without text', async () => {
    postSpy.mockResolvedValue(response({ candidates: [] }));

    await expect(generator.generate('x')).rejects.toThrow(InvalidResponseError);
  });

  it('should reject responses with an unexpected shape', async () => {
    postSpy.mockResolvedValue(response({ candidates: 'nope' }));

    await expect(generator.generate('x')).rejects.toThrow('Gemini response has an unexpected shape');
  });
});
