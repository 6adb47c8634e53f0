import { UpstreamRequestError } from '../../src/clients/http';
import { OllamaClient } from '../../src/clients/OllamaClient';
import { jsonResponse, mockFetch, textResponse, timeoutError } from '../helpers/fetch';

describe('OllamaClient', () => {
  let fetchMock: ReturnType<typeof mockFetch>;
  let client: OllamaClient;

  beforeEach(() => {
    fetchMock = mockFetch();
    client = new OllamaClient({
      generateUrl: 'http://ollama.test:11434/api/generate',
      embedUrl: 'http://ollama.test:11434/api/embeddings',
      baseUrl: 'http://ollama.test:11434',
      embedModel: 'all-minilm',
      generateModel: 'tinyllama',
      embedTimeoutMs: 1000,
      generateTimeoutMs: 2000,
    });
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('embed', () => {
    it('should post the model and prompt', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: [0.5, -0.25] }));

      await expect(client.embed('hello')).resolves.toEqual([0.5, -0.25]);

      expect(fetchMock).toHaveBeenCalledWith(
        'http://ollama.test:11434/api/embeddings',
        expect.objectContaining({
          method: 'POST',
          body: JSON.stringify({ model: 'all-minilm', prompt: 'hello' }),
          headers: { 'Content-Type': 'application/json' },
        }),
      );
    });

    it('should accept the batched embeddings shape', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 2, 3]] }));

      await expect(client.embed('hello')).resolves.toEqual([1, 2, 3]);
    });

    it('should reject an empty vector', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: [] }));

      await expect(client.embed('hello')).rejects.toThrow(
        'Embedding model all-minilm returned an empty vector',
      );
    });

    it('should report the status and body of a failed call', async () => {
      fetchMock.mockResolvedValueOnce(textResponse('model "all-minilm" not found', 404));

      const error = await client.embed('hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamRequestError);
      expect(error).toMatchObject({
        status: 404,
        timedOut: false,
        message:
          'POST http://ollama.test:11434/api/embeddings returned 404: model "all-minilm" not found',
      });
    });

    it('should flag timeouts', async () => {
      fetchMock.mockRejectedValueOnce(timeoutError());

      const error = await client.embed('hello').catch((e: unknown) => e);

      expect(error).toMatchObject({
        timedOut: true,
        message:
          'POST http://ollama.test:11434/api/embeddings failed: The operation was aborted due to timeout',
      });
    });

    it('should reject an unexpected payload', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ vector: [1] }));

      await expect(client.embed('hello')).rejects.toThrow(/returned an unexpected payload/);
    });
  });

  describe('generate', () => {
    it('should request a non-streaming completion', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ response: 'Hi there', done: true }));

      await expect(client.generate('Say hi')).resolves.toBe('Hi there');

      expect(fetchMock).toHaveBeenCalledWith(
        'http://ollama.test:11434/api/generate',
        expect.objectContaining({
          body: JSON.stringify({ model: 'tinyllama', prompt: 'Say hi', stream: false }),
        }),
      );
    });

    it('should fail without a response field', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ done: true }));

      await expect(client.generate('Say hi')).rejects.toThrow(
        'POST http://ollama.test:11434/api/generate returned an unexpected payload at response: Required',
      );
    });

    it('should reject invalid JSON', async () => {
      fetchMock.mockResolvedValueOnce(textResponse('not json', 200));

      await expect(client.generate('Say hi')).rejects.toThrow(
        /^POST http:\/\/ollama\.test:11434\/api\/generate returned invalid JSON/,
      );
    });
  });

  describe('ping', () => {
    it('should list the models', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ models: [] }));

      await expect(client.ping()).resolves.toBe(true);
      expect(fetchMock).toHaveBeenCalledWith(
        'http://ollama.test:11434/api/tags',
        expect.objectContaining({ method: 'GET' }),
      );
    });

    it('should return false when the server is down', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.ping()).resolves.toBe(false);
    });
  });
});
