import http, { type Server } from 'http';
import { OpenAIProvider } from '../OpenAIProvider.js';
import { LLMService } from '../LLMService.js';
import { TokenBucketRateLimiter } from '../../infrastructure/rateLimiter.js';
import type { ChatCompletionRequest, ChatCompletionResult, OpenAIClient } from '../OpenAIProvider.js';
import { ConfigurationError, GenerationError } from '../../../types/errors.js';

function createClient(result: ChatCompletionResult): OpenAIClient & {
  complete: jest.Mock<Promise<ChatCompletionResult>, [ChatCompletionRequest, AbortSignal?]>;
} {
  return {
    complete: jest.fn<Promise<ChatCompletionResult>, [ChatCompletionRequest, AbortSignal?]>(async () => result),
  };
}

describe('OpenAIProvider', () => {
  const messages = [
    { role: 'system' as const, content: 'You are a document summarizer.' },
    { role: 'user' as const, content: 'Summarize this section:\n\nSome text.' },
  ];

  it('should send the request and map the response', async () => {
    const client = createClient({
      content: '  A concise summary.  ',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { prompt_tokens: 40, completion_tokens: 8, total_tokens: 48 },
    });
    const provider = new OpenAIProvider({ client });

    const response = await provider.generate(messages, { temperature: 0.3, max_tokens: 1500 });

    expect(client.complete).toHaveBeenCalledWith(
      { model: 'gpt-4o-mini', messages, temperature: 0.3, maxTokens: 1500 },
      undefined
    );
    expect(response).toEqual({
      content: 'A concise summary.',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { promptTokens: 40, completionTokens: 8, totalTokens: 48 },
    });
  });

  it('should use the configured default model and forward the abort signal', async () => {
    const client = createClient({ content: 'ok', model: 'deepseek-ai/DeepSeek-V3' });
    const provider = new OpenAIProvider({ name: 'ionet', defaultModel: 'deepseek-ai/DeepSeek-V3', client });
    const controller = new AbortController();

    await provider.generate(messages, { signal: controller.signal });

    expect(client.complete.mock.calls[0][0].model).toBe('deepseek-ai/DeepSeek-V3');
    expect(client.complete.mock.calls[0][1]).toBe(controller.signal);
    expect(provider.getName()).toBe('ionet');
  });

  it('should reject an empty completion', async () => {
    const provider = new OpenAIProvider({ client: createClient({ content: '   ', model: 'gpt-4o-mini' }) });

    await expect(provider.generate(messages)).rejects.toBeInstanceOf(GenerationError);
  });

  it('should rethrow client errors', async () => {
    const failure = new Error('401 Incorrect API key provided');
    const client = createClient({ content: null, model: 'gpt-4o-mini' });
    client.complete.mockRejectedValueOnce(failure);
    const provider = new OpenAIProvider({ client });

    await expect(provider.generate(messages)).rejects.toBe(failure);
  });

  it('should fail at construction without an API key', () => {
    expect(() => new OpenAIProvider()).toThrow(ConfigurationError);

    try {
      new OpenAIProvider({ name: 'ionet', apiKeyEnv: 'IONET_API_KEY' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ serviceName: 'ionet', missingConfig: ['IONET_API_KEY'] });
    }
    expect.assertions(3);
  });
});

interface ReceivedRequest {
  method?: string;
  url?: string;
  authorization?: string;
  body: string;
}

describe('OpenAIProvider with the SDK client', () => {
  const messages = [
    { role: 'system' as const, content: 'You are a document summarizer.' },
    { role: 'user' as const, content: 'Summarize this section:\n\nSome text.' },
  ];

  let server: Server;
  let baseUrl: string;
  let received: ReceivedRequest[];
  let reply: { status: number; body: unknown };

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        received.push({ method: req.method, url: req.url, authorization: req.headers.authorization, body });
        res.writeHead(reply.status, { 'content-type': 'application/json' });
        res.end(JSON.stringify(reply.body));
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/v1`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    received = [];
    reply = {
      status: 200,
      body: {
        id: 'chatcmpl-test',
        object: 'chat.completion',
        created: 0,
        model: 'gpt-4o-mini',
        choices: [{ index: 0, message: { role: 'assistant', content: 'A concise summary.' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 40, completion_tokens: 8, total_tokens: 48 },
      },
    };
  });

  it('should post a chat completion to the configured base URL', async () => {
    const provider = new OpenAIProvider({ apiKey: 'test-key', baseUrl });

    const response = await provider.generate(messages, { temperature: 0.3, max_tokens: 256 });

    expect(response).toEqual({
      content: 'A concise summary.',
      model: 'gpt-4o-mini',
      usage: { promptTokens: 40, completionTokens: 8, totalTokens: 48 },
    });
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ method: 'POST', url: '/v1/chat/completions', authorization: 'Bearer test-key' });
    expect(JSON.parse(received[0].body)).toMatchObject({
      model: 'gpt-4o-mini',
      messages,
      temperature: 0.3,
      max_tokens: 256,
    });
  });

  it('should send exactly one request per rate-limit grant when the service answers 429', async () => {
    reply = {
      status: 429,
      body: { error: { message: 'Rate limit reached', type: 'requests', code: 'rate_limit_exceeded' } },
    };
    const rateLimiter = new TokenBucketRateLimiter({ requestsPerMinute: 1 });
    const service = new LLMService(new OpenAIProvider({ apiKey: 'test-key', baseUrl }), rateLimiter, {
      temperature: 0.3,
      maxTokens: 256,
    });

    try {
      await expect(service.generate('system prompt', 'user prompt')).rejects.toBeInstanceOf(GenerationError);
      expect(received).toHaveLength(1);
    } finally {
      rateLimiter.dispose();
    }
  });
});
