import axios from 'axios';
import {
  classifyError,
  cleanCompletion,
  CompletionClient,
  createCompletionProvider,
  PLACEHOLDER_API_KEY,
} from '../completionClient.js';
import { CompletionError } from '../../utils/errors.js';
import { DEFAULT_SETTINGS } from '../../../modules/config.js';
import { logger, LogLevel } from '../../utils/logger.js';

const mockPost = jest.fn();

jest.mock('axios', () => {
  return {
    __esModule: true,
    default: {
      create: jest.fn(() => ({ post: mockPost })),
      isAxiosError: (error: unknown) =>
        typeof error === 'object' && error !== null && 'isAxiosError' in error,
    },
  };
});

function axiosFailure(fields: { code?: string; response?: { status: number } }) {
  return Object.assign(new Error('Request failed'), { isAxiosError: true }, fields);
}

const settings = {
  ...DEFAULT_SETTINGS,
  apiEndpoint: 'http://localhost:8080/v1/',
  apiKey: 'test-key',
};

describe('completionClient', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  beforeEach(() => {
    mockPost.mockReset();
  });

  it('sends the context as a chat completion request', async () => {
    mockPost.mockResolvedValue({ data: { choices: [{ message: { content: ' jumps over' } }] } });
    const client = new CompletionClient(settings);

    const result = await client.complete('The quick brown fox', 3000);

    expect(result).toEqual({ ok: true, text: ' jumps over' });
    expect(axios.create).toHaveBeenCalledWith({
      baseURL: 'http://localhost:8080/v1',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' },
    });
    expect(mockPost).toHaveBeenCalledWith(
      '/chat/completions',
      {
        model: 'gpt-4',
        messages: [
          { role: 'system', content: expect.any(String) },
          { role: 'user', content: 'The quick brown fox' },
        ],
        max_tokens: 30,
        temperature: 0.7,
        stream: false,
      },
      { timeout: 3000 }
    );
  });

  it('strips surrounding quotes from the completion', async () => {
    mockPost.mockResolvedValue({ data: { choices: [{ message: { content: '"over the dog"\n' } }] } });

    const result = await new CompletionClient(settings).complete('jumps', 3000);
    expect(result).toEqual({ ok: true, text: 'over the dog' });
  });

  it('reports a response without content as malformed', async () => {
    mockPost.mockResolvedValue({ data: { choices: [] } });

    const result = await new CompletionClient(settings).complete('jumps', 3000);
    expect(result).toEqual({
      ok: false,
      reason: 'malformed',
      message: 'Completion response had no message content',
    });
  });

  it('reports a timeout', async () => {
    mockPost.mockRejectedValue(axiosFailure({ code: 'ECONNABORTED' }));

    const result = await new CompletionClient(settings).complete('jumps', 3000);
    expect(result).toEqual({ ok: false, reason: 'timeout', message: 'Completion request timed out' });
  });

  it('reports a rejected key', async () => {
    mockPost.mockRejectedValue(axiosFailure({ response: { status: 401 } }));

    const result = await new CompletionClient(settings).complete('jumps', 3000);
    expect(result).toMatchObject({ ok: false, reason: 'auth' });
  });

  it('reports other HTTP errors with the status', async () => {
    mockPost.mockRejectedValue(axiosFailure({ response: { status: 500 } }));

    const result = await new CompletionClient(settings).complete('jumps', 3000);
    expect(result).toEqual({ ok: false, reason: 'http', message: 'Completion request failed: 500' });
  });

  it('classifies anything else as a network failure', () => {
    const error = classifyError(new Error('socket hang up'));

    expect(error).toBeInstanceOf(CompletionError);
    expect(error.reason).toBe('network');
    expect(error.message).toBe('Completion request failed: socket hang up');
  });

  it('cleans leading newlines and trailing whitespace', () => {
    expect(cleanCompletion('\n\n hello  ')).toBe(' hello');
    expect(cleanCompletion('"')).toBe('"');
  });

  it('has no provider without an API key', () => {
    expect(createCompletionProvider({ ...settings, apiKey: '' })).toBeNull();
    expect(createCompletionProvider(settings)).toBeInstanceOf(CompletionClient);
  });

  it('treats the sample placeholder key as no key', () => {
    expect(PLACEHOLDER_API_KEY).toBe('your-api-key-here');
    expect(createCompletionProvider({ ...settings, apiKey: 'your-api-key-here' })).toBeNull();
  });
});
