/**
 * Client for OpenAI-compatible chat completion endpoints
 */

import axios, { AxiosInstance } from 'axios';
import { CompletionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatErrorMessage } from '../../utils/errors.js';
import { CompletionProvider, CompletionResult, EditorSettings } from '../../types/index.js';

/** Sample value from example configs; never a real key */
export const PLACEHOLDER_API_KEY = 'your-api-key-here';

const SYSTEM_PROMPT =
  'You are a helpful writing assistant. Continue the given text naturally. ' +
  'Only provide the continuation, not the original text. Keep it concise and relevant.';

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: unknown } }>;
}

export type CompletionClientOptions = Pick<
  EditorSettings,
  'apiEndpoint' | 'apiKey' | 'model' | 'maxTokens' | 'temperature'
>;

/**
 * Tidy up raw model output so it can be shown as ghost text
 */
export function cleanCompletion(raw: string): string {
  let text = raw.replace(/^[\r\n]+/, '').trimEnd();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    text = text.slice(1, -1);
  }
  return text;
}

/**
 * Map anything thrown by axios to a CompletionError
 */
export function classifyError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new CompletionError('timeout', 'Completion request timed out');
    }

    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new CompletionError('auth', 'Completion endpoint rejected the API key');
    }
    if (status !== undefined) {
      return new CompletionError('http', `Completion request failed: ${status}`);
    }
  }

  return new CompletionError('network', `Completion request failed: ${formatErrorMessage(error)}`);
}

export class CompletionClient implements CompletionProvider {
  private client: AxiosInstance;
  private options: CompletionClientOptions;

  constructor(options: CompletionClientOptions) {
    this.options = { ...options };
    this.client = axios.create({
      baseURL: options.apiEndpoint.replace(/\/+$/, ''),
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
    });
  }

  async complete(context: string, timeoutMs: number): Promise<CompletionResult> {
    logger.debug('Completion request', { model: this.options.model, contextLength: context.length });

    try {
      const response = await this.client.post<ChatCompletionResponse>(
        '/chat/completions',
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: context },
          ],
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          stream: false,
        },
        { timeout: timeoutMs }
      );

      const content = response.data?.choices?.[0]?.message?.content;
      if (typeof content !== 'string') {
        throw new CompletionError('malformed', 'Completion response had no message content');
      }

      const text = cleanCompletion(content);
      logger.debug('Completion response', { length: text.length });
      return { ok: true, text };
    } catch (error) {
      const failure = classifyError(error);
      logger.debug('Completion failed', { reason: failure.reason, message: failure.message });
      return { ok: false, reason: failure.reason, message: failure.message };
    }
  }
}

export function hasApiKey(settings: Pick<EditorSettings, 'apiKey'>): boolean {
  return settings.apiKey !== '' && settings.apiKey !== PLACEHOLDER_API_KEY;
}

/**
 * The AI is only usable when a key is configured
 */
export function createCompletionProvider(settings: EditorSettings): CompletionProvider | null {
  if (!hasApiKey(settings)) {
    return null;
  }
  return new CompletionClient(settings);
}
