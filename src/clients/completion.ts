/**
 * Text completion client
 *
 * Nodes see completion as an opaque `prompt -> text` function; this module
 * binds that function to the OpenAI chat completions API.
 */

import OpenAI from 'openai';
import { CompletionError } from '../errors';

/** Opaque `prompt -> text` function the campaign nodes call */
export type TextCompletion = (prompt: string) => Promise<string>;

export interface OpenAICompletionOptions {
  apiKey: string;
  model: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  temperature?: number;
  /** Injected client, mainly for tests */
  client?: OpenAI;
}

/**
 * Create a completion function backed by OpenAI chat completions.
 * Responses are requested in JSON mode since every prompt asks for JSON.
 *
 * @throws CompletionError (from the returned function) on API errors,
 * timeouts and empty responses
 */
export function createOpenAICompletion(
  options: OpenAICompletionOptions
): TextCompletion {
  const client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  const temperature = options.temperature ?? 0.2;

  return async (prompt: string): Promise<string> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await client.chat.completions.create(
        {
          model: options.model,
          messages: [{ role: 'user', content: prompt }],
          temperature,
          response_format: { type: 'json_object' },
        },
        { signal: controller.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new CompletionError('Empty response from OpenAI');
      }
      return content;
    } catch (error) {
      if (error instanceof CompletionError) {
        throw error;
      }
      if (error instanceof OpenAI.APIUserAbortError) {
        throw new CompletionError(
          `Request timed out after ${options.timeoutMs}ms`,
          408
        );
      }
      if (error instanceof OpenAI.APIError) {
        throw new CompletionError(error.message, error.status);
      }
      throw new CompletionError(
        error instanceof Error ? error.message : 'Unknown error'
      );
    } finally {
      clearTimeout(timeoutId);
    }
  };
}

/**
 * Completion used when no API key is configured. Every call fails, so the
 * nodes take their soft-failure paths.
 */
export const unavailableCompletion: TextCompletion = async () => {
  throw new CompletionError('No completion service is configured');
};

/**
 * Extract JSON from completion text
 *
 * Handles raw JSON, JSON in markdown code blocks and JSON embedded in
 * prose.
 *
 * @returns the parsed value, or undefined if nothing parses
 */
export function extractJson(text: string): unknown {
  let cleanText = text.trim();

  const codeBlockMatch = cleanText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    cleanText = codeBlockMatch[1].trim();
  }

  if (!cleanText.startsWith('{') && !cleanText.startsWith('[')) {
    const jsonMatch = cleanText.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
    if (jsonMatch) {
      cleanText = jsonMatch[1];
    }
  }

  try {
    const parsed: unknown = JSON.parse(cleanText);
    return parsed;
  } catch {
    return undefined;
  }
}
