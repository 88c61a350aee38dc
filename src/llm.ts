import Anthropic from '@anthropic-ai/sdk';

/** The one model operation the screener relies on: system + user prompt in, plain text out. */
export interface LlmCapability {
  generate(system_prompt: string, user_prompt: string, max_output_tokens: number): Promise<string>;
}

export interface AnthropicLlmOptions {
  api_key: string;
  base_url?: string;
  model: string;
}

function is_text_block(block: Anthropic.ContentBlock): block is Anthropic.TextBlock {
  return block.type === 'text';
}

export function collect_text(response: Anthropic.Message): string {
  return response.content
    .filter(is_text_block)
    .map(b => b.text)
    .join('');
}

export function create_anthropic_llm(options: AnthropicLlmOptions): LlmCapability {
  const client = new Anthropic({ apiKey: options.api_key, baseURL: options.base_url });
  return {
    async generate(system_prompt, user_prompt, max_output_tokens) {
      const response = await client.messages.create({
        model: options.model,
        max_tokens: max_output_tokens,
        system: system_prompt,
        messages: [{ role: 'user', content: user_prompt }],
      });
      return collect_text(response);
    },
  };
}

export function with_timeout<T>(promise: Promise<T>, timeout_ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`LLM call timed out after ${timeout_ms}ms`));
    }, timeout_ms);
    promise
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export interface SafeGenerateArgs {
  llm: LlmCapability;
  system_prompt: string;
  user_prompt: string;
  max_output_tokens: number;
  timeout_ms: number;
  label: string;
}

/**
 * Single attempt with a deadline. Any failure (network, timeout, empty text) is
 * logged and collapsed to null so callers can take their static fallback.
 */
export async function generate_safely(args: SafeGenerateArgs): Promise<string | null> {
  try {
    const text = (await with_timeout(
      args.llm.generate(args.system_prompt, args.user_prompt, args.max_output_tokens),
      args.timeout_ms,
    )).trim();
    if (!text) {
      console.warn(`[llm] ${args.label}: empty response`);
      return null;
    }
    return text;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[llm] ${args.label} failed: ${message}`);
    return null;
  }
}

export function extract_json_array(raw: string): unknown[] | null {
  const match = raw.match(/\[[\s\S]*\]/);
  if (!match) return null;
  try {
    const parsed: unknown = JSON.parse(match[0]);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function extract_json_object(raw: string): Record<string, unknown> | null {
  const match = raw.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    const parsed: unknown = JSON.parse(match[0]);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    return null;
  }
}
