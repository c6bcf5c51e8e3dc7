/**
 * OpenAI-compatible chat engine
 *
 * Both model backends are served over the OpenAI chat-completions API:
 * text-generation-inference for `transformers`, llama.cpp's server for
 * `local-model`. The backend settings are resolved once at startup.
 */

import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ModelBackendConfig } from '../config.js';
import { createLogger } from '../logging.js';
import { buildAnalysisPrompt } from './prompt.js';
import type { AnalysisInput, RecommendationEngine } from './types.js';

const log = createLogger('model');

const SYSTEM_PROMPT =
  'You are a disciplined equity analyst. Output a single valid JSON object only, with no prose around it.';

const GENERATION = {
  max_tokens: 500,
  temperature: 0.7,
  top_p: 0.95,
} as const;

export function describeBackend(backend: ModelBackendConfig): string {
  if (backend.kind === 'local-model') {
    return (
      `local-model ${backend.modelPath} (gpu layers ${backend.gpuLayers}, ` +
      `mmap ${backend.useMmap ? 'on' : 'off'}, mlock ${backend.useMlock ? 'on' : 'off'}) at ${backend.baseUrl}`
    );
  }
  return `transformers ${backend.model} (${backend.device}, dtype ${backend.dtype}) at ${backend.baseUrl}`;
}

/** The slice of the OpenAI client the engine calls */
export interface ChatClient {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

function openAIChatClient(backend: ModelBackendConfig): ChatClient {
  const openai = new OpenAI({ baseURL: backend.baseUrl, apiKey: backend.apiKey });
  return { create: (body) => openai.chat.completions.create(body) };
}

/** Model name sent with each request */
function modelName(backend: ModelBackendConfig): string {
  return backend.kind === 'local-model' ? backend.modelPath : backend.model;
}

export class OpenAICompatibleEngine implements RecommendationEngine {
  readonly description: string;
  private chat: ChatClient;
  private model: string;

  constructor(backend: ModelBackendConfig, chat?: ChatClient) {
    this.chat = chat ?? openAIChatClient(backend);
    this.model = modelName(backend);
    this.description = describeBackend(backend);
    log.info(`Using model backend: ${this.description}`);
  }

  async generate(input: AnalysisInput): Promise<string> {
    const response = await this.chat.create({
      model: this.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildAnalysisPrompt(input) },
      ],
      ...GENERATION,
    });

    const content = response.choices[0]?.message?.content ?? '';
    if (!content.trim()) {
      log.warn(`Model returned no text for ${input.ticker}`);
    }
    return content;
  }
}
