import Anthropic from '@anthropic-ai/sdk';
import type { BackendConfig } from '../config.js';
import type { MissionImage } from '../types/index.js';

export interface InferenceRequest {
  input: string;
  systemPrompt?: string;
  image?: MissionImage;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface InferenceResponse {
  output: string;
  model: string;
  tokensUsed?: number;
  latencyMs: number;
}

/** The text-completion surface the reasoner depends on. */
export interface InferenceClient {
  infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse>;
}

type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

const IMAGE_MEDIA_TYPES: readonly string[] = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

export function isImageMediaType(value: string): value is ImageMediaType {
  return IMAGE_MEDIA_TYPES.includes(value);
}

const DEFAULT_SYSTEM_PROMPT = 'You are a disaster-response triage assistant. Respond only with the requested JSON.';

export class InferenceRouter implements InferenceClient {
  private backends: Map<string, BackendConfig> = new Map();
  private anthropic?: Anthropic;
  private defaultBackend: string;

  constructor(backends: BackendConfig[], defaultBackend: string) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);
    }

    this.defaultBackend = defaultBackend;
  }

  async infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse> {
    const backend = this.backends.get(backendName || this.defaultBackend);
    if (!backend) {
      throw new Error(`Backend ${backendName || this.defaultBackend} not configured`);
    }

    const startTime = Date.now();

    switch (backend.type) {
      case 'anthropic':
        return this.inferAnthropic(request, backend, startTime);

      case 'ollama':
        return this.inferOllama(request, backend, startTime);
    }
  }

  private async inferAnthropic(
    request: InferenceRequest,
    backend: BackendConfig,
    startTime: number
  ): Promise<InferenceResponse> {
    // Created on first use: a missing ANTHROPIC_API_KEY fails the call, not startup
    const client = (this.anthropic ??= new Anthropic());

    const content: Array<Anthropic.TextBlockParam | Anthropic.ImageBlockParam> = [];
    if (request.image) {
      if (!isImageMediaType(request.image.mimeType)) {
        throw new Error(`Unsupported image type: ${request.image.mimeType}`);
      }
      content.push({
        type: 'image',
        source: { type: 'base64', media_type: request.image.mimeType, data: request.image.data.toString('base64') }
      });
    }
    content.push({ type: 'text', text: request.input });

    const response = await client.messages.create({
      model: backend.model,
      max_tokens: request.maxTokens || 1024,
      temperature: request.temperature,
      system: request.systemPrompt || DEFAULT_SYSTEM_PROMPT,
      messages: [
        { role: 'user', content }
      ]
    }, { signal: request.signal });

    const output = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map(block => block.text)
      .join('\n');

    return {
      output,
      model: backend.model,
      tokensUsed: response.usage?.output_tokens,
      latencyMs: Date.now() - startTime
    };
  }

  private async inferOllama(
    request: InferenceRequest,
    backend: BackendConfig,
    startTime: number
  ): Promise<InferenceResponse> {
    const baseUrl = backend.base_url || 'http://localhost:11434';

    const response = await fetch(`${baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: backend.model,
        prompt: request.input,
        system: request.systemPrompt || DEFAULT_SYSTEM_PROMPT,
        images: request.image ? [request.image.data.toString('base64')] : undefined,
        options: request.temperature === undefined ? undefined : { temperature: request.temperature },
        stream: false
      }),
      signal: request.signal
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${response.status}`);
    }

    const data: unknown = await response.json();
    if (typeof data !== 'object' || data === null || !('response' in data) || typeof data.response !== 'string') {
      throw new Error('Ollama error: response field missing');
    }

    return {
      output: data.response,
      model: backend.model,
      latencyMs: Date.now() - startTime
    };
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
