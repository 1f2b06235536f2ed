import Anthropic from '@anthropic-ai/sdk';

export const BACKEND_TYPES = ['anthropic', 'ollama', 'gemini'] as const;

export type BackendType = (typeof BACKEND_TYPES)[number];

export interface InferenceBackend {
  name: string;
  type: BackendType;
  model: string;
  baseUrl?: string;
}

export interface GenerationSettings {
  temperature: number;
  top_p: number;
  top_k: number;
  max_output_tokens: number;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

/** The model call consumed by the chat turn. May reject. */
export interface TextGenerator {
  generate(prompt: string, history: ChatMessage[]): Promise<string>;
}

export interface InferenceRequest {
  input: string;
  history?: ChatMessage[];
  systemPrompt?: string;
}

export interface InferenceResponse {
  output: string;
  model: string;
  tokensUsed?: number;
  latencyMs: number;
}

export interface InferenceRouterOptions {
  systemPrompt: string;
  generation: GenerationSettings;
  apiKeys?: {
    anthropic?: string;
    gemini?: string;
  };
}

const SOURCE_REQUEST = 'Please include sources or citations for your information.';

/** Asks for citations unless the prompt already mentions them. */
export function enhancePrompt(prompt: string): string {
  if (/source|reference|citation/i.test(prompt)) return prompt;
  return `${prompt}\n\n${SOURCE_REQUEST}`;
}

/** Merges consecutive same-role turns and drops leading assistant turns. */
export function toAlternating(messages: ChatMessage[]): ChatMessage[] {
  const result: ChatMessage[] = [];
  for (const msg of messages) {
    if (result.length === 0 && msg.role === 'assistant') continue;
    const last = result[result.length - 1];
    if (last && last.role === msg.role) {
      result[result.length - 1] = { role: last.role, content: `${last.content}\n\n${msg.content}` };
    } else {
      result.push({ ...msg });
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readOllamaOutput(data: unknown): string {
  const message = isRecord(data) ? data['message'] : undefined;
  const content = isRecord(message) ? message['content'] : undefined;
  if (typeof content === 'string') return content;
  throw new Error('Ollama returned an unexpected payload');
}

function readGeminiOutput(data: unknown): string {
  const candidates = isRecord(data) ? data['candidates'] : undefined;
  const first: unknown = Array.isArray(candidates) ? candidates[0] : undefined;
  const content = isRecord(first) ? first['content'] : undefined;
  const parts = isRecord(content) ? content['parts'] : undefined;

  if (!Array.isArray(parts)) {
    throw new Error('Gemini returned no candidates');
  }

  return parts
    .map((part: unknown) => {
      const text = isRecord(part) ? part['text'] : undefined;
      return typeof text === 'string' ? text : '';
    })
    .join('');
}

export class InferenceRouter implements TextGenerator {
  private backends: Map<string, InferenceBackend> = new Map();
  private anthropic?: Anthropic;
  private defaultBackend: string;
  private options: InferenceRouterOptions;

  constructor(backends: InferenceBackend[], defaultBackend: string, options: InferenceRouterOptions) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);
    }

    this.defaultBackend = defaultBackend;
    this.options = options;
  }

  async generate(prompt: string, history: ChatMessage[]): Promise<string> {
    const result = await this.infer({ input: enhancePrompt(prompt), history });
    return result.output;
  }

  async infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse> {
    const backend = this.backends.get(backendName || this.defaultBackend);
    if (!backend) {
      throw new Error(`Backend ${backendName || this.defaultBackend} not configured`);
    }

    const startTime = Date.now();
    const messages = toAlternating([
      ...(request.history ?? []),
      { role: 'user', content: request.input }
    ]);
    const systemPrompt = request.systemPrompt ?? this.options.systemPrompt;

    switch (backend.type) {
      case 'anthropic':
        return this.inferAnthropic(messages, systemPrompt, backend, startTime);

      case 'ollama':
        return this.inferOllama(messages, systemPrompt, backend, startTime);

      case 'gemini':
        return this.inferGemini(messages, systemPrompt, backend, startTime);
    }
  }

  private async inferAnthropic(
    messages: ChatMessage[],
    systemPrompt: string,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    if (!this.anthropic) {
      const apiKey = this.options.apiKeys?.anthropic ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY is not set');
      }
      this.anthropic = new Anthropic({ apiKey, baseURL: backend.baseUrl });
    }

    const { generation } = this.options;
    const response = await this.anthropic.messages.create({
      model: backend.model,
      max_tokens: generation.max_output_tokens,
      temperature: generation.temperature,
      top_p: generation.top_p,
      top_k: generation.top_k,
      system: systemPrompt,
      messages
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }

    return {
      output: parts.join('\n'),
      model: backend.model,
      tokensUsed: response.usage.output_tokens,
      latencyMs: Date.now() - startTime
    };
  }

  private async inferOllama(
    messages: ChatMessage[],
    systemPrompt: string,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    const baseUrl = backend.baseUrl || 'http://localhost:11434';
    const { generation } = this.options;

    const response = await fetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: backend.model,
        messages: [{ role: 'system', content: systemPrompt }, ...messages],
        stream: false,
        options: {
          temperature: generation.temperature,
          top_p: generation.top_p,
          top_k: generation.top_k,
          num_predict: generation.max_output_tokens
        }
      })
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${response.status}`);
    }

    const data: unknown = await response.json();

    return {
      output: readOllamaOutput(data),
      model: backend.model,
      latencyMs: Date.now() - startTime
    };
  }

  private async inferGemini(
    messages: ChatMessage[],
    systemPrompt: string,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    const apiKey = this.options.apiKeys?.gemini ?? process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is not set');
    }

    const baseUrl = backend.baseUrl || 'https://generativelanguage.googleapis.com';
    const { generation } = this.options;

    const response = await fetch(`${baseUrl}/v1beta/models/${backend.model}:generateContent`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': apiKey
      },
      body: JSON.stringify({
        systemInstruction: { parts: [{ text: systemPrompt }] },
        contents: messages.map(msg => ({
          role: msg.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: msg.content }]
        })),
        generationConfig: {
          temperature: generation.temperature,
          topP: generation.top_p,
          topK: generation.top_k,
          maxOutputTokens: generation.max_output_tokens
        }
      })
    });

    if (!response.ok) {
      throw new Error(`Gemini error: ${response.status}`);
    }

    const data: unknown = await response.json();

    return {
      output: readGeminiOutput(data),
      model: backend.model,
      latencyMs: Date.now() - startTime
    };
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
