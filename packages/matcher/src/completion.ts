import { GoogleGenAI } from '@google/genai';

/**
 * Text in, text out. Implementations reject on transport failures and
 * timeouts; the scorer treats any rejection as a reason to fall back.
 */
export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}

export interface GeminiCompletionOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class GeminiCompletionClient implements CompletionClient {
  private readonly ai: GoogleGenAI;
  private readonly model: string;

  constructor(options: GeminiCompletionOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey, httpOptions: { timeout: options.timeoutMs } });
    this.model = options.model;
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: prompt,
    });

    const text = response.text;
    if (!text) {
      throw new Error(`Empty completion from ${this.model}`);
    }
    return text;
  }
}
