// src/lib/llm/chatClient.ts
import OpenAI from 'openai';
import type { LlmConfig } from '../config';
import { conTimeout } from '../reintentos';

export type PeticionChat = {
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
};

export interface ChatClient {
  readonly modelo: string;
  /** Texto de la primera opción, recortado. "" si el modelo no devolvió nada. */
  completar(peticion: PeticionChat): Promise<string>;
}

/**
 * Cliente para cualquier API compatible con chat/completions de OpenAI
 * (OpenRouter por defecto). Sin reintentos: el que llama decide el fallback.
 */
export class OpenAIChatClient implements ChatClient {
  readonly modelo: string;
  private readonly openai: OpenAI;
  private readonly timeoutMs: number;

  constructor(config: LlmConfig) {
    this.modelo = config.model;
    this.timeoutMs = config.timeoutMs;
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async completar(peticion: PeticionChat): Promise<string> {
    const completion = await conTimeout(
      this.openai.chat.completions.create({
        model: this.modelo,
        temperature: peticion.temperature,
        max_tokens: peticion.maxTokens,
        messages: [
          { role: 'system', content: peticion.system },
          { role: 'user', content: peticion.user },
        ],
      }),
      this.timeoutMs,
      'LLM'
    );
    return completion.choices[0]?.message?.content?.trim() || '';
  }
}
