/**
 * Generation client: one completion request per attempt
 */

import OpenAI from "openai";
import { GenerationServiceError, errorMessage } from "./errors";
import { ChatMessage, buildMessages } from "./llm";
import { Logger } from "./logger";
import { GenerationRequest, RuntimeConfig } from "./types";

export type CompletionSettings = {
  model: string;
  temperature: number;
};

/**
 * Text-in, text-out completion endpoint
 */
export interface CompletionService {
  complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string>;
}

export class OpenAICompletionService implements CompletionService {
  constructor(private client: OpenAI) {}

  async complete(messages: ChatMessage[], settings: CompletionSettings): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: settings.model,
      temperature: settings.temperature,
      messages: messages.map((message) => ({ role: message.role, content: message.content })),
    });
    return completion.choices[0]?.message?.content ?? "";
  }
}

export class GenerationClient {
  constructor(
    private service: CompletionService,
    private settings: CompletionSettings,
    private logger: Logger
  ) {}

  getModel(): string {
    return this.settings.model;
  }

  /**
   * Ask for a parser module. Any service failure, including an empty
   * completion, surfaces as GenerationServiceError.
   */
  async generate(request: GenerationRequest): Promise<string> {
    const messages = buildMessages(request);
    this.logger.info(`Sending prompt to ${this.settings.model}`, { attempt: request.attempt });

    let content: string;
    try {
      content = await this.service.complete(messages, this.settings);
    } catch (error) {
      throw new GenerationServiceError(`Completion request failed: ${errorMessage(error)}`, error);
    }

    const trimmed = content.trim();
    if (!trimmed) {
      throw new GenerationServiceError(`Model ${this.settings.model} returned an empty completion`);
    }
    return trimmed;
  }
}

export function createGenerationClient(config: RuntimeConfig, logger: Logger): GenerationClient {
  const openai = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
  return new GenerationClient(
    new OpenAICompletionService(openai),
    { model: config.model, temperature: config.temperature },
    logger
  );
}
