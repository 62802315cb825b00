import Anthropic from '@anthropic-ai/sdk';
import type { AiSummary, Summarizer, SummaryRequest } from './summarizer.js';
import { buildPrompt, parseReply } from './prompt.js';

export interface AnthropicSummarizerOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

export class AnthropicSummarizer implements Summarizer {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(options: AnthropicSummarizerOptions) {
    // The caller enforces the deadline; retries would only stretch it.
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 256;
  }

  async summarize(request: SummaryRequest, signal: AbortSignal): Promise<AiSummary> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: buildPrompt(request) }],
      },
      { signal },
    );

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('\n');

    return { ...parseReply(text), model: response.model };
  }
}
