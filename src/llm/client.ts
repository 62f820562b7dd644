import Anthropic from "@anthropic-ai/sdk";

export interface ModelCall {
  text: string;
  modelId: string;
  costEstimate: number;
}

/**
 * One prompt in, one completion out. Implementations make a single attempt
 * and reject on error or timeout; callers decide how to degrade.
 */
export interface LanguageModel {
  generate(prompt: string, maxTokens: number): Promise<ModelCall>;
}

export interface AnthropicModelConfig {
  apiKey: string;
  modelId: string;
  timeoutMs: number;
}

// USD per million tokens
const PRICING: Record<string, { input: number; output: number }> = {
  "claude-haiku-4-5": { input: 1, output: 5 },
  "claude-sonnet-4-5": { input: 3, output: 15 },
  "claude-3-5-haiku-latest": { input: 0.8, output: 4 },
  "claude-3-haiku-20240307": { input: 0.25, output: 1.25 },
};

const DEFAULT_PRICING = PRICING["claude-haiku-4-5"];

export function estimateCost(modelId: string, inputTokens: number, outputTokens: number): number {
  const pricing = PRICING[modelId] ?? DEFAULT_PRICING;
  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export class AnthropicModel implements LanguageModel {
  private readonly client: Anthropic;

  constructor(private readonly config: AnthropicModelConfig) {
    // Retries happen on the next scheduled run, never inside one
    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, maxTokens: number): Promise<ModelCall> {
    const response = await this.client.messages.create({
      model: this.config.modelId,
      max_tokens: maxTokens,
      messages: [
        {
          role: "user",
          content: prompt,
        },
      ],
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        parts.push(block.text);
      }
    }

    return {
      text: parts.join("\n").trim(),
      modelId: response.model,
      costEstimate: estimateCost(
        this.config.modelId,
        response.usage.input_tokens,
        response.usage.output_tokens
      ),
    };
  }
}
