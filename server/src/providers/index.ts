import { ModelProvider } from "../core/types.js";
import { AnthropicProvider } from "./anthropicProvider.js";
import { BedrockProvider } from "./bedrockProvider.js";
import { TokenPricing } from "./pricing.js";

export interface ProviderConfig {
  modelProvider: "anthropic" | "bedrock";
  anthropicApiKey?: string;
  anthropicModel: string;
  maxTokens: number;
  bedrockModelId: string;
  awsRegion: string;
  /** Overrides the per-provider default prices when set. */
  pricing?: TokenPricing;
}

const DEFAULT_PRICING: Record<ProviderConfig["modelProvider"], TokenPricing> = {
  anthropic: { inputPerMTok: 3, outputPerMTok: 15 },
  bedrock: { inputPerMTok: 0.06, outputPerMTok: 0.24 },
};

export function buildProvider(config: ProviderConfig): ModelProvider {
  const pricing = config.pricing ?? DEFAULT_PRICING[config.modelProvider];

  if (config.modelProvider === "bedrock") {
    return new BedrockProvider({
      modelId: config.bedrockModelId,
      region: config.awsRegion,
      maxTokens: config.maxTokens,
      pricing,
    });
  }

  if (!config.anthropicApiKey) {
    throw new Error("ANTHROPIC_API_KEY is required when MODEL_PROVIDER=anthropic");
  }

  return new AnthropicProvider({
    apiKey: config.anthropicApiKey,
    model: config.anthropicModel,
    maxTokens: config.maxTokens,
    pricing,
  });
}
