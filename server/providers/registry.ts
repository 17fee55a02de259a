import { AnthropicAdapter } from "./anthropicAdapter.js";
import { UnsupportedProviderError } from "./errors.js";
import { GeminiAdapter } from "./geminiAdapter.js";
import { MockAdapter } from "./mockAdapter.js";
import { OllamaAdapter, type OllamaAdapterOptions } from "./ollamaAdapter.js";
import { OpenAIAdapter } from "./openaiAdapter.js";
import type { ProviderSettings } from "./providerConfig.js";
import type { ProviderAdapter, ProviderFactory } from "./types.js";

export class ProviderRegistry {
  private factories = new Map<string, ProviderFactory>();

  register(providerId: string, factory: ProviderFactory): this {
    this.factories.set(providerId, factory);
    return this;
  }

  has(providerId: string): boolean {
    return this.factories.has(providerId);
  }

  list(): string[] {
    return [...this.factories.keys()];
  }

  /** A fresh adapter per call; identifiers match exactly. */
  resolve(providerId: string): ProviderAdapter {
    const factory = this.factories.get(providerId);
    if (!factory) {
      throw new UnsupportedProviderError(providerId);
    }
    return factory();
  }
}

export function createProviderRegistry(
  settings: ProviderSettings,
  options: { ollama?: OllamaAdapterOptions } = {},
): ProviderRegistry {
  const registry = new ProviderRegistry()
    .register("openai", () => new OpenAIAdapter(settings.openai))
    .register("gemini", () => new GeminiAdapter(settings.gemini))
    .register("anthropic", () => new AnthropicAdapter(settings.anthropic))
    .register("ollama", () => new OllamaAdapter(settings.ollama, options.ollama));

  if (settings.enableMock) {
    registry.register("mock", () => new MockAdapter());
  }
  return registry;
}
