import type { AnthropicOptions } from "@llm"
import type { MedGemmaGeneratorOptions } from "@llm-medgemma"
import type { VisionAnalyzer } from "@pipeline-shared"
import type { VisionProvider } from "@ward-config"
import { AnthropicVisionAnalyzer } from "./providers/anthropic-vision"
import { MedGemmaVisionAnalyzer } from "./providers/medgemma-vision"

export interface VisionAnalyzerOptions {
  anthropic?: AnthropicOptions
  medgemma?: MedGemmaGeneratorOptions
}

export function createVisionAnalyzer(provider: VisionProvider, options: VisionAnalyzerOptions = {}): VisionAnalyzer {
  switch (provider) {
    case "medgemma":
      return new MedGemmaVisionAnalyzer(options.medgemma)
    case "anthropic":
      return new AnthropicVisionAnalyzer(options.anthropic)
  }
}
