export { evidenceStrengthFor, isLabelInterpretable, parseImageFindings, toImageFindings, visionOutputSchema } from "./findings"
export type { VisionModelOutput } from "./findings"
export { AnthropicVisionAnalyzer } from "./providers/anthropic-vision"
export { MedGemmaVisionAnalyzer } from "./providers/medgemma-vision"
export { createVisionAnalyzer } from "./provider-resolver"
export type { VisionAnalyzerOptions } from "./provider-resolver"
