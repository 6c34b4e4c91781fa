// types for draft-vs-evidence verification

export type ClaimKind = 'fact' | 'inference' | 'opinion' | 'instruction' | 'question'
export type Verdict = 'supported' | 'uncertain' | 'unsupported'
export type VerificationStatus = 'verified' | 'partial' | 'failed'

/** Anything a claim can be checked against: a retrieved chunk or a narrative line. */
export interface EvidenceSource {
  ref: string
  text: string
}

export interface Claim {
  id: string
  text: string
  kind: ClaimKind
  verdict: Verdict
  confidence: number
  evidence: Evidence[]
}

export interface Evidence {
  ref: string
  text: string
  score: number
}

export interface VerificationResult {
  status: VerificationStatus
  summary: VerificationSummary
  claims: Claim[]
  processingTimeMs: number
}

export interface VerificationSummary {
  totalClaims: number
  supportedClaims: number
  unsupportedClaims: number
  overallConfidence: number
}

export interface VerificationOptions {
  minTokenOverlap?: number
  minNumberCoverage?: number
  factsOnly?: boolean
}

export interface SupportScore {
  supported: boolean
  score: number
}
