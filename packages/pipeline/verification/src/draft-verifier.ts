import type { Claim, Evidence, EvidenceSource, VerificationOptions, VerificationResult, VerificationStatus, VerificationSummary } from './types'
import { classifyClaim, determineVerdict, scoreSupport } from './verifier'

function extractClaims(text: string): string[] {
  return text.replace(/\n+/g, ' ').split(/(?<=[.!?;])\s+/).map(s => s.trim()).filter(s => s.length > 10)
}

/** One source per non-empty narrative line, skipping `[SECTION]` labels. */
export function narrativeSources(narrative: string): EvidenceSource[] {
  const sources: EvidenceSource[] = []
  narrative.split('\n').forEach((line, i) => {
    const text = line.trim()
    if (text && !/^\[[A-Z ]+\]$/.test(text)) sources.push({ ref: `narrative:${i + 1}`, text })
  })
  return sources
}

function findEvidence(claim: string, sources: EvidenceSource[], opts: Required<Omit<VerificationOptions, 'factsOnly'>>): { evidence: Evidence[]; bestScore: number } {
  const evidence: Evidence[] = []
  let bestScore = 0
  for (const source of sources) {
    const { score } = scoreSupport(claim, source.text, opts.minTokenOverlap, opts.minNumberCoverage)
    if (score > 0.1) {
      evidence.push({ ref: source.ref, text: source.text, score })
      if (score > bestScore) bestScore = score
    }
  }
  // stable on ref so equal scores keep a deterministic order
  evidence.sort((a, b) => b.score - a.score || (a.ref < b.ref ? -1 : a.ref > b.ref ? 1 : 0))
  return { evidence: evidence.slice(0, 3), bestScore }
}

function calculateSummary(claims: Claim[]): VerificationSummary {
  const facts = claims.filter(c => c.kind === 'fact')
  const supported = facts.filter(c => c.verdict === 'supported').length
  const unsupported = facts.filter(c => c.verdict === 'unsupported').length
  const totalConf = facts.reduce((sum, c) => sum + c.confidence, 0)
  return {
    totalClaims: claims.length,
    supportedClaims: supported,
    unsupportedClaims: unsupported,
    overallConfidence: facts.length > 0 ? Math.round((totalConf / facts.length) * 100) / 100 : 1.0
  }
}

function statusFor(summary: VerificationSummary): VerificationStatus {
  const factTotal = summary.supportedClaims + summary.unsupportedClaims
  if (factTotal === 0) return 'verified'
  const supportRate = summary.supportedClaims / factTotal
  const unsupportRate = summary.unsupportedClaims / factTotal
  if (unsupportRate > 0.3) return 'failed'
  if (supportRate < 0.8 || summary.unsupportedClaims > 0) return 'partial'
  return 'verified'
}

/**
 * Checks each sentence of a draft against the supplied sources by token overlap and number
 * coverage. Only `fact` claims count toward the status; instructions and inferences stay uncertain.
 */
export function verifyDraft(draftText: string, sources: EvidenceSource[], options: VerificationOptions = {}): VerificationResult {
  const startTime = performance.now()
  const { minTokenOverlap = 0.25, minNumberCoverage = 1.0, factsOnly = false } = options

  const claims: Claim[] = []
  extractClaims(draftText).forEach((text, i) => {
    const kind = classifyClaim(text)
    if (factsOnly && kind !== 'fact') return

    const { evidence, bestScore } = findEvidence(text, sources, { minTokenOverlap, minNumberCoverage })
    claims.push({
      id: `claim_${i + 1}`,
      text,
      kind,
      verdict: determineVerdict(bestScore, kind),
      confidence: Math.round(bestScore * 100) / 100,
      evidence
    })
  })

  const summary = calculateSummary(claims)
  return { status: statusFor(summary), summary, claims, processingTimeMs: Math.round(performance.now() - startTime) }
}
