export type {
  Claim,
  ClaimKind,
  Evidence,
  EvidenceSource,
  SupportScore,
  Verdict,
  VerificationOptions,
  VerificationResult,
  VerificationStatus,
  VerificationSummary,
} from './types'
export { narrativeSources, verifyDraft } from './draft-verifier'
export { calculateOverlap, classifyClaim, extractNumbers, numberCoverage, scoreSupport, tokenize } from './verifier'
