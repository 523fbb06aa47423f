export interface FixProposal {
  diagnosis: string;
  /** 0.0 - 1.0 */
  confidence: number;
  /** Complete replacement for the test file */
  fixedContent: string;
}

export interface ProposalContext {
  selectorUsage: string[];
  relatedTests: string[];
}

export interface ProposalRequest {
  testPath: string;
  testContent: string;
  errorMessage: string;
  context: ProposalContext;
}

export interface ProposalResponse {
  rawText: string;
  costUsd: number;
}
