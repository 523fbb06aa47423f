import type { ProposalRequest, ProposalResponse } from '../models/proposal.js';

/**
 * Generative source of candidate fixes. Returns the raw response text;
 * the engine owns parsing. Rejects with ProposalGenerationError.
 */
export interface IProposalGenerator {
  propose(request: ProposalRequest): Promise<ProposalResponse>;
}
