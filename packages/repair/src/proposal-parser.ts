import type { FixProposal } from '@mender/core';

/** Used when a response carries no CONFIDENCE marker; below the default gate on purpose */
export const DEFAULT_MISSING_CONFIDENCE = 0.5;

export interface ParseOptions {
  missingConfidenceDefault?: number;
}

export type ParseResult =
  | { ok: true; proposal: FixProposal; confidenceFound: boolean }
  | { ok: false; error: string };

const CODE_BLOCK = /```(?:typescript|ts)?[ \t]*\r?\n([\s\S]*?)```/;
// Ends at a blank line, or at a FIX/CONFIDENCE marker opening a line
const DIAGNOSIS = /(?:DIAGNOSIS|ROOT CAUSE):[ \t]*([\s\S]+?)(?:\r?\n[ \t]*\r?\n|\r?\n[ \t]*(?:FIX|CONFIDENCE):|$)/i;
const CONFIDENCE = /CONFIDENCE:[ \t]*(\d+(?:\.\d+)?)[ \t]*(%)?/i;

function normalizeConfidence(value: number, isPercent: boolean): number {
  const scaled = isPercent || value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

/**
 * Extract a fix proposal from a free-text model response:
 *
 *   DIAGNOSIS: <root cause>
 *   CONFIDENCE: <0.0-1.0, or a percentage>
 *   FIX:
 *   ```typescript
 *   <complete file>
 *   ```
 *
 * The diagnosis and the code block are required.
 */
export function parseProposal(rawText: string, options: ParseOptions = {}): ParseResult {
  const code = CODE_BLOCK.exec(rawText);
  if (!code) {
    return { ok: false, error: 'Could not extract fixed code from response' };
  }
  const fixedContent = code[1].trim();
  if (!fixedContent) {
    return { ok: false, error: 'Proposed fix is empty' };
  }

  // Search for the diagnosis outside the code block so code comments cannot match
  const prose = rawText.slice(0, code.index) + rawText.slice(code.index + code[0].length);
  const diagnosisMatch = DIAGNOSIS.exec(prose);
  const diagnosis = diagnosisMatch?.[1].trim();
  if (!diagnosis) {
    return { ok: false, error: 'Could not extract diagnosis from response' };
  }

  const confidenceMatch = CONFIDENCE.exec(prose);
  const confidence = confidenceMatch
    ? normalizeConfidence(Number(confidenceMatch[1]), confidenceMatch[2] === '%')
    : options.missingConfidenceDefault ?? DEFAULT_MISSING_CONFIDENCE;

  return {
    ok: true,
    confidenceFound: confidenceMatch !== null,
    proposal: { diagnosis, confidence, fixedContent },
  };
}
