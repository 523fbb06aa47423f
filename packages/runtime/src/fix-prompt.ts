import type { ProposalRequest } from '@mender/core';

const FENCE = '```';

/**
 * Prompt for a minimal test repair. The response format here is the one
 * `parseProposal` reads: DIAGNOSIS, CONFIDENCE, then FIX with a fenced file.
 */
export function buildFixPrompt(request: ProposalRequest, appContext?: string): string {
  const sections = [
    'You are a test repair specialist. Apply a MINIMAL fix to a failing Playwright test.',
    '',
    'Rules:',
    '- Do not break tests that currently pass',
    '- Change as little as possible (1-3 lines when you can)',
    '- Prefer selector updates over logic changes',
    '- Keep the existing structure and style of the test',
    '',
    `TEST FILE: ${request.testPath}`,
    'ERROR MESSAGE:',
    request.errorMessage,
    '',
    'CURRENT TEST CODE:',
    `${FENCE}typescript`,
    request.testContent,
    FENCE,
    '',
  ];

  if (appContext?.trim()) {
    sections.push('APPLICATION CONTEXT (use these selectors):', appContext.trim(), '');
  }

  sections.push(
    'CONTEXT:',
    JSON.stringify(request.context, null, 2),
    '',
    'COMMON FIX PATTERNS:',
    '1. Selector not found: update the data-testid or wait for the element',
    '2. Timeout: raise the timeout or add an intermediate wait',
    '3. Assertion failure: check expected against actual values',
    '',
    'Respond in exactly this format:',
    '',
    'DIAGNOSIS: <one-line root cause>',
    '',
    'CONFIDENCE: <0.0-1.0>',
    '(0.0-0.5 uncertain, 0.5-0.7 moderate, 0.7-0.9 confident, 0.9-1.0 very confident)',
    '',
    'FIX:',
    `${FENCE}typescript`,
    '<the COMPLETE fixed test file>',
    FENCE,
    '',
    'Do not add or remove tests. Rate confidence low when the root cause is unclear.',
  );

  return sections.join('\n');
}
