export { PlaywrightRegressionRunner, parsePlaywrightOutput } from './playwright-regression-runner.js';
export type { PlaywrightRunnerOptions } from './playwright-regression-runner.js';
export { ClaudeProposalGenerator, parseClaudeOutput } from './claude-proposal-generator.js';
export type { ClaudeProposalGeneratorOptions, ClaudeOutput } from './claude-proposal-generator.js';
export { buildFixPrompt } from './fix-prompt.js';
export { stripAnsi, buildCleanEnv } from './utils.js';
