import { describe, it, expect } from 'vitest';
import { ProposalGenerationError, RegressionRunError, RegressionTimeoutError, errorMessage } from '../errors.js';

describe('errors', () => {
  it('reports the timeout in seconds', () => {
    const error = new RegressionTimeoutError(120_000);
    expect(error.message).toBe('Regression tests timed out after 120s');
    expect(error.name).toBe('RegressionTimeoutError');
    expect(error.timeoutMs).toBe(120_000);
    expect(error).toBeInstanceOf(Error);
  });

  it('keeps runner output and generation cost', () => {
    expect(new RegressionRunError('no results', 'raw output').output).toBe('raw output');
    expect(new ProposalGenerationError('failed', 0.25).costUsd).toBe(0.25);
    expect(new ProposalGenerationError('failed').costUsd).toBe(0);
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain string')).toBe('plain string');
    expect(errorMessage(42)).toBe('42');
  });
});
