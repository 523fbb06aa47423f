import { spawn } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import type { IProposalGenerator, ProposalRequest, ProposalResponse } from '@mender/core';
import { ProposalGenerationError, createLogger, errorMessage } from '@mender/core';
import treeKill from 'tree-kill';
import { buildFixPrompt } from './fix-prompt.js';
import { buildCleanEnv, stripAnsi } from './utils.js';

const log = createLogger('ClaudeProposalGenerator');

export interface ClaudeProposalGeneratorOptions {
  /** Working directory of the CLI */
  cwd: string;
  command?: string;
  model?: string;
  /** No limit when omitted */
  timeoutMs?: number;
  /** Markdown describing the app under test, appended to every prompt */
  appContextPath?: string;
}

export interface ClaudeOutput {
  result: string;
  costUsd: number;
  isError: boolean;
}

/** Read the `--output-format json` result object; the last JSON line wins when the output has several. */
export function parseClaudeOutput(stdout: string): ClaudeOutput | null {
  const candidates = [stdout.trim(), ...stdout.trim().split('\n').reverse()];
  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (typeof parsed !== 'object' || parsed === null || !('result' in parsed)) continue;

    const cost = 'total_cost_usd' in parsed ? parsed.total_cost_usd : undefined;
    const isError = 'is_error' in parsed ? parsed.is_error : undefined;
    return {
      result: typeof parsed.result === 'string' ? parsed.result : '',
      costUsd: typeof cost === 'number' ? cost : 0,
      isError: isError === true,
    };
  }
  return null;
}

/** Proposal source backed by the `claude` CLI in one-shot print mode. */
export class ClaudeProposalGenerator implements IProposalGenerator {
  private readonly command: string;

  constructor(private readonly options: ClaudeProposalGeneratorOptions) {
    this.command = options.command ?? 'claude';
  }

  async propose(request: ProposalRequest): Promise<ProposalResponse> {
    const prompt = buildFixPrompt(request, await this.loadAppContext());
    const args = ['-p', '--output-format', 'json'];
    if (this.options.model) {
      args.push('--model', this.options.model);
    }

    log.info(`Requesting fix for ${request.testPath}: ${this.command} ${args.join(' ')}`);
    const { stdout, stderr, code } = await this.exec(args, prompt);

    const output = parseClaudeOutput(stdout);
    if (code !== 0 || !output || output.isError) {
      const detail = output?.result || stripAnsi(stderr).trim() || `exit code ${code}`;
      throw new ProposalGenerationError(`Claude CLI failed: ${detail.slice(0, 500)}`, output?.costUsd ?? 0);
    }
    if (!output.result.trim()) {
      throw new ProposalGenerationError('Claude CLI returned an empty response', output.costUsd);
    }

    log.info(`Received ${output.result.length} chars ($${output.costUsd.toFixed(4)})`);
    return { rawText: output.result, costUsd: output.costUsd };
  }

  private async loadAppContext(): Promise<string | undefined> {
    if (!this.options.appContextPath) return undefined;
    try {
      return await readFile(this.options.appContextPath, 'utf-8');
    } catch (error) {
      log.warn(`Could not load app context ${this.options.appContextPath}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private exec(args: string[], input: string): Promise<{ stdout: string; stderr: string; code: number | null }> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.command, args, {
        cwd: this.options.cwd,
        env: buildCleanEnv({ CLAUDE_CODE_DISABLE_NONESSENTIAL_TRAFFIC: '1' }),
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      // Prompt goes through stdin to avoid argument length and quoting limits
      child.stdin.write(input);
      child.stdin.end();

      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = this.options.timeoutMs
        ? setTimeout(() => {
            if (settled) return;
            settled = true;
            if (child.pid) {
              treeKill(child.pid, 'SIGTERM', (err) => {
                if (err) log.warn(`tree-kill failed for PID ${child.pid}: ${err.message}`);
              });
            }
            reject(new ProposalGenerationError(`Claude CLI timed out after ${this.options.timeoutMs}ms`));
          }, this.options.timeoutMs)
        : undefined;

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', (err) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(new ProposalGenerationError(`Failed to start ${this.command}: ${err.message}`));
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        resolve({ stdout, stderr, code });
      });
    });
  }
}
