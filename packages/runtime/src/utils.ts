/** Strip ANSI escape sequences (CSI, OSC, charset and single-character escapes) and carriage returns */
export function stripAnsi(text: string): string {
  return text
    .replace(/\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g, '')
    .replace(/\x1b\[[0-9;?]*[ -/]*[@-~]/g, '')
    .replace(/\x1b[()][0-9A-Za-z]/g, '')
    .replace(/\x1b[@-Z\\-_]/g, '')
    .replace(/\r/g, '');
}

/** Variables that make a nested CLI believe it runs inside another agent session */
const FILTERED_ENV = new Set(['CLAUDECODE', 'CLAUDE_PARENT_CLI']);

/** Copy of process.env without nesting markers, with `extra` layered on top */
export function buildCleanEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value === undefined || FILTERED_ENV.has(key)) continue;
    env[key] = value;
  }
  return { ...env, ...extra };
}
