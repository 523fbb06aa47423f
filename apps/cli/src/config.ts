import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { LogLevel } from '@mender/core';
import {
  CONFIDENCE_THRESHOLD,
  DEFAULT_REGRESSION_SUITE,
  DEFAULT_REGRESSION_TIMEOUT_MS,
  MAX_RETRIES,
  createLogger,
  errorMessage,
  isLogLevel,
} from '@mender/core';
import { DEFAULT_MISSING_CONFIDENCE } from '@mender/repair';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'mender.config.json';

export interface EscalationConfig {
  /** When false, escalation-worthy passes abort instead of queueing */
  enabled: boolean;
}

export interface ProposalConfig {
  /** Passed to the claude CLI as --model; CLI default when empty */
  model: string;
  /** 0 = no limit */
  timeoutMs: number;
  /** Markdown about the app under test, appended to prompts; relative to projectDir */
  appContextPath: string;
}

export interface MenderConfig {
  projectDir: string;
  // Relative to projectDir
  testsDir: string;
  artifactsDir: string;
  logsDir: string;
  stateDir: string;
  regressionSuite: string[];
  regressionTimeoutMs: number;
  maxRetries: number;
  confidenceThreshold: number;
  missingConfidenceDefault: number;
  escalation: EscalationConfig;
  proposal: ProposalConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: MenderConfig = {
  projectDir: '.',
  testsDir: 'tests',
  artifactsDir: 'artifacts',
  logsDir: 'logs',
  stateDir: '.mender',
  regressionSuite: [...DEFAULT_REGRESSION_SUITE],
  regressionTimeoutMs: DEFAULT_REGRESSION_TIMEOUT_MS,
  maxRetries: MAX_RETRIES,
  confidenceThreshold: CONFIDENCE_THRESHOLD,
  missingConfidenceDefault: DEFAULT_MISSING_CONFIDENCE,
  escalation: { enabled: true },
  proposal: { model: '', timeoutMs: 0, appContextPath: '' },
  logLevel: 'info',
};

type Source = Record<string, unknown>;

function isRecord(value: unknown): value is Source {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Source, key: string, into: Source): void {
  const value = source[key];
  if (value === undefined) return;
  if (typeof value === 'string') into[key] = value;
  else log.warn(`Ignoring config "${key}": expected a string`);
}

function pickNumber(source: Source, key: string, into: Source): void {
  const value = source[key];
  if (value === undefined) return;
  if (typeof value === 'number' && Number.isFinite(value)) into[key] = value;
  else log.warn(`Ignoring config "${key}": expected a number`);
}

function pickBoolean(source: Source, key: string, into: Source): void {
  const value = source[key];
  if (value === undefined) return;
  if (typeof value === 'boolean') into[key] = value;
  else log.warn(`Ignoring config "${key}": expected a boolean`);
}

function pickStringArray(source: Source, key: string, into: Source): void {
  const value = source[key];
  if (value === undefined) return;
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) into[key] = value;
  else log.warn(`Ignoring config "${key}": expected a list of strings`);
}

/** Flat, validated view of one config layer; unknown or mistyped keys are dropped */
interface ConfigLayer {
  top: Source;
  escalation: Source;
  proposal: Source;
}

function layerFromJson(raw: unknown): ConfigLayer {
  const layer: ConfigLayer = { top: {}, escalation: {}, proposal: {} };
  if (!isRecord(raw)) {
    log.warn('Config file must hold a JSON object, ignoring it');
    return layer;
  }

  for (const key of ['projectDir', 'testsDir', 'artifactsDir', 'logsDir', 'stateDir']) {
    pickString(raw, key, layer.top);
  }
  for (const key of ['regressionTimeoutMs', 'maxRetries', 'confidenceThreshold', 'missingConfidenceDefault']) {
    pickNumber(raw, key, layer.top);
  }
  pickStringArray(raw, 'regressionSuite', layer.top);

  if (raw.logLevel !== undefined) {
    if (typeof raw.logLevel === 'string' && isLogLevel(raw.logLevel)) layer.top.logLevel = raw.logLevel;
    else log.warn('Ignoring config "logLevel": expected debug, info, warn or error');
  }

  if (isRecord(raw.escalation)) {
    pickBoolean(raw.escalation, 'enabled', layer.escalation);
  }
  if (isRecord(raw.proposal)) {
    pickString(raw.proposal, 'model', layer.proposal);
    pickNumber(raw.proposal, 'timeoutMs', layer.proposal);
    pickString(raw.proposal, 'appContextPath', layer.proposal);
  }
  return layer;
}

const ENV_KEYS: Record<string, { section: keyof ConfigLayer; key: string; kind: 'string' | 'number' | 'boolean' | 'list' }> = {
  MENDER_PROJECT_DIR: { section: 'top', key: 'projectDir', kind: 'string' },
  MENDER_TESTS_DIR: { section: 'top', key: 'testsDir', kind: 'string' },
  MENDER_ARTIFACTS_DIR: { section: 'top', key: 'artifactsDir', kind: 'string' },
  MENDER_LOGS_DIR: { section: 'top', key: 'logsDir', kind: 'string' },
  MENDER_STATE_DIR: { section: 'top', key: 'stateDir', kind: 'string' },
  MENDER_REGRESSION_SUITE: { section: 'top', key: 'regressionSuite', kind: 'list' },
  MENDER_REGRESSION_TIMEOUT_MS: { section: 'top', key: 'regressionTimeoutMs', kind: 'number' },
  MENDER_MAX_RETRIES: { section: 'top', key: 'maxRetries', kind: 'number' },
  MENDER_CONFIDENCE_THRESHOLD: { section: 'top', key: 'confidenceThreshold', kind: 'number' },
  MENDER_MISSING_CONFIDENCE_DEFAULT: { section: 'top', key: 'missingConfidenceDefault', kind: 'number' },
  MENDER_LOG_LEVEL: { section: 'top', key: 'logLevel', kind: 'string' },
  MENDER_ESCALATION_ENABLED: { section: 'escalation', key: 'enabled', kind: 'boolean' },
  MENDER_MODEL: { section: 'proposal', key: 'model', kind: 'string' },
  MENDER_PROPOSAL_TIMEOUT_MS: { section: 'proposal', key: 'timeoutMs', kind: 'number' },
  MENDER_APP_CONTEXT_PATH: { section: 'proposal', key: 'appContextPath', kind: 'string' },
};

function layerFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  // Env values are converted into the JSON shape, then validated the same way
  const raw: Source = {};
  const escalation: Source = {};
  const proposal: Source = {};
  const sections: Record<keyof ConfigLayer, Source> = { top: raw, escalation, proposal };

  for (const [name, target] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value === undefined || value === '') continue;
    let converted: unknown = value;
    if (target.kind === 'number') converted = Number(value);
    if (target.kind === 'boolean') converted = value === 'true' ? true : value === 'false' ? false : value;
    if (target.kind === 'list') converted = value.split(',').map((item) => item.trim()).filter(Boolean);
    sections[target.section][target.key] = converted;
  }

  if (Object.keys(escalation).length > 0) raw.escalation = escalation;
  if (Object.keys(proposal).length > 0) raw.proposal = proposal;
  return layerFromJson(raw);
}

function readConfigFile(path: string): ConfigLayer {
  try {
    const layer = layerFromJson(JSON.parse(readFileSync(path, 'utf-8')));
    log.info(`Loaded config from ${path}`);
    return layer;
  } catch (error) {
    log.warn(`Failed to read config ${path}, using defaults: ${errorMessage(error)}`);
    return { top: {}, escalation: {}, proposal: {} };
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration: defaults, then the JSON file (`--config` path, else
 * `./mender.config.json` when present), then `MENDER_*` environment variables.
 * Nested sections are merged key by key. `projectDir` comes back absolute.
 */
export function loadConfig(options: LoadConfigOptions = {}): MenderConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let fileLayer: ConfigLayer = { top: {}, escalation: {}, proposal: {} };
  if (options.configPath) {
    const path = resolve(cwd, options.configPath);
    if (!existsSync(path)) {
      throw new Error(`Config file not found: ${path}`);
    }
    fileLayer = readConfigFile(path);
  } else if (existsSync(resolve(cwd, CONFIG_FILE_NAME))) {
    fileLayer = readConfigFile(resolve(cwd, CONFIG_FILE_NAME));
  } else {
    log.debug('No config file found, using defaults');
  }

  const envLayer = layerFromEnv(env);

  const merged: MenderConfig = {
    ...DEFAULT_CONFIG,
    ...fileLayer.top,
    ...envLayer.top,
    escalation: { ...DEFAULT_CONFIG.escalation, ...fileLayer.escalation, ...envLayer.escalation },
    proposal: { ...DEFAULT_CONFIG.proposal, ...fileLayer.proposal, ...envLayer.proposal },
  };
  merged.projectDir = resolve(cwd, merged.projectDir);

  log.debug(`Config resolved: project=${merged.projectDir}, suite=${merged.regressionSuite.join(',')}`);
  return merged;
}
