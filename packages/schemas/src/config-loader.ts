import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@newscheck/shared/src/utils/errors.js';
import { validateVerifierConfig } from './validators.js';
import type { VerifierConfig } from './verifier-config.schema.js';

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
}

interface EnvOverride {
  readonly variable: string;
  readonly section: 'llm' | 'search' | 'pipeline';
  readonly key: string;
  readonly kind: 'string' | 'number';
}

const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'GEMINI_API_KEY', section: 'llm', key: 'apiKey', kind: 'string' },
  { variable: 'NEWSCHECK_LLM_MODEL', section: 'llm', key: 'model', kind: 'string' },
  { variable: 'TAVILY_API_KEY', section: 'search', key: 'apiKey', kind: 'string' },
  { variable: 'NEWSCHECK_SEARCH_MAX_RESULTS', section: 'search', key: 'maxResults', kind: 'number' },
  { variable: 'NEWSCHECK_REQUEST_TIMEOUT_MS', section: 'pipeline', key: 'requestTimeoutMs', kind: 'number' },
  { variable: 'NEWSCHECK_MAX_ASSUMPTIONS', section: 'pipeline', key: 'maxAssumptions', kind: 'number' },
  { variable: 'NEWSCHECK_MAX_RETRIES', section: 'pipeline', key: 'maxRetries', kind: 'number' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

// A section the file got wrong is passed through untouched so schema validation reports it.
function mergeSection(base: unknown, overrides: Record<string, unknown>): unknown {
  if (Object.keys(overrides).length === 0) {
    return base;
  }
  if (base === undefined) {
    return overrides;
  }
  return isRecord(base) ? { ...base, ...overrides } : base;
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const sections: Record<EnvOverride['section'], Record<string, unknown>> = {
    llm: {},
    search: {},
    pipeline: {},
  };

  for (const override of ENV_OVERRIDES) {
    const value = env[override.variable];
    if (value === undefined || value.trim() === '') continue;
    sections[override.section][override.key] =
      override.kind === 'number' ? Number(value) : value.trim();
  }

  const merged: Record<string, unknown> = {
    ...raw,
    llm: mergeSection(raw['llm'], sections.llm),
    search: mergeSection(raw['search'], sections.search),
    pipeline: mergeSection(raw['pipeline'], sections.pipeline),
  };

  if (env['NEWSCHECK_MOCK'] === 'true') {
    merged['mock'] = true;
  }

  return merged;
}

function assertCredentials(config: VerifierConfig): void {
  if (config.mock) return;

  const missing: string[] = [];
  if (!config.llm.apiKey) missing.push('GEMINI_API_KEY');
  if (!config.search.apiKey) missing.push('TAVILY_API_KEY');

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required credentials: ${missing.join(', ')}. Set them in the environment or enable NEWSCHECK_MOCK=true.`,
    );
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<VerifierConfig> {
  const env = options.env ?? process.env;

  const fileRaw = options.configPath ? await readJsonFile(options.configPath) : {};
  if (!isRecord(fileRaw)) {
    throw new ConfigurationError(
      `Configuration file ${options.configPath ?? ''} must contain a JSON object`,
    );
  }

  const config = validateVerifierConfig(applyEnvOverrides(fileRaw, env));
  assertCredentials(config);

  return config;
}
