// Copyright (c) 2025 Benjamin F. Hall. All rights reserved.

import { isLLMProvider, type LLMProvider } from '@/src/shared/llmProvider';

export interface ProviderEnvConfig {
  enabled: boolean;
  allowedModels: string[] | null;
  defaultModel: string;
  apiKey: string | null;
}

export type DeployEnv = 'dev' | 'prod';

export function getDeployEnv(): DeployEnv {
  const raw = (process.env.DEPLOY_ENV ?? 'dev').trim().toLowerCase();
  if (raw === 'prod' || raw === 'production') return 'prod';
  return 'dev';
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value == null) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (!normalized) return defaultValue;
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return defaultValue;
}

function parseCsvEnv(value: string | undefined): string[] | null {
  const normalized = (value ?? '').trim();
  if (!normalized) return null;
  const items = normalized
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : null;
}

function readSecret(name: string): string | null {
  const value = process.env[name]?.trim();
  return value ? value : null;
}

function resolveModel(envName: string, allowedModels: string[] | null, fallbackModel: string, allowedEnvName: string): string {
  const envModel = (process.env[envName] ?? '').trim();
  const model = envModel || allowedModels?.[0] || fallbackModel;
  if (allowedModels && !allowedModels.includes(model)) {
    throw new Error(`${envName} must be one of ${allowedEnvName} (${allowedModels.join(', ')})`);
  }
  return model;
}

export function getEnabledProviders(): LLMProvider[] {
  const enabled: LLMProvider[] = [];
  if (parseBooleanEnv(process.env.LLM_ENABLE_GEMINI, true)) enabled.push('gemini');
  if (parseBooleanEnv(process.env.LLM_ENABLE_OPENAI, true)) enabled.push('openai');
  if (getDeployEnv() === 'dev') {
    enabled.push('mock');
  }
  return enabled;
}

export function getDefaultProvider(): LLMProvider {
  const enabled = new Set(getEnabledProviders());
  const raw = (process.env.LLM_DEFAULT_PROVIDER ?? '').trim().toLowerCase();
  if (isLLMProvider(raw) && enabled.has(raw)) {
    return raw;
  }

  for (const fallback of ['gemini', 'openai', 'mock'] as const) {
    if (enabled.has(fallback)) return fallback;
  }
  throw new Error('No LLM provider is enabled. Set LLM_ENABLE_GEMINI or LLM_ENABLE_OPENAI.');
}

export function getProviderEnvConfig(provider: LLMProvider): ProviderEnvConfig {
  if (provider === 'gemini') {
    const allowedModels = parseCsvEnv(process.env.LLM_ALLOWED_MODELS_GEMINI);
    return {
      enabled: parseBooleanEnv(process.env.LLM_ENABLE_GEMINI, true),
      allowedModels,
      defaultModel: resolveModel('GEMINI_MODEL', allowedModels, 'gemini-2.5-flash', 'LLM_ALLOWED_MODELS_GEMINI'),
      apiKey: readSecret('GEMINI_API_KEY')
    };
  }

  if (provider === 'openai') {
    const allowedModels = parseCsvEnv(process.env.LLM_ALLOWED_MODELS_OPENAI);
    return {
      enabled: parseBooleanEnv(process.env.LLM_ENABLE_OPENAI, true),
      allowedModels,
      defaultModel: resolveModel('OPENAI_MODEL', allowedModels, 'gpt-4o-mini', 'LLM_ALLOWED_MODELS_OPENAI'),
      apiKey: readSecret('OPENAI_API_KEY')
    };
  }

  return { enabled: getDeployEnv() === 'dev', allowedModels: null, defaultModel: 'mock', apiKey: null };
}
