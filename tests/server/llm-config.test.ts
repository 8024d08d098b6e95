// Copyright (c) 2025 Benjamin F. Hall. All rights reserved.

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getDefaultProvider, getDeployEnv, getEnabledProviders, getProviderEnvConfig } from '@/src/server/llmConfig';

const originalEnv = { ...process.env };

describe('llmConfig', () => {
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.DEPLOY_ENV;
    delete process.env.LLM_DEFAULT_PROVIDER;
    delete process.env.LLM_ENABLE_OPENAI;
    delete process.env.LLM_ENABLE_GEMINI;
    delete process.env.LLM_ALLOWED_MODELS_OPENAI;
    delete process.env.LLM_ALLOWED_MODELS_GEMINI;
    delete process.env.OPENAI_MODEL;
    delete process.env.GEMINI_MODEL;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('defaults to gemini+openai enabled with mock in dev', () => {
    expect(getDeployEnv()).toBe('dev');
    expect(getEnabledProviders()).toEqual(['gemini', 'openai', 'mock']);
    expect(getDefaultProvider()).toBe('gemini');
  });

  it('respects provider enable toggles', () => {
    process.env.LLM_ENABLE_OPENAI = 'false';
    process.env.LLM_ENABLE_GEMINI = '0';
    expect(getEnabledProviders()).toEqual(['mock']);
    expect(getDefaultProvider()).toBe('mock');
  });

  it('removes mock provider in prod', () => {
    process.env.DEPLOY_ENV = 'production';
    expect(getDeployEnv()).toBe('prod');
    expect(getEnabledProviders()).toEqual(['gemini', 'openai']);
  });

  it('fails when nothing is enabled', () => {
    process.env.DEPLOY_ENV = 'prod';
    process.env.LLM_ENABLE_OPENAI = 'off';
    process.env.LLM_ENABLE_GEMINI = 'no';
    expect(() => getDefaultProvider()).toThrow('No LLM provider is enabled.');
  });

  it('uses LLM_DEFAULT_PROVIDER when it is enabled', () => {
    process.env.LLM_DEFAULT_PROVIDER = ' OpenAI ';
    expect(getDefaultProvider()).toBe('openai');
  });

  it('validates OPENAI_MODEL against allowlist when provided', () => {
    process.env.OPENAI_MODEL = 'gpt-4o';
    process.env.LLM_ALLOWED_MODELS_OPENAI = 'gpt-4o-mini';
    expect(() => getProviderEnvConfig('openai')).toThrow(/OPENAI_MODEL must be one of/i);
  });

  it('uses first allowed model when model env is unset', () => {
    process.env.LLM_ALLOWED_MODELS_GEMINI = 'gemini-2.5-pro, gemini-2.5-flash';
    expect(getProviderEnvConfig('gemini')).toMatchObject({ defaultModel: 'gemini-2.5-pro' });
  });

  it('reads trimmed API keys', () => {
    process.env.GEMINI_API_KEY = '  test-key  ';
    expect(getProviderEnvConfig('gemini').apiKey).toBe('test-key');
    expect(getProviderEnvConfig('openai').apiKey).toBeNull();
  });
});
