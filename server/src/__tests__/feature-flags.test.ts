import { describe, it, expect, vi, afterEach } from 'vitest';

async function loadFlags() {
  vi.resetModules();
  return import('../lib/feature-flags.js');
}

describe('feature flags', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to keyword tagging, template prose and a 30s collaborator timeout', async () => {
    vi.stubEnv('FF_LLM_THEME_TAGGING', '');
    vi.stubEnv('FF_LLM_NARRATIVE', '');
    vi.stubEnv('SYNTHESIS_COLLABORATOR_TIMEOUT_MS', '');
    const flags = await loadFlags();

    expect(flags.FF_LLM_THEME_TAGGING).toBe(false);
    expect(flags.FF_LLM_NARRATIVE).toBe(false);
    expect(flags.SYNTHESIS_COLLABORATOR_TIMEOUT_MS).toBe(30_000);
  });

  it('reads "1" and "true" as enabled', async () => {
    vi.stubEnv('FF_LLM_THEME_TAGGING', '1');
    vi.stubEnv('FF_LLM_NARRATIVE', 'TRUE');
    const flags = await loadFlags();

    expect(flags.FF_LLM_THEME_TAGGING).toBe(true);
    expect(flags.FF_LLM_NARRATIVE).toBe(true);
  });

  it('caps the collaborator timeout at the timer maximum', async () => {
    vi.stubEnv('SYNTHESIS_COLLABORATOR_TIMEOUT_MS', '99999999999');
    const flags = await loadFlags();

    expect(flags.SYNTHESIS_COLLABORATOR_TIMEOUT_MS).toBe(2_147_483_647);
  });
});
