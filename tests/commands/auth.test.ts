import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

// Mock ofetch（保留真正的 FetchError）
vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: Object.assign(vi.fn(), { raw: vi.fn() }) };
});

import { ofetch, FetchError } from 'ofetch';
import { runCLI, createConfigDir, SAMPLE_CONFIG } from '../helpers/cli-runner.js';

describe('Auth Command', () => {
  let configDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    configDir = createConfigDir(SAMPLE_CONFIG);
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  it('should print the masked token and state', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce({ data: { token: { access_token: 'abcd1234efgh' } } });

    const result = await runCLI(['--config-dir', configDir, 'auth', 'token']);

    expect(result.exitCode).toBe(0);
    expect(result.json).toEqual({ state: 'VALID', accessToken: 'abcd****efgh' });
    expect(ofetch).toHaveBeenCalledWith('https://api.example.com/api/auth/login', expect.objectContaining({ method: 'POST' }));
  });

  it('should print the full token with --reveal', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce({ data: { token: { access_token: 'abcd1234efgh' } } });

    const result = await runCLI(['--config-dir', configDir, 'auth', 'token', '--reveal']);

    expect(result.json).toEqual({ state: 'VALID', accessToken: 'abcd1234efgh' });
  });

  it('should exit 2 when login fails', async () => {
    vi.mocked(ofetch).mockRejectedValueOnce(Object.assign(new FetchError('Unauthorized'), { statusCode: 401 }));

    const result = await runCLI(['--config-dir', configDir, 'auth', 'token']);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toContain('login failed with status 401');
  });

  it('should exit 3 when credentials are not configured', async () => {
    fs.writeFileSync(path.join(configDir, 'demo/common.ini'), '[default]\nuser = qa\n', 'utf-8');

    const result = await runCLI(['--config-dir', configDir, 'auth', 'token']);

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toContain('Missing required auth config keys: password');
    expect(ofetch).not.toHaveBeenCalled();
  });
});
