import { describe, it, expect } from 'vitest';
import { buildConfig } from './index.js';

describe('buildConfig', () => {
  it('applies defaults when nothing is configured', () => {
    expect(buildConfig({}, {})).toMatchObject({
      cliPath: undefined,
      python: 'python3',
      defaultBitDepth: '24',
      concurrency: undefined,
      timeoutMs: 0,
    });
  });

  it('lets the environment override the config file', () => {
    const config = buildConfig(
      {
        REFMASTER_CLI_PATH: '/env/mg_cli.py',
        REFMASTER_DEFAULT_BIT_DEPTH: '16',
        REFMASTER_CONCURRENCY: '3',
      },
      { cliPath: '/file/mg_cli.py', python: 'python3.12', defaultBitDepth: '32', timeoutMs: 60000 }
    );

    expect(config).toMatchObject({
      cliPath: '/env/mg_cli.py',
      python: 'python3.12',
      defaultBitDepth: '16',
      concurrency: 3,
      timeoutMs: 60000,
    });
  });

  it('rejects an unsupported default bit depth', () => {
    expect(() => buildConfig({ REFMASTER_DEFAULT_BIT_DEPTH: '20' }, {})).toThrow();
  });
});
