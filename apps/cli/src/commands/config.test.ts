import { describe, it, expect } from 'vitest';
import { parseAssignment } from './config.js';

describe('parseAssignment', () => {
  it('parses string and numeric keys', () => {
    expect(parseAssignment('cliPath=/opt/tools/mg_cli.py')).toEqual({ cliPath: '/opt/tools/mg_cli.py' });
    expect(parseAssignment('concurrency=2')).toEqual({ concurrency: 2 });
  });

  it('rejects unknown keys', () => {
    expect(() => parseAssignment('apiUrl=x')).toThrow('Unknown config key: apiUrl');
  });

  it('rejects invalid values', () => {
    expect(() => parseAssignment('defaultBitDepth=20')).toThrow(/^Invalid value for defaultBitDepth/);
    expect(() => parseAssignment('timeoutMs=soon')).toThrow(/^Invalid value for timeoutMs/);
  });

  it('requires key=value', () => {
    expect(() => parseAssignment('python')).toThrow('Usage: refmaster config --set <key=value>');
  });
});
