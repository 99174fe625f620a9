import { describe, it, expect } from 'vitest';
import { ValidationError, type MasteringTool } from '@refmaster/core';
import { MasteringCommandBuilder, createMasteringCommand } from './commandBuilder.js';

const tool: MasteringTool = {
  command: 'python3',
  prefixArgs: ['/tools/mg_cli.py'],
  scriptPath: '/tools/mg_cli.py',
  source: 'bundled',
};

describe('MasteringCommandBuilder', () => {
  it('orders arguments as bit depth, target, reference, output', () => {
    const command = createMasteringCommand(tool, {
      targetPath: 'song.wav',
      referencePath: 'ref.wav',
      outputPath: 'song (Mastered).flac',
      bitDepth: '32',
    });

    expect(command).toEqual({
      command: 'python3',
      args: ['/tools/mg_cli.py', '-b', '32', 'song.wav', 'ref.wav', 'song (Mastered).flac'],
      outputPath: 'song (Mastered).flac',
    });
  });

  it('refuses to build without an output', () => {
    const builder = new MasteringCommandBuilder(tool).setBitDepth('16').setTarget('a.wav').setReference('r.wav');

    expect(() => builder.build()).toThrow(ValidationError);
    expect(() => builder.build()).toThrow('Output file not specified');
  });
});
