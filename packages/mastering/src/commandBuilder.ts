/**
 * Mastering Command Builder
 *
 * Fluent API for the external tool's invocation:
 *   <tool> -b <bit_depth> <target> <reference> <output>
 */

import { ValidationError, type BitDepth, type MasteringTool } from '@refmaster/core';

export interface MasteringCommand {
  command: string;
  args: string[];
  outputPath: string;
}

export class MasteringCommandBuilder {
  private bitDepth: BitDepth | null = null;
  private targetPath = '';
  private referencePath = '';
  private outputPath = '';

  constructor(private readonly tool: MasteringTool) {}

  setBitDepth(bitDepth: BitDepth): this {
    this.bitDepth = bitDepth;
    return this;
  }

  setTarget(path: string): this {
    this.targetPath = path;
    return this;
  }

  setReference(path: string): this {
    this.referencePath = path;
    return this;
  }

  setOutput(path: string): this {
    this.outputPath = path;
    return this;
  }

  /**
   * Build the argument vector (NOT including the executable)
   */
  build(): string[] {
    if (!this.bitDepth) {
      throw new ValidationError('Invalid Bit-depth', 'Bit-depth not specified', 'bitDepth');
    }
    if (!this.targetPath) {
      throw new ValidationError('Missing Info', 'Target file not specified', 'target');
    }
    if (!this.referencePath) {
      throw new ValidationError('Missing Info', 'Reference file not specified', 'reference');
    }
    if (!this.outputPath) {
      throw new ValidationError('Missing Info', 'Output file not specified', 'output');
    }

    return [
      ...this.tool.prefixArgs,
      '-b',
      this.bitDepth,
      this.targetPath,
      this.referencePath,
      this.outputPath,
    ];
  }

  toCommand(): MasteringCommand {
    return {
      command: this.tool.command,
      args: this.build(),
      outputPath: this.outputPath,
    };
  }
}

/**
 * Command for one target file
 */
export function createMasteringCommand(
  tool: MasteringTool,
  params: { targetPath: string; referencePath: string; outputPath: string; bitDepth: BitDepth }
): MasteringCommand {
  return new MasteringCommandBuilder(tool)
    .setBitDepth(params.bitDepth)
    .setTarget(params.targetPath)
    .setReference(params.referencePath)
    .setOutput(params.outputPath)
    .toCommand();
}
