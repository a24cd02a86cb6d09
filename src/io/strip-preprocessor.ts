/**
 * Strip Preprocessor
 *
 * Drives ImageMagick to turn a camera still into a brightness dump:
 * crop the measurement strip, convert to gray, edge-detect, and
 * liquid-rescale the strip down to a single column.
 *
 * @module io/strip-preprocessor
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { PreprocessConfig } from '../types';
import { DEFAULT_PREPROCESS_CONFIG } from '../config/defaults';
import { PreprocessingError } from '../gauge/errors';
import { createSilentLogger, type Logger } from '../utils/logger';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external command; rejects when it cannot start or exits non-zero
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

export const execCommand: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, args);
  return { stdout, stderr };
};

export interface StripPreprocessorOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

export class StripPreprocessor {
  private readonly config: PreprocessConfig;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(config: Partial<PreprocessConfig> = {}, options: StripPreprocessorOptions = {}) {
    this.config = { ...DEFAULT_PREPROCESS_CONFIG, ...config };
    this.runner = options.runner ?? execCommand;
    this.logger = options.logger ?? createSilentLogger('preprocessor');
  }

  /**
   * ImageMagick geometry of the strip, e.g. `60x480+236+0`
   */
  cropGeometry(): string {
    const { stripWidth, imageHeight, stripOffset } = this.config;
    return `${stripWidth}x${imageHeight}+${stripOffset}+0`;
  }

  dumpArgs(imagePath: string, dumpPath: string): string[] {
    return [
      '-crop',
      this.cropGeometry(),
      '-colorspace',
      'Gray',
      '-edge',
      String(this.config.edge),
      '-liquid-rescale',
      '1x100%',
      imagePath,
      dumpPath,
    ];
  }

  /**
   * Write the brightness dump for `imagePath` to `dumpPath` (a `.txt` path)
   */
  async createDump(imagePath: string, dumpPath: string): Promise<void> {
    this.logger.debug('Writing brightness dump', { imagePath, dumpPath });
    await this.run(this.dumpArgs(imagePath, dumpPath));
  }

  /**
   * Re-encode an image as PNG
   */
  async convertToPng(imagePath: string, pngPath: string): Promise<void> {
    await this.run([imagePath, pngPath]);
  }

  private async run(args: string[]): Promise<void> {
    const command = this.config.convertCommand;
    let output: CommandOutput;
    try {
      output = await this.runner(command, args);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PreprocessingError(`${command} failed: ${reason}`, { command, args });
    }

    // convert reports some failures on stderr with exit status 0
    if (output.stderr.trim() !== '') {
      throw new PreprocessingError(`${command} reported: ${output.stderr.trim()}`, { command, args });
    }
  }
}
