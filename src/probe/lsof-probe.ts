/**
 * lsof Hardware Probe
 *
 * A device is "in use" when some process holds its device file open:
 *   audio  /dev/snd/pcmC*   (ALSA PCM devices)
 *   video  /dev/video*      (V4L2 capture devices)
 *
 * `lsof -t <files>` prints one owner PID per line. It exits non-zero both
 * when nothing holds the files and when it hits harmless warnings, so the
 * exit code alone means nothing; stderr lines are checked against known
 * warnings instead.
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from 'pino';
import { ProbeError } from '../errors';
import { getLogger } from '../logger';
import { HardwareProbe, HardwareState } from './hardware-probe';

export interface DeviceFilePattern {
  dir: string;
  prefix: string;
}

export interface ExecOutput {
  code: number;
  stdout: string;
  stderr: string;
}

export type ExecFn = (command: string, args: string[]) => Promise<ExecOutput>;

export interface LsofProbeOptions {
  lsofPath?: string;
  audio?: DeviceFilePattern;
  video?: DeviceFilePattern;
  exec?: ExecFn;
  listDir?: (dir: string) => string[];
}

export const DEFAULT_AUDIO_PATTERN: DeviceFilePattern = { dir: '/dev/snd', prefix: 'pcmC' };
export const DEFAULT_VIDEO_PATTERN: DeviceFilePattern = { dir: '/dev', prefix: 'video' };

const LSOF_KNOWN_WARNINGS = /(?:Output information may be incomplete\.|WARNING: can't stat\(\) .* file system)/;

export class LsofProbe implements HardwareProbe {
  private lsofPath: string;
  private audio: DeviceFilePattern;
  private video: DeviceFilePattern;
  private exec: ExecFn;
  private listDir: (dir: string) => string[];
  private log: Logger;

  constructor(options: LsofProbeOptions = {}) {
    this.lsofPath = options.lsofPath ?? '/usr/bin/lsof';
    this.audio = options.audio ?? DEFAULT_AUDIO_PATTERN;
    this.video = options.video ?? DEFAULT_VIDEO_PATTERN;
    this.exec = options.exec ?? execCommand;
    this.listDir = options.listDir ?? listDirSafe;
    this.log = getLogger('LsofProbe');
  }

  async read(): Promise<HardwareState> {
    const [audioOwners, videoOwners] = await Promise.all([
      this.owners(this.audio),
      this.owners(this.video),
    ]);
    return {
      audio: audioOwners.length > 0,
      video: videoOwners.length > 0,
    };
  }

  /** PIDs holding any device file that matches the pattern */
  async owners(pattern: DeviceFilePattern): Promise<string[]> {
    const files = this.listDir(pattern.dir)
      .filter((name) => name.startsWith(pattern.prefix))
      .map((name) => path.join(pattern.dir, name));

    // lsof with no file arguments would list every open file on the system
    if (files.length === 0) {
      return [];
    }

    const result = await this.exec(this.lsofPath, ['-t', ...files]);
    if (result.code !== 0) {
      for (const line of result.stderr.split('\n')) {
        if (line.trim().length === 0) continue;
        if (!LSOF_KNOWN_WARNINGS.test(line)) {
          this.log.error({ line }, 'Unexpected lsof output');
          throw new ProbeError(
            `Unexpected error from lsof: '${line}', stdout '${result.stdout}', stderr '${result.stderr}'`,
          );
        }
      }
    }

    const stdout = result.stdout.trimEnd();
    return stdout.length > 0 ? stdout.split('\n') : [];
  }
}

function listDirSafe(dir: string): string[] {
  try {
    return fs.readdirSync(dir);
  } catch {
    // No such device directory: no devices of that kind
    return [];
  }
}

function execCommand(command: string, args: string[]): Promise<ExecOutput> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf-8' }, (err, stdout, stderr) => {
      if (err && typeof err.code !== 'number') {
        // Spawn failure (e.g. lsof not installed), not a non-zero exit
        reject(new ProbeError(`Failed to run ${command}: ${err.message}`));
        return;
      }
      resolve({ code: err && typeof err.code === 'number' ? err.code : 0, stdout, stderr });
    });
  });
}
