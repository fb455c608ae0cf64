import { spawn } from 'node:child_process';
import { SamplerError, TimeoutError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { withTimeout } from './timeout.js';

/**
 * Pulls still frames out of a video. Implementations may reject; callers
 * treat any rejection as "no frames".
 */
export interface FrameSampler {
  extractFrames(videoPath: string, count: number): Promise<Buffer[]>;
}

export interface ProcessOutput {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<ProcessOutput>;

const FALLBACK_DURATION_SECONDS = 10;

/**
 * Spawns `command` and collects its output. The child is killed with
 * SIGKILL when `timeoutMs` elapses and the promise rejects with a
 * TimeoutError.
 */
export const runProcess: CommandRunner = (command, args, timeoutMs) => {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

  const completion = new Promise<ProcessOutput>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      chunks.push(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', reject);

    child.on('close', (code) => {
      resolve({ code, stdout: Buffer.concat(chunks), stderr });
    });
  });

  return withTimeout(completion, timeoutMs, `${command}`, () => {
    child.kill('SIGKILL');
  });
};

export interface FfmpegFrameSamplerOptions {
  timeoutMs: number;
  ffmpegPath?: string;
  ffprobePath?: string;
  run?: CommandRunner;
}

export class FfmpegFrameSampler implements FrameSampler {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: FfmpegFrameSamplerOptions) {
    this.ffmpegPath = options.ffmpegPath ?? process.env.FFMPEG_PATH ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? process.env.FFPROBE_PATH ?? 'ffprobe';
    this.timeoutMs = options.timeoutMs;
    this.run = options.run ?? runProcess;
  }

  /**
   * Frames are taken at evenly spaced points strictly inside the video. The
   * whole call shares one `timeoutMs` budget; exhausting it rejects with a
   * SamplerError.
   */
  async extractFrames(videoPath: string, count: number): Promise<Buffer[]> {
    if (count <= 0) {
      return [];
    }

    const deadline = Date.now() + this.timeoutMs;
    const duration = await this.probeDuration(videoPath, deadline);
    const frames: Buffer[] = [];

    for (let i = 0; i < count; i++) {
      const timestamp = (duration * (i + 1)) / (count + 1);
      const args = [
        '-v', 'error',
        '-ss', timestamp.toFixed(3),
        '-i', videoPath,
        '-frames:v', '1',
        '-f', 'image2pipe',
        '-vcodec', 'png',
        'pipe:1',
      ];

      const output = await this.invoke(this.ffmpegPath, args, videoPath, deadline);

      if (output.code === 0 && output.stdout.length > 0) {
        frames.push(output.stdout);
      } else {
        logger.debug(`No frame at ${timestamp.toFixed(3)}s`, { videoPath, stderr: output.stderr.trim() });
      }
    }

    return frames;
  }

  private async probeDuration(videoPath: string, deadline: number): Promise<number> {
    const args = [
      '-v', 'quiet',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      videoPath,
    ];

    const output = await this.invoke(this.ffprobePath, args, videoPath, deadline);
    const duration = parseFloat(output.stdout.toString().trim());

    if (output.code !== 0 || !Number.isFinite(duration) || duration <= 0) {
      return FALLBACK_DURATION_SECONDS;
    }

    return duration;
  }

  private async invoke(
    command: string,
    args: string[],
    videoPath: string,
    deadline: number
  ): Promise<ProcessOutput> {
    const remaining = deadline - Date.now();

    if (remaining <= 0) {
      throw new SamplerError(`Frame extraction timed out after ${this.timeoutMs}ms`, videoPath);
    }

    try {
      return await this.run(command, args, remaining);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new SamplerError(`Frame extraction timed out after ${this.timeoutMs}ms`, videoPath, {
          cause: error,
        });
      }

      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new SamplerError(`${command} is not installed. Install ffmpeg to sample video frames`, videoPath, {
          cause: error,
        });
      }

      throw new SamplerError(`${command} failed: ${errorMessage(error)}`, videoPath, { cause: error });
    }
  }
}
