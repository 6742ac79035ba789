import { execFile } from 'child_process';
import type { Logger } from 'pino';
import { CaptureError } from './errors.js';
import type { CapturedImage, ImageSource } from './vision.types.js';

export type CameraConfig = {
  device: string;
  inputFormat: string;
  width: number;
  height: number;
  fps: number;
  warmupFrames: number;
  captureTimeoutMs: number;
  ffmpegPath: string;
};

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<Buffer>;

const JPEG_SOI = [0xff, 0xd8];
const MAX_FRAME_BYTES = 32 * 1024 * 1024;

export function resolveDevice(device: string, inputFormat: string): string {
  if (inputFormat === 'v4l2' && /^\d+$/.test(device)) {
    return `/dev/video${device}`;
  }
  return device;
}

export function buildFfmpegArgs(camera: CameraConfig): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-f', camera.inputFormat];
  if (camera.width > 0 && camera.height > 0) {
    args.push('-video_size', `${camera.width}x${camera.height}`);
  }
  if (camera.fps > 0) {
    args.push('-framerate', String(camera.fps));
  }
  args.push('-i', resolveDevice(camera.device, camera.inputFormat));
  // skip the first frames so exposure has settled and the buffer is fresh
  if (camera.warmupFrames > 0) {
    args.push('-vf', `select=gte(n\\,${camera.warmupFrames})`);
  }
  args.push('-frames:v', '1', '-f', 'image2pipe', '-vcodec', 'mjpeg', '-');
  return args;
}

export function isJpeg(data: Buffer): boolean {
  return data.length > JPEG_SOI.length && data[0] === JPEG_SOI[0] && data[1] === JPEG_SOI[1];
}

const runExecFile: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'buffer', timeout: timeoutMs, maxBuffer: MAX_FRAME_BYTES },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.toString('utf8').trim();
          reject(new Error(detail ? `${error.message}: ${detail}` : error.message, { cause: error }));
          return;
        }
        resolve(stdout);
      }
    );
  });

/**
 * Grabs one still from a camera by running ffmpeg per capture. Nothing is
 * held open between captures, so another process may use the device meanwhile.
 */
export class FfmpegImageSource implements ImageSource {
  private readonly camera: CameraConfig;
  private readonly run: CommandRunner;
  private readonly log: Logger;

  constructor(camera: CameraConfig, logger: Logger, run: CommandRunner = runExecFile) {
    this.camera = camera;
    this.run = run;
    this.log = logger.child({ component: 'camera', device: camera.device });
  }

  async capture(): Promise<CapturedImage> {
    const args = buildFfmpegArgs(this.camera);
    let data: Buffer;
    try {
      data = await this.run(this.camera.ffmpegPath, args, this.camera.captureTimeoutMs);
    } catch (error) {
      this.log.error({ err: error }, 'Camera capture failed');
      throw new CaptureError('device_unavailable', `Camera ${this.camera.device} unavailable`, { cause: error });
    }
    if (data.length === 0) {
      throw new CaptureError('no_frame', `Camera ${this.camera.device} returned no frame`);
    }
    if (!isJpeg(data)) {
      throw new CaptureError('invalid_frame', `Camera ${this.camera.device} returned data that is not a JPEG frame`);
    }
    this.log.debug({ bytes: data.length }, 'Fresh image captured');
    return { data, mime: 'image/jpeg', capturedAt: Date.now() };
  }
}
