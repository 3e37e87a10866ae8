import { mkdir, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { DiscardResult, ImageSourcePort } from '../../ports/ImageSourcePort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { CameraError, ConfigError } from '../../utils/errors.js';

const pad = (value: number): string => String(value).padStart(2, '0');

/** `captured_YYYYMMDD_HHMMSS.jpg` in local time. */
export function captureFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `captured_${day}_${time}.jpg`;
}

/** Still-image source for the Android "IP Webcam" app and anything else serving `/shot.jpg`. */
export class IpWebcamAdapter implements ImageSourcePort {
  private readonly logger = createLogger({ adapter: 'IpWebcamAdapter' });
  private readonly baseUrl: string | undefined;
  private readonly captureDir: string;
  private readonly timeoutMs: number;

  constructor(
    config: Pick<Config, 'cameraUrl' | 'captureDir' | 'captureTimeoutMs'>,
    private readonly now: () => Date = () => new Date()
  ) {
    this.baseUrl = config.cameraUrl?.replace(/\/+$/, '');
    this.captureDir = config.captureDir;
    this.timeoutMs = config.captureTimeoutMs;
    if (!this.baseUrl) {
      this.logger.warn('Camera URL not configured; capture will be unavailable');
    }
  }

  get configured(): boolean {
    return this.baseUrl !== undefined;
  }

  async capture(): Promise<string> {
    if (!this.baseUrl) {
      throw new ConfigError('Camera URL not configured; set CAMERA_URL');
    }

    const url = `${this.baseUrl}/shot.jpg`;
    const logger = this.logger.child({ method: 'capture', url });
    logger.info('Requesting image');

    let response: Response;
    let body: Buffer;
    try {
      response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      logger.error({ error }, 'Camera request failed');
      throw new CameraError(`Could not reach camera at ${url}`, { cause: error });
    }

    if (!response.ok) {
      logger.error({ status: response.status }, 'Camera returned an error status');
      throw new CameraError(`Camera returned HTTP ${response.status}`);
    }

    await mkdir(this.captureDir, { recursive: true });
    const filePath = join(this.captureDir, captureFileName(this.now()));
    await writeFile(filePath, body);

    logger.info({ filePath, bytes: body.length }, 'Image captured');
    return filePath;
  }

  async discard(imagePath: string): Promise<DiscardResult> {
    try {
      await unlink(imagePath);
      this.logger.info({ imagePath }, 'Deleted captured image');
      return 'deleted';
    } catch (error) {
      if (isMissingFile(error)) {
        return 'missing';
      }
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
