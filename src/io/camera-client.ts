/**
 * Camera Client
 *
 * Fetches a still from a network camera exposing the common
 * `snapshot.cgi` endpoint.
 *
 * @module io/camera-client
 */

import type { CameraConfig } from '../types';
import { AcquisitionError } from '../gauge/errors';
import { createSilentLogger, type Logger } from '../utils/logger';

export interface CameraClientOptions {
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;

  /** Clock used for the cache-busting parameter and capture time */
  now?: () => Date;

  logger?: Logger;
}

export interface Snapshot {
  image: Buffer;
  capturedAt: Date;
  contentType: string | null;
}

export class CameraClient {
  private readonly camera: CameraConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(camera: CameraConfig, options: CameraClientOptions = {}) {
    this.camera = camera;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createSilentLogger('camera');
  }

  /**
   * Snapshot URL. The trailing unix time keeps caches out of the way.
   */
  snapshotUrl(at: Date = this.now()): string {
    const { host, username, password } = this.camera;
    const seconds = Math.floor(at.getTime() / 1000);
    return (
      `http://${host}/snapshot.cgi` +
      `?user=${encodeURIComponent(username)}` +
      `&pwd=${encodeURIComponent(password)}` +
      `&${seconds}`
    );
  }

  async fetchSnapshot(): Promise<Snapshot> {
    const url = this.snapshotUrl();
    this.logger.debug('Requesting snapshot', { host: this.camera.host });

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new AcquisitionError(`Camera ${this.camera.host} unreachable: ${reason}`, {
        host: this.camera.host,
      });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new AcquisitionError(`Camera error ${response.status}: ${body}`, {
        host: this.camera.host,
        status: response.status,
      });
    }

    const capturedAt = this.now();
    const image = Buffer.from(await response.arrayBuffer());
    if (image.length === 0) {
      throw new AcquisitionError('Camera returned an empty snapshot', { host: this.camera.host });
    }

    this.logger.debug('Snapshot received', { bytes: image.length });
    return { image, capturedAt, contentType: response.headers.get('content-type') };
  }
}
