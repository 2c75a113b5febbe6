/**
 * Client for the GPU render backend.
 *
 * The backend positions a camera inside a venue's template scene and
 * returns PNG bytes. Failures are classified so the cache knows which ones
 * are worth retrying.
 */

import {
  RenderCancelledError,
  RenderError,
  RenderFatalError,
  RenderTransientError,
} from '../errors.js';
import { lookAtRotation } from '../mapper/camera.js';
import type { CameraPose } from '../mapper/types.js';

export type RenderQuality = 'preview' | 'full';

export interface RenderSettings {
  width: number;
  height: number;
  samples: number;
}

export const RENDER_PRESETS: Readonly<Record<RenderQuality, RenderSettings>> = {
  preview: { width: 960, height: 540, samples: 16 },
  full: { width: 1920, height: 1080, samples: 64 },
};

export const RENDER_QUALITIES: readonly RenderQuality[] = ['preview', 'full'];

export interface RenderRequest {
  venueId: string;
  templateId: string;
  pose: CameraPose;
  quality: RenderQuality;
}

export interface RenderClient {
  render(request: RenderRequest, signal?: AbortSignal): Promise<Uint8Array>;
}

/** JSON body sent to the backend's /render endpoint. */
export interface RenderPayload {
  venueId: string;
  templateId: string;
  camera: {
    location: [number, number, number];
    rotationEuler: [number, number, number];
    fov: number;
  };
  width: number;
  height: number;
  samples: number;
}

export function buildRenderPayload(request: RenderRequest): RenderPayload {
  const { pose } = request;
  const rotation = lookAtRotation(pose.position, pose.target);
  const settings = RENDER_PRESETS[request.quality];
  return {
    venueId: request.venueId,
    templateId: request.templateId,
    camera: {
      location: [pose.position.x, pose.position.y, pose.position.z],
      rotationEuler: [rotation.x, rotation.y, rotation.z],
      fov: pose.fov,
    },
    ...settings,
  };
}

/** Status codes that may succeed on a later attempt. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export interface HttpRenderClientOptions {
  /** Backend root, e.g. http://localhost:8000. */
  baseUrl: string;
  headers?: Record<string, string>;
  fetchFn?: typeof fetch;
}

export class HttpRenderClient implements RenderClient {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpRenderClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/render`;
    this.headers = { 'Content-Type': 'application/json', Accept: 'image/png', ...options.headers };
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async render(request: RenderRequest, signal?: AbortSignal): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(buildRenderPayload(request)),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        // The cache aborts with a RenderTimeoutError as the reason.
        if (signal.reason instanceof RenderError) throw signal.reason;
        throw new RenderCancelledError();
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new RenderTransientError(`Render backend unreachable: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      const message = `Render backend responded ${response.status}${detail ? `: ${detail}` : ''}`;
      if (isTransientStatus(response.status)) throw new RenderTransientError(message);
      throw new RenderFatalError(message);
    }

    const image = new Uint8Array(await response.arrayBuffer());
    if (image.byteLength === 0) {
      throw new RenderTransientError('Render backend returned an empty image');
    }
    return image;
  }
}
