/**
 * HTTP render client for hosted text-to-video providers
 */

import type { GlobalStyle, Shot } from '../types/production';
import { describeShot } from '../core/production-context';
import type { RenderClient } from './render-client';

export type HttpRenderProvider = 'sora' | 'runway' | 'pika';

export interface HttpRenderClientOptions {
  provider: HttpRenderProvider;
  apiKey: string;
  apiBase: string;
  timeoutMs?: number;
}

interface RenderRequest {
  prompt: string;
  style: string;
  duration: number;
  resolution: string;
}

interface ProviderEndpoint {
  path: string;
  body(request: RenderRequest): Record<string, unknown>;
}

const ENDPOINTS: Readonly<Record<HttpRenderProvider, ProviderEndpoint>> = {
  sora: {
    path: '/v1/generate',
    body: (r) => ({ prompt: r.prompt, style: r.style, duration: r.duration, resolution: r.resolution }),
  },
  runway: {
    path: '/videos/generate',
    body: (r) => ({
      text_prompt: r.prompt,
      video_style: r.style,
      length_seconds: r.duration,
      resolution: r.resolution,
    }),
  },
  pika: {
    path: '/render/video',
    body: (r) => ({ prompt: r.prompt, style: r.style, duration: r.duration, resolution: r.resolution }),
  },
};

/**
 * Provider answered with a non-2xx status
 */
export class RenderHttpError extends Error {
  constructor(
    readonly status: number,
    readonly provider: HttpRenderProvider,
    body: string
  ) {
    super(`${provider} render request failed with status ${status}${body ? `: ${body}` : ''}`);
    this.name = 'RenderHttpError';
  }
}

function readVideoUrl(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'video_url' in body && typeof body.video_url === 'string') {
    return body.video_url;
  }
  return undefined;
}

export class HttpRenderClient implements RenderClient {
  readonly name: HttpRenderProvider;
  private readonly options: HttpRenderClientOptions;

  constructor(options: HttpRenderClientOptions) {
    if (!options.apiBase) {
      throw new Error(`An API base URL is required for the ${options.provider} render provider`);
    }
    this.options = options;
    this.name = options.provider;
  }

  async renderShot(shot: Shot, style: GlobalStyle): Promise<string> {
    const endpoint = ENDPOINTS[this.options.provider];
    const url = this.options.apiBase.replace(/\/+$/, '') + endpoint.path;
    const payload = endpoint.body({
      prompt: describeShot(shot),
      style: style.visualStyle,
      duration: shot.duration,
      resolution: style.resolution,
    });

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
      signal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
    });

    if (!response.ok) {
      throw new RenderHttpError(response.status, this.options.provider, await response.text());
    }

    const body: unknown = await response.json();
    const videoUrl = readVideoUrl(body);
    if (videoUrl === undefined) {
      throw new Error(`${this.options.provider} response did not include a video_url`);
    }
    return videoUrl;
  }
}
