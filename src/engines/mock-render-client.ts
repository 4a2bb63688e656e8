/**
 * Mock Render Client
 * Returns stub locators and records every request
 */

import type { GlobalStyle, Shot } from '../types/production';
import type { RenderClient } from './render-client';

export interface MockRenderClientOptions {
  /** Shot ids whose render always throws */
  failingShots?: Iterable<string>;
  /** Errors thrown by the first calls, one per call */
  failures?: unknown[];
}

export class MockRenderClient implements RenderClient {
  readonly name = 'mock';
  private readonly failingShots: Set<string>;
  private readonly pendingFailures: unknown[];

  /** Shot ids in the order they were requested */
  readonly requests: string[] = [];

  constructor(options: MockRenderClientOptions = {}) {
    this.failingShots = new Set(options.failingShots ?? []);
    this.pendingFailures = [...(options.failures ?? [])];
  }

  async renderShot(shot: Shot, _style: GlobalStyle): Promise<string> {
    this.requests.push(shot.id);

    if (this.pendingFailures.length > 0) {
      throw this.pendingFailures.shift();
    }
    if (this.failingShots.has(shot.id)) {
      throw new Error(`Render failed for shot ${shot.id}`);
    }

    return `mock://render/${shot.id}.mp4`;
  }
}
