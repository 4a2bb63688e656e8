import { describe, it, expect } from 'vitest';
import { MockRenderClient } from './mock-render-client';
import { DEFAULT_CONFIG } from '../types/effective-config';
import { placeholderMotion } from '../core/production-context';
import type { Shot } from '../types/production';

function makeShot(id: string): Shot {
  return {
    id,
    duration: 2,
    subject: 'Hero',
    environment: 'forest',
    camera: { shotType: 'wide', movement: 'static', lens: '35mm', angle: 'eye-level' },
    motion: placeholderMotion(),
  };
}

describe('MockRenderClient', () => {
  it('should return a stub locator per shot and record the request', async () => {
    const client = new MockRenderClient();

    const locator = await client.renderShot(makeShot('shot_7'), DEFAULT_CONFIG.style);

    expect(locator).toBe('mock://render/shot_7.mp4');
    expect(client.requests).toEqual(['shot_7']);
  });

  it('should fail the configured shots', async () => {
    const client = new MockRenderClient({ failingShots: ['bad'] });

    await expect(client.renderShot(makeShot('bad'), DEFAULT_CONFIG.style)).rejects.toThrow(
      'Render failed for shot bad'
    );
  });

  it('should throw scripted failures before succeeding', async () => {
    const client = new MockRenderClient({ failures: [new Error('busy')] });

    await expect(client.renderShot(makeShot('a'), DEFAULT_CONFIG.style)).rejects.toThrow('busy');
    await expect(client.renderShot(makeShot('a'), DEFAULT_CONFIG.style)).resolves.toBe('mock://render/a.mp4');
  });
});
