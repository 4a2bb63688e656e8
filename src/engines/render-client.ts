/**
 * Render capability
 * Turns one shot into a rendered video and returns where it lives
 */

import type { GlobalStyle, Shot } from '../types/production';

export interface RenderClient {
  readonly name: string;
  /**
   * Render a shot in the run's style
   * @returns Locator of the rendered output (URL or path)
   */
  renderShot(shot: Shot, style: GlobalStyle): Promise<string>;
}
