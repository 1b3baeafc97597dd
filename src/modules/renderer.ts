import fs from 'fs';
import path from 'path';
import nunjucks from 'nunjucks';
import { FallbackReason } from '../interfaces/fetchResult';
import { RenderContext } from '../interfaces/renderContext';
import { uvLevel } from '../utils/sun';
import { logger } from '../logger';

const TEMPLATE_NAME = 'dashboard.njk';
const OUTPUT_FILE = 'index.html';

const REASON_LABELS: Record<FallbackReason, string> = {
  not_configured: 'not configured',
  timeout: 'timed out',
  network_error: 'network error',
  auth_error: 'authentication failed',
  api_error: 'service error',
  schema_mismatch: 'unexpected response',
  empty_response: 'no data',
  all_sources_failed: 'all sources failed',
  unknown: 'unavailable',
};

export function reasonLabel(reason: FallbackReason): string {
  return REASON_LABELS[reason];
}

export class DashboardRenderer {
  private readonly env: nunjucks.Environment;

  constructor(
    templateDir: string,
    private readonly outputDir: string
  ) {
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templateDir), {
      autoescape: true,
      throwOnUndefined: false,
    });
    this.env.addFilter('reasonLabel', reasonLabel);
    this.env.addFilter('uvLevel', uvLevel);
  }

  render(context: RenderContext): string {
    return this.env.render(TEMPLATE_NAME, { ...context });
  }

  /**
   * Renders and replaces the output page atomically. Returns the page path.
   */
  async write(context: RenderContext): Promise<string> {
    const html = this.render(context);
    const target = path.join(this.outputDir, OUTPUT_FILE);
    const tmpPath = `${target}.${process.pid}.tmp`;

    await fs.promises.mkdir(this.outputDir, { recursive: true });
    await fs.promises.writeFile(tmpPath, html, 'utf8');
    await fs.promises.rename(tmpPath, target);

    logger.info({ target, bytes: Buffer.byteLength(html) }, 'Dashboard written');
    return target;
  }
}
