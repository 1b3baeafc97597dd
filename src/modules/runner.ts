import { AxiosInstance } from 'axios';
import { DashboardConfig } from '../schemas/config.schema';
import { createHttpClient } from './httpClient';
import { createSources, DashboardSources, Orchestrator, SourceOptions } from './orchestrator';
import { DashboardRenderer } from './renderer';
import { logger } from '../logger';

export interface GenerateOptions {
  axiosClient?: AxiosInstance;
  sources?: DashboardSources;
  consent?: SourceOptions['consent'];
  now?: Date;
}

/**
 * One aggregate-and-render pass. Rejects only when the page cannot be
 * rendered or written.
 */
export async function generateOnce(config: DashboardConfig, options: GenerateOptions = {}): Promise<string> {
  const sources =
    options.sources ??
    createSources(config, {
      axiosClient: options.axiosClient ?? createHttpClient(config.httpTimeoutSeconds),
      consent: options.consent,
    });

  const context = await new Orchestrator(config, sources).aggregate(options.now);
  return new DashboardRenderer(config.templateDir, config.outputDir).write(context);
}

/**
 * Re-runs a generation every `intervalSeconds`. A tick that arrives while the
 * previous run is still going is skipped.
 */
export class RefreshScheduler {
  private timer: NodeJS.Timeout | undefined;
  private refreshInProgress = false;

  constructor(
    private readonly intervalSeconds: number,
    private readonly generate: () => Promise<unknown>
  ) {}

  /** Resolves false when the run was skipped. Never rejects. */
  async refresh(trigger: string): Promise<boolean> {
    if (this.refreshInProgress) {
      logger.debug({ trigger }, 'Dashboard refresh already in progress, skipping');
      return false;
    }

    this.refreshInProgress = true;
    try {
      logger.debug(`Dashboard refresh triggered by: ${trigger}`);
      await this.generate();
      return true;
    } catch (err) {
      logger.error({ err, trigger }, 'Dashboard refresh failed');
      return true;
    } finally {
      this.refreshInProgress = false;
    }
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = this.intervalSeconds * 1000;

    void this.refresh('initial');
    this.timer = setInterval(() => {
      void this.refresh('interval');
    }, intervalMs);

    logger.info(
      `Dashboard scheduler started (every ${this.intervalSeconds}s). Next run at ${new Date(
        Date.now() + intervalMs
      ).toLocaleString()}`
    );
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }
}
