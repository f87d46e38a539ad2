import { z } from 'zod';
import { createLogger } from '@admissions/observability';
import { decodeUpdate } from './updates';
import type { InboundUpdate } from './updates';

const log = createLogger('telegram-poller');

const UpdateIdSchema = z.object({ update_id: z.number() });

export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number): Promise<unknown[]>;
}

export interface UpdateSink {
  route(update: InboundUpdate): Promise<void>;
}

export interface PollerOptions {
  enabled: boolean;
  timeoutSeconds: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface PollerStatus {
  polling: boolean;
  lastError: string | null;
  lastUpdateId: number;
}

/** getUpdates long-polling loop; updates are handled one after another */
export class TelegramPoller {
  private polling = false;
  private lastError: string | null = null;
  private lastUpdateId = 0;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: UpdateSource,
    private readonly sink: UpdateSink,
    private readonly options: PollerOptions,
  ) {
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  status(): PollerStatus {
    return { polling: this.polling, lastError: this.lastError, lastUpdateId: this.lastUpdateId };
  }

  start(): void {
    if (!this.options.enabled) {
      log.info('Telegram polling disabled');
      return;
    }
    if (this.polling) return;
    this.polling = true;
    log.info({ timeoutSeconds: this.options.timeoutSeconds }, 'Telegram polling started');
    void this.loop();
  }

  /** The request in flight finishes on its own; no new one is made */
  stop(): void {
    this.polling = false;
  }

  /** Fetches one batch and routes it; returns how many updates were handled */
  async pollOnce(): Promise<number> {
    const batch = await this.source.getUpdates(this.lastUpdateId + 1, this.options.timeoutSeconds);
    let handled = 0;

    for (const raw of batch) {
      const id = UpdateIdSchema.safeParse(raw);
      if (!id.success || id.data.update_id <= this.lastUpdateId) continue;
      this.lastUpdateId = id.data.update_id;

      const update = decodeUpdate(raw);
      if (!update) {
        log.warn({ updateId: id.data.update_id }, 'Unsupported update skipped');
        continue;
      }
      try {
        await this.sink.route(update);
        handled += 1;
      } catch (error) {
        log.error(
          { updateId: update.updateId, error: error instanceof Error ? error.message : String(error) },
          'Update processing failed',
        );
      }
    }
    return handled;
  }

  private async loop(): Promise<void> {
    while (this.polling) {
      try {
        await this.pollOnce();
        this.lastError = null;
      } catch (error) {
        this.lastError = error instanceof Error ? error.message : String(error);
        log.error({ error: this.lastError }, 'Telegram polling error');
        await this.sleep(this.options.retryDelayMs ?? 2_000);
      }
    }
    log.info('Telegram polling stopped');
  }
}
