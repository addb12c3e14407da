import { isCancellation } from './clock';
import { logger } from './logger';

export type UpdateSource = 'tick' | 'position' | 'simulation';

export type BatchConsumer = (sources: ReadonlySet<UpdateSource>) => Promise<void>;

/**
 * Serialises updates from every source into one consumer. Pushes that arrive
 * while a batch is still queued join it, so the consumer runs once for them.
 */
export class UpdatePipeline {
  private chain: Promise<void> = Promise.resolve();
  private queued: Set<UpdateSource> | null = null;
  private queuedRun: Promise<void> = Promise.resolve();

  constructor(
    private readonly consume: BatchConsumer,
    private readonly category = 'pipeline',
  ) {}

  /** Resolves once the batch containing this push has been consumed */
  push(source: UpdateSource): Promise<void> {
    if (this.queued) {
      this.queued.add(source);
      return this.queuedRun;
    }

    const batch = new Set<UpdateSource>([source]);
    this.queued = batch;
    this.queuedRun = this.chain.then(async () => {
      if (this.queued === batch) this.queued = null;
      try {
        await this.consume(batch);
      } catch (err) {
        if (isCancellation(err)) return;
        logger.error(this.category, 'Update failed', err);
      }
    });
    this.chain = this.queuedRun;
    return this.queuedRun;
  }

  /** Resolves when every pushed batch has been consumed */
  idle(): Promise<void> {
    return this.chain;
  }
}
