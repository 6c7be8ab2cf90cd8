/**
 * Single-lane forecast pipeline.
 *
 * Any number of callers may ask for forecasts concurrently; the provider sees
 * at most one call in flight from this process. Each request travels in an
 * envelope holding the caller's own resolve/reject pair, so a reply can only
 * ever settle the promise of the caller that queued it.
 */
import type { AppLogger } from '@/services/logger';
import { CancelledError, PipelineBusyError, PipelineClosedError } from '@/utils/errors';
import type { Forecast, ForecastFetcher } from './types';

interface ForecastEnvelope {
  city: string;
  /** Aborts the provider call once this envelope is in flight. */
  controller: AbortController;
  resolve: (forecast: Forecast) => void;
  reject: (err: unknown) => void;
  detach: () => void;
}

export interface ForecastPipelineOptions {
  fetcher: ForecastFetcher;
  logger: AppLogger;
  /** Process-wide shutdown signal; the pipeline closes when it fires. */
  signal?: AbortSignal;
  /** Envelopes allowed to wait behind the one in flight. */
  maxQueueSize?: number;
}

export class ForecastPipeline {
  private readonly fetcher: ForecastFetcher;
  private readonly logger: AppLogger;
  private readonly maxQueueSize: number;
  private readonly queue: ForecastEnvelope[] = [];
  private inFlight: ForecastEnvelope | null = null;
  private draining = false;
  private closed = false;

  constructor(options: ForecastPipelineOptions) {
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.maxQueueSize = options.maxQueueSize ?? 100;

    const { signal } = options;
    if (signal?.aborted) {
      this.closed = true;
    } else {
      signal?.addEventListener('abort', () => this.close(), { once: true });
    }
  }

  /** Waiting plus in-flight requests. */
  get pending(): number {
    return this.queue.length + (this.inFlight ? 1 : 0);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queues a forecast request and waits for its own reply.
   * @param signal cancels this request only; the pipeline keeps serving others
   */
  forecast(city: string, signal?: AbortSignal): Promise<Forecast> {
    if (this.closed) {
      return Promise.reject(new PipelineClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(`forecast for ${city} cancelled`));
    }
    if (this.queue.length >= this.maxQueueSize) {
      this.logger.warn('pipeline:queue_full', { city, waiting: this.queue.length });
      return Promise.reject(new PipelineBusyError(this.maxQueueSize));
    }

    return new Promise<Forecast>((resolve, reject) => {
      const controller = new AbortController();
      const onAbort = () => this.cancel(envelope);
      const envelope: ForecastEnvelope = {
        city,
        controller,
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.queue.push(envelope);
      this.logger.debug('pipeline:queued', { city, waiting: this.queue.length });

      this.drain().catch((err: unknown) => {
        this.logger.error('pipeline:drain_failed', { error: err instanceof Error ? err.message : String(err) });
      });
    });
  }

  /** Rejects every waiting request and aborts the one in flight. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const waiting = this.queue.splice(0, this.queue.length);
    for (const envelope of waiting) {
      envelope.detach();
      envelope.reject(new PipelineClosedError());
    }
    if (this.inFlight) {
      this.inFlight.controller.abort();
      this.inFlight.reject(new PipelineClosedError());
    }

    this.logger.info('pipeline:closed', { rejected: waiting.length });
  }

  private cancel(envelope: ForecastEnvelope): void {
    const index = this.queue.indexOf(envelope);
    if (index >= 0) {
      // Never reached the provider.
      this.queue.splice(index, 1);
      envelope.detach();
      envelope.reject(new CancelledError(`forecast for ${envelope.city} cancelled`));
      this.logger.debug('pipeline:dequeued', { city: envelope.city });
      return;
    }
    if (this.inFlight === envelope) {
      // The worker still waits for the aborted call to settle before moving on.
      envelope.controller.abort();
      envelope.reject(new CancelledError(`forecast for ${envelope.city} cancelled`));
    }
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;

    try {
      let envelope = this.queue.shift();
      while (envelope) {
        this.inFlight = envelope;
        try {
          // An aborted envelope was already rejected; settling it again is a no-op.
          envelope.resolve(await this.fetcher.fetch(envelope.city, envelope.controller.signal));
        } catch (err) {
          envelope.reject(err);
        } finally {
          envelope.detach();
          this.inFlight = null;
        }
        envelope = this.closed ? undefined : this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
