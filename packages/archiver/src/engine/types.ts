import { EngineParams, EventSink } from '@streamvault/shared';

/**
 * A download engine archives one stream and reports progress through the
 * attached sink. `run` rejects with a `CancelledError` when `signal` aborts.
 */
export interface DownloadEngine {
  readonly params: EngineParams;
  run(sink: EventSink, signal: AbortSignal): Promise<void>;
}

export type EngineFactory = (params: EngineParams) => DownloadEngine;
