/**
 * Pipeline Runner
 *
 * Keeps a speech pipeline fed from the audio bridge: when one pass ends,
 * the next starts over the same queue. A pass that fails is logged and
 * retried after a short delay.
 */

import { setImmediate as yieldToEventLoop, setTimeout as sleep } from 'node:timers/promises';

import type { AudioBridge } from '../audio/audio-bridge.js';
import { describeError, isAbortError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  DEVICE_AUDIO_METADATA,
  type PipelineEvent,
  type PipelineEventObserver,
  type SpeechPipeline,
} from './types.js';

export const DEFAULT_PIPELINE_RESTART_DELAY_MS = 1000;

export interface PipelineRunnerOptions {
  restartDelayMs?: number;
  logger?: Logger;
}

export class PipelineRunner {
  private readonly observers = new Set<PipelineEventObserver>();
  private readonly restartDelayMs: number;
  private readonly logger: Logger;
  private controller?: AbortController;
  private running?: Promise<void>;
  private _runs = 0;

  constructor(
    private readonly pipeline: SpeechPipeline,
    private readonly audio: AudioBridge,
    options: PipelineRunnerOptions = {}
  ) {
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_PIPELINE_RESTART_DELAY_MS;
    this.logger = options.logger ?? createLogger('pipeline');
  }

  /** Number of pipeline passes started so far */
  get runs(): number {
    return this._runs;
  }

  get isRunning(): boolean {
    return this.running !== undefined;
  }

  addObserver(observer: PipelineEventObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /** Start the run loop. Returns the loop's promise; idempotent while running. */
  start(): Promise<void> {
    if (!this.running) {
      const controller = new AbortController();
      this.controller = controller;
      this.running = this.loop(controller.signal).finally(() => {
        this.running = undefined;
        this.controller = undefined;
      });
    }
    return this.running;
  }

  async stop(): Promise<void> {
    const running = this.running;
    this.controller?.abort();
    if (running) {
      await running;
    }
  }

  private async loop(signal: AbortSignal): Promise<void> {
    this.logger.debug('Starting pipeline runner');

    while (!signal.aborted) {
      this._runs += 1;
      try {
        await this.pipeline.run({
          audio: this.audio.stream(signal),
          metadata: DEVICE_AUDIO_METADATA,
          onEvent: (event) => this.emit(event),
          signal,
        });
        this.logger.debug('Pipeline finished, starting over', { runs: this._runs });
        await yieldToEventLoop(undefined, { signal });
      } catch (err) {
        if (signal.aborted && isAbortError(err)) {
          break;
        }
        this.logger.error('Pipeline run failed', { error: describeError(err), runs: this._runs });
        try {
          await sleep(this.restartDelayMs, undefined, { signal });
        } catch (sleepErr) {
          if (!isAbortError(sleepErr)) {
            throw sleepErr;
          }
        }
      }
    }

    this.logger.debug('Pipeline runner stopped', { runs: this._runs });
  }

  private emit(event: PipelineEvent): void {
    this.logger.debug('Got event from pipeline', { type: event.type });
    for (const observer of this.observers) {
      try {
        observer.onPipelineEvent(event);
      } catch (err) {
        this.logger.error('Pipeline event observer failed', { error: describeError(err), type: event.type });
      }
    }
  }
}
