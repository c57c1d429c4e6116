/**
 * Pipeline that appends the raw PCM stream to a file. Handy for checking
 * what a device actually sends before wiring up speech recognition.
 */

import fs from 'node:fs';
import { pipeline as pipe } from 'node:stream/promises';

import { createLogger, type Logger } from '../utils/logger.js';
import type { PipelineRunContext, SpeechPipeline } from './types.js';

export class RecordingPipeline implements SpeechPipeline {
  private _bytesWritten = 0;
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('recording');
  }

  get bytesWritten(): number {
    return this._bytesWritten;
  }

  async run({ audio, onEvent }: PipelineRunContext): Promise<void> {
    this.logger.info('Recording audio', { file: this.filePath });
    onEvent({ type: 'run-start', data: { file: this.filePath } });

    try {
      await pipe(this.count(audio), fs.createWriteStream(this.filePath, { flags: 'a' }));
    } finally {
      onEvent({ type: 'run-end', data: { bytes: this._bytesWritten } });
      this.logger.info('Stopped recording', { file: this.filePath, bytes: this._bytesWritten });
    }
  }

  private async *count(audio: AsyncIterable<Buffer>): AsyncGenerator<Buffer, void, undefined> {
    for await (const chunk of audio) {
      this._bytesWritten += chunk.length;
      yield chunk;
    }
  }
}
