/**
 * Seam to the downstream speech pipeline (wake word, STT, intent, TTS).
 * The bridge only feeds it audio and listens to its events.
 */

import type { JsonObject } from '../protocol/types.js';

/** What the microphone client streams: 16 kHz, 16-bit, mono PCM */
export interface AudioMetadata {
  language: string;
  format: 'wav';
  codec: 'pcm';
  bitRate: 16;
  sampleRate: 16000;
  channels: 1;
}

export const DEVICE_AUDIO_METADATA: Readonly<AudioMetadata> = Object.freeze({
  language: '',
  format: 'wav',
  codec: 'pcm',
  bitRate: 16,
  sampleRate: 16000,
  channels: 1,
});

export type PipelineEventType =
  | 'run-start'
  | 'run-end'
  | 'wake-word-start'
  | 'wake-word-end'
  | 'stt-start'
  | 'stt-vad-start'
  | 'stt-vad-end'
  | 'stt-end'
  | 'intent-start'
  | 'intent-end'
  | 'tts-start'
  | 'tts-end'
  | 'error';

export interface PipelineEvent {
  type: PipelineEventType;
  data?: JsonObject;
}

export interface PipelineRunContext {
  /** Endless audio stream; ends only when `signal` aborts */
  audio: AsyncIterable<Buffer>;
  metadata: Readonly<AudioMetadata>;
  onEvent: (event: PipelineEvent) => void;
  signal: AbortSignal;
}

export interface SpeechPipeline {
  /** Run one pass: wake word through TTS. Resolves when the pass is over. */
  run(context: PipelineRunContext): Promise<void>;
}

export interface PipelineEventObserver {
  onPipelineEvent(event: PipelineEvent): void;
}
