/**
 * AudioCapture service – microphone input as a stream of fixed-size blocks.
 *
 * Opens the microphone through the Web Audio API and a ScriptProcessorNode of
 * `blockSize` frames. Every callback copies channel 0 into a frozen AudioBlock
 * and hands it to `onBlock`; the callback itself does nothing else.
 */

import { ConfigurationError } from '../../errors';
import { logger } from '../../utils/logger';
import type { AudioBlock } from '../../types';

export type AudioBlockCallback = (block: AudioBlock) => void;

export interface AudioCaptureOptions {
  sampleRate: number;
  /** Frames per block: a power of two between 256 and 16384 */
  blockSize: number;
  /** Called when the input track ends (device unplugged, permission revoked) */
  onEnded?: () => void;
}

const TAG = 'capture';
const MIN_BLOCK_SIZE = 256;
const MAX_BLOCK_SIZE = 16384;

export class AudioCapture {
  private stream: MediaStream | null = null;
  private audioCtx: AudioContext | null = null;
  private processor: ScriptProcessorNode | null = null;
  private source: MediaStreamAudioSourceNode | null = null;
  private sequence = 0;

  readonly sampleRate: number;
  readonly blockSize: number;
  private readonly onEnded: (() => void) | undefined;

  constructor({ sampleRate, blockSize, onEnded }: AudioCaptureOptions) {
    if (blockSize < MIN_BLOCK_SIZE || blockSize > MAX_BLOCK_SIZE || (blockSize & (blockSize - 1)) !== 0) {
      throw new ConfigurationError(
        'blockSize',
        `microphone capture needs a power of two between ${MIN_BLOCK_SIZE} and ${MAX_BLOCK_SIZE}, got ${blockSize}`
      );
    }
    this.sampleRate = sampleRate;
    this.blockSize = blockSize;
    this.onEnded = onEnded;
  }

  /**
   * Requests microphone permission and starts delivering blocks.
   *
   * @throws ConfigurationError when the device cannot run at the configured rate
   */
  async start(onBlock: AudioBlockCallback): Promise<void> {
    this.stream = await navigator.mediaDevices.getUserMedia({
      audio: { channelCount: 1, echoCancellation: false, noiseSuppression: false, autoGainControl: false },
      video: false,
    });
    this.audioCtx = new AudioContext({ sampleRate: this.sampleRate });

    if (this.audioCtx.sampleRate !== this.sampleRate) {
      const actual = this.audioCtx.sampleRate;
      await this.stop();
      throw new ConfigurationError('sampleRate', `audio device runs at ${actual} Hz, expected ${this.sampleRate} Hz`);
    }

    this.source = this.audioCtx.createMediaStreamSource(this.stream);
    this.processor = this.audioCtx.createScriptProcessor(this.blockSize, 1, 1);
    this.processor.onaudioprocess = event => {
      const samples = event.inputBuffer.getChannelData(0).slice();
      onBlock(Object.freeze({ samples, sampleRate: event.inputBuffer.sampleRate, sequence: this.sequence++ }));
    };

    this.source.connect(this.processor);
    // The processor only fires while connected to the graph output
    this.processor.connect(this.audioCtx.destination);

    this.stream.getTracks().forEach(track => {
      track.addEventListener('ended', () => {
        logger.warn(TAG, 'Input track ended');
        this.onEnded?.();
      });
    });

    logger.info(TAG, `Microphone open at ${this.audioCtx.sampleRate} Hz`);
  }

  /** Stop recording and release all resources. */
  async stop(): Promise<void> {
    if (this.processor) {
      this.processor.onaudioprocess = null;
      this.processor.disconnect();
    }
    if (this.source) this.source.disconnect();
    if (this.stream) this.stream.getTracks().forEach(t => t.stop());
    const ctx = this.audioCtx;
    this.stream = null;
    this.audioCtx = null;
    this.processor = null;
    this.source = null;
    if (ctx) await ctx.close();
  }
}
