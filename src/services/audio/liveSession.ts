/**
 * LiveSession – owns one capture source and the pipeline it feeds.
 *
 * Opening the microphone waits on a permission prompt, so start() can be
 * pending for a long time. A start() call while one is pending joins it, and
 * a stop() during that wait releases the capture as soon as it opens.
 */

import type { TunerConfig } from '../../config';
import { logger } from '../../utils/logger';
import type { AudioBlock } from '../../types';
import { AudioCapture } from './audioCapture';
import type { AudioBlockCallback, AudioCaptureOptions } from './audioCapture';
import { BlockPipeline } from './blockPipeline';

export interface BlockSource {
  start(onBlock: AudioBlockCallback): Promise<void>;
  stop(): Promise<void>;
}

export type BlockSourceFactory = (options: AudioCaptureOptions) => BlockSource;

export interface LiveSessionOptions {
  createSource?: BlockSourceFactory;
  /** Capture delivered blocks the pipeline cannot use; the session stops */
  onFatal?: (error: unknown) => void;
  /** The input track ended; the session stops */
  onEnded?: () => void;
}

const TAG = 'session';

const createAudioCapture: BlockSourceFactory = options => new AudioCapture(options);

export class LiveSession {
  private pipeline: BlockPipeline | null = null;
  private source: BlockSource | null = null;
  private pending: Promise<boolean> | null = null;
  // Bumped by stop() so a start() still waiting on the device knows it lost
  private generation = 0;

  private readonly createSource: BlockSourceFactory;
  private readonly onFatal: ((error: unknown) => void) | undefined;
  private readonly onEnded: (() => void) | undefined;

  constructor(readonly config: Readonly<TunerConfig>, options: LiveSessionOptions = {}) {
    this.createSource = options.createSource ?? createAudioCapture;
    this.onFatal = options.onFatal;
    this.onEnded = options.onEnded;
  }

  get isStarting(): boolean {
    return this.pending !== null;
  }

  get isRunning(): boolean {
    return this.source !== null;
  }

  /** Pipeline of the open session, for the display to poll. */
  get activePipeline(): BlockPipeline | null {
    return this.pipeline;
  }

  /**
   * Opens the capture source and starts the pipeline.
   *
   * @returns false when stop() ran before the device finished opening
   */
  start(): Promise<boolean> {
    if (this.pending !== null) return this.pending;
    if (this.source !== null) return Promise.resolve(true);

    const pending = this.open().finally(() => {
      this.pending = null;
    });
    this.pending = pending;
    return pending;
  }

  async stop(): Promise<void> {
    this.generation++;
    const source = this.source;
    const pipeline = this.pipeline;
    this.source = null;
    this.pipeline = null;
    await source?.stop();
    await pipeline?.stop();
  }

  private async open(): Promise<boolean> {
    const generation = this.generation;
    const pipeline = new BlockPipeline(this.config);
    const source = this.createSource({
      sampleRate: this.config.sampleRate,
      blockSize: this.config.blockSize,
      onEnded: () => this.handleEnded(source),
    });

    pipeline.start();
    try {
      await source.start(block => this.deliver(pipeline, block));
    } catch (err) {
      await pipeline.stop();
      throw err;
    }

    if (generation !== this.generation) {
      logger.info(TAG, 'Stopped while the input was opening');
      await source.stop();
      await pipeline.stop();
      return false;
    }

    this.source = source;
    this.pipeline = pipeline;
    return true;
  }

  private deliver(pipeline: BlockPipeline, block: AudioBlock): void {
    try {
      pipeline.submit(block);
    } catch (err) {
      logger.error(TAG, 'Capture format rejected', err);
      this.onFatal?.(err);
      this.stop().catch(stopErr => logger.error(TAG, 'Stop after capture error failed', stopErr));
    }
  }

  private handleEnded(source: BlockSource): void {
    if (this.source !== source) return;
    this.onEnded?.();
    this.stop().catch(err => logger.error(TAG, 'Stop after input end failed', err));
  }
}
