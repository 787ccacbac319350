/**
 * BlockPipeline – moves capture blocks through analysis and publishes the
 * latest reading for the display.
 *
 * The capture callback calls `submit()`, which only enqueues (dropping the
 * oldest pending block when the consumer falls behind). A background consumer
 * task takes blocks in arrival order and, for each one:
 *   ring buffer update → spectral peak → calibration → pitch mapping → publish
 *
 * Published readings are frozen objects swapped by reference, and waveform
 * reads return copies, so the display never observes a partial update.
 */

import { bufferCapacity, DEFAULT_TUNER_CONFIG, plotSampleCount, validateTunerConfig } from '../../config';
import type { TunerConfig } from '../../config';
import { ConfigurationError } from '../../errors';
import { logger } from '../../utils/logger';
import { RingBuffer } from '../../utils/ringBuffer';
import type { AudioBlock, LatestResult, PipelineStats } from '../../types';
import { BlockQueue } from './blockQueue';
import { CalibrationModel } from './calibrationModel';
import { PitchMapper } from './pitchMapper';
import { SpectralAnalyzer } from './spectralAnalyzer';

const TAG = 'pipeline';

export class BlockPipeline {
  readonly config: Readonly<TunerConfig>;

  private readonly queue: BlockQueue;
  private readonly ring: RingBuffer;
  private readonly analyzer: SpectralAnalyzer;
  private readonly calibration: CalibrationModel;
  private readonly mapper = new PitchMapper();

  private latest: LatestResult = null;
  private received = 0;
  private processed = 0;
  private dropped = 0;
  private silent = 0;
  private consumed = 0;
  private loop: Promise<void> | null = null;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(config: Readonly<TunerConfig> = DEFAULT_TUNER_CONFIG) {
    validateTunerConfig(config);
    this.config = config;
    this.queue = new BlockQueue(config.queueCapacity);
    this.ring = new RingBuffer(bufferCapacity(config));
    this.analyzer = new SpectralAnalyzer(config.sampleRate, config.blockSize, {
      noiseFloor: config.noiseFloor,
      minFrequencyHz: config.minFrequencyHz,
    });
    this.calibration = new CalibrationModel(config.calibration);
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.stopped;
  }

  /** Launches the consumer task. Calling it again while running does nothing. */
  start(): void {
    if (this.loop !== null || this.stopped) return;
    logger.info(TAG, `Started (${this.config.sampleRate} Hz, ${this.config.blockSize}-sample blocks)`);
    this.loop = this.consume();
  }

  /**
   * Producer entry point, safe to call from the capture callback: never waits.
   *
   * @throws ConfigurationError when the block's sample rate or length does not
   *   match the configuration (every Hz value would be wrong)
   */
  submit(block: AudioBlock): void {
    if (this.stopped) return;

    if (block.sampleRate !== this.config.sampleRate) {
      throw new ConfigurationError(
        'sampleRate',
        `capture delivered ${block.sampleRate} Hz but the pipeline is configured for ${this.config.sampleRate} Hz`
      );
    }
    if (block.samples.length !== this.config.blockSize) {
      throw new ConfigurationError(
        'blockSize',
        `capture delivered ${block.samples.length} samples but the pipeline expects ${this.config.blockSize}`
      );
    }

    this.received++;
    const evicted = this.queue.push(block);
    if (evicted !== null) {
      this.dropped++;
      logger.warn(TAG, `Queue full, dropped block #${evicted.sequence}`, { dropped: this.dropped });
    }
  }

  /**
   * Runs one block through buffering, analysis, calibration and mapping, then
   * publishes the outcome. Never throws: failures publish silence.
   *
   * @returns The value now visible through currentPitch()
   */
  processBlock(block: AudioBlock): LatestResult {
    try {
      this.ring.push(block.samples);
      this.processed++;

      const peak = this.analyzer.analyze(block.samples);
      if (peak === null) return this.publishSilence();

      const calibratedHz = this.calibration.apply(peak.refinedFrequencyHz);
      // Edge-bin peaks (0 Hz) and over-eager offsets never reach the mapper
      if (!Number.isFinite(calibratedHz) || calibratedHz <= 0) return this.publishSilence();

      this.latest = this.mapper.map(calibratedHz);
      return this.latest;
    } catch (err) {
      logger.error(TAG, `Block #${block.sequence} failed`, err);
      return this.publishSilence();
    }
  }

  /** Latest reading, or null while there is no signal. */
  currentPitch(): LatestResult {
    return this.latest;
  }

  /** Ordered copy of the most recent `count` samples (default: the plot window). */
  currentWaveform(count: number = plotSampleCount(this.config)): Float32Array {
    return this.ring.latest(count);
  }

  /** Ordered copy of the whole waveform buffer. */
  snapshotWaveform(): Float32Array {
    return this.ring.snapshot();
  }

  getStats(): Readonly<PipelineStats> {
    return Object.freeze({
      received: this.received,
      processed: this.processed,
      dropped: this.dropped,
      silent: this.silent,
    });
  }

  /** Title text for the current reading. */
  describeCurrent(): string {
    return this.mapper.describe(this.latest);
  }

  /**
   * Resolves once every submitted block has been processed or dropped, or the
   * pipeline has stopped. Before start() nothing drains the queue, so it
   * resolves at once.
   */
  whenIdle(): Promise<void> {
    if (this.loop === null || this.stopped || this.isIdle()) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops the consumer. Blocks still queued are discarded; resolves once the
   * consumer task has exited.
   */
  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true;
      this.queue.close();
      logger.info(TAG, 'Stopped', this.getStats());
    }
    this.flushIdleWaiters();
    if (this.loop !== null) await this.loop;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const block = await this.queue.next();
      if (block === null) break;
      this.processBlock(block);
      this.consumed++;
      if (this.isIdle()) this.flushIdleWaiters();
    }
    this.flushIdleWaiters();
  }

  private publishSilence(): LatestResult {
    this.silent++;
    if (this.config.silencePolicy === 'clear') {
      this.latest = null;
    }
    return this.latest;
  }

  private isIdle(): boolean {
    return this.received === this.consumed + this.dropped;
  }

  private flushIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}
