import type { ExperimentConfig } from '../experiment/experiment-config.js';
import type { HarnessProfileName, PercentilePolicy } from '../experiment/harness-profile.js';
import { ExperimentError } from '../../shared/errors.js';
import type { HostSample, MetricsRecord } from './metrics-record.js';
import { errorRatePercent, max, mean, percentile95, ratePerMinute } from './statistics.js';

export type VoteOutcome = 'processed' | 'failed';

/**
 * Append-only handle given to one worker. Every mutation of a run's metrics
 * goes through a writer; the collector cannot finalize while one is open.
 */
export interface MetricsWriter {
  readonly label: string;
  recordLatency(ms: number): void;
  recordVote(outcome: VoteOutcome, latencyMs?: number): void;
  recordHostSample(sample: HostSample): void;
  recordError(description: string): void;
  close(): void;
}

export interface CollectorProgress {
  latencyCount: number;
  votesProcessed: number;
  votesFailed: number;
  errorCount: number;
  openWriters: number;
}

export interface FinalizeOptions {
  id: string;
  profile: HarnessProfileName;
  percentilePolicy: PercentilePolicy;
  finishedAt: number;
}

export class MetricsCollector {
  private readonly latenciesMs: number[] = [];
  private readonly cpuSamples: number[] = [];
  private readonly memorySamples: number[] = [];
  private readonly errors: string[] = [];
  private votesProcessed = 0;
  private votesFailed = 0;
  private openWriters = 0;
  private finalized = false;

  constructor(
    readonly config: ExperimentConfig,
    readonly startedAt: number,
  ) {}

  openWriter(label: string): MetricsWriter {
    if (this.finalized) {
      throw new ExperimentError(`Cannot open writer "${label}": metrics already finalized`);
    }
    this.openWriters++;
    let closed = false;
    const ensureOpen = () => {
      if (closed) throw new ExperimentError(`Writer "${label}" used after close`);
    };

    return {
      label,
      recordLatency: (ms) => {
        ensureOpen();
        this.latenciesMs.push(ms);
      },
      recordVote: (outcome, latencyMs) => {
        ensureOpen();
        if (outcome === 'processed') {
          this.votesProcessed++;
          if (latencyMs !== undefined) this.latenciesMs.push(latencyMs);
        } else {
          this.votesFailed++;
        }
      },
      recordHostSample: (sample) => {
        ensureOpen();
        this.cpuSamples.push(sample.cpuPercent);
        this.memorySamples.push(sample.memoryUsedMB);
      },
      recordError: (description) => {
        ensureOpen();
        this.errors.push(description);
      },
      close: () => {
        if (closed) return;
        closed = true;
        this.openWriters--;
      },
    };
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  progress(): CollectorProgress {
    return {
      latencyCount: this.latenciesMs.length,
      votesProcessed: this.votesProcessed,
      votesFailed: this.votesFailed,
      errorCount: this.errors.length,
      openWriters: this.openWriters,
    };
  }

  finalize(options: FinalizeOptions): MetricsRecord {
    if (this.openWriters > 0) {
      throw new ExperimentError(`Cannot finalize metrics: ${this.openWriters} writer(s) still open`);
    }
    if (this.finalized) {
      throw new ExperimentError('Metrics already finalized');
    }
    this.finalized = true;

    const durationActualSeconds = (options.finishedAt - this.startedAt) / 1000;

    return Object.freeze({
      id: options.id,
      profile: options.profile,
      percentilePolicy: options.percentilePolicy,
      config: Object.freeze({ ...this.config }),
      timestamp: new Date(this.startedAt).toISOString(),
      latenciesMs: Object.freeze([...this.latenciesMs]),
      votesProcessed: this.votesProcessed,
      votesFailed: this.votesFailed,
      cpuSamples: Object.freeze([...this.cpuSamples]),
      memorySamples: Object.freeze([...this.memorySamples]),
      errors: Object.freeze([...this.errors]),
      latencyMean: mean(this.latenciesMs),
      latencyP95: percentile95(this.latenciesMs, options.percentilePolicy),
      latencyMax: max(this.latenciesMs),
      durationActualSeconds,
      throughputPerMinute: ratePerMinute(this.votesProcessed, durationActualSeconds),
      errorRatePercent: errorRatePercent(this.votesFailed, this.votesProcessed),
      cpuMeanPercent: mean(this.cpuSamples),
      memoryMeanMB: mean(this.memorySamples),
    });
  }
}
