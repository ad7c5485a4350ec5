/**
 * Progress Reporter
 *
 * Progress display for index builds. Supports three output modes:
 * - Interactive: ora spinner with real-time counts
 * - JSON: NDJSON event stream for scripts and CI
 * - Text: one line per stage for non-TTY output
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IndexBuildProgress } from '../../search/types.js';

export type IndexingStage = IndexBuildProgress['phase'];

const STAGE_LABELS: Record<IndexingStage, string> = {
  embedding: 'Embedding',
  storing: 'Storing',
};

export interface ProgressReporterOptions {
  /** Emit NDJSON events instead of human-readable text */
  json: boolean;
  /** Whether output is a TTY (spinner support) */
  isInteractive: boolean;
  /** Line writer; defaults to console.log */
  write?: (line: string) => void;
}

export interface IndexSummary {
  knowledgeBase: string;
  indexPath: string;
  chunkCount: number;
  reused: boolean;
  durationMs: number;
}

export type ProgressEventType = 'stage_start' | 'stage_progress' | 'complete';

export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IndexingStage;
  data: Record<string, unknown>;
}

/**
 * Turns `IndexBuildProgress` callbacks into terminal output.
 *
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, isInteractive: true });
 * await buildIndex({ ..., onProgress: (p) => reporter.update(p) });
 * reporter.finish(summary);
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private stage: IndexingStage | null = null;
  private lastUpdateTime = 0;
  private readonly write: (line: string) => void;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(private readonly options: ProgressReporterOptions) {
    this.write = options.write ?? ((line) => console.log(line));
  }

  update(progress: IndexBuildProgress): void {
    if (progress.phase !== this.stage) {
      this.startStage(progress.phase, progress.total);
    }

    const now = performance.now();
    const isLast = progress.done === progress.total;
    if (!isLast && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emit({
        type: 'stage_progress',
        stage: progress.phase,
        data: { done: progress.done, total: progress.total },
      });
    } else if (this.spinner) {
      const percentage = progress.total > 0 ? Math.round((progress.done / progress.total) * 100) : 100;
      this.spinner.text = `${progress.done}/${progress.total} chunks (${percentage}%)`;
    }
  }

  /**
   * Close the running stage and print the summary.
   */
  finish(summary: IndexSummary): void {
    this.completeStage();

    if (this.options.json) {
      this.emit({ type: 'complete', data: { ...summary } });
      return;
    }

    this.write('');
    this.write(
      summary.reused
        ? chalk.green.bold('Index is up to date ✓')
        : chalk.green.bold('Index Complete ✓')
    );
    this.write('');
    this.write(`  ${chalk.dim('Knowledge base:')}  ${summary.knowledgeBase}`);
    this.write(`  ${chalk.dim('Index file:')}      ${summary.indexPath}`);
    this.write(`  ${chalk.dim('Chunks:')}          ${summary.chunkCount.toLocaleString()}`);
    this.write(`  ${chalk.dim('Time elapsed:')}    ${formatDuration(summary.durationMs)}`);
  }

  /** Stop any spinner without a summary (on failure) */
  abort(): void {
    this.spinner?.fail();
    this.spinner = null;
    this.stage = null;
  }

  private startStage(stage: IndexingStage, total: number): void {
    this.completeStage();
    this.stage = stage;
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emit({ type: 'stage_start', stage, data: { total } });
    } else if (this.options.isInteractive) {
      const label = STAGE_LABELS[stage];
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(10)) }).start();
    } else {
      this.write(`${STAGE_LABELS[stage]}...`);
    }
  }

  private completeStage(): void {
    if (this.spinner) {
      this.spinner.succeed();
      this.spinner = null;
    }
    this.stage = null;
  }

  private emit(event: Omit<ProgressEvent, 'timestamp'>): void {
    const full: ProgressEvent = { ...event, timestamp: new Date().toISOString() };
    this.write(JSON.stringify(full));
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}
