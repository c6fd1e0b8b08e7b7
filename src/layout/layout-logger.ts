/**
 * Structured logging for the layout and reroute pipelines.
 *
 * Provides a `LayoutLogger` that records decisions, timings, and node
 * counts for each pipeline step.  Verbosity is a number injected per
 * logger instance:
 *
 * - `0` — silent (default)
 * - `1` — step timings, summaries and non-convergence notes
 * - `2` — per-node and per-link traces
 *
 * Usage:
 * ```ts
 * const logger = createLayoutLogger('organize', { level: 1 });
 * const chains = logger.step('findAllChains', () => findAllChains(graph));
 * logger.note('columns', 'leftward fix-up hit the iteration cap');
 * logger.finish();
 * ```
 *
 * Step entries are **always** recorded (not gated on verbosity) so tests
 * can inspect which steps ran without enabling output.  Lines are written
 * to `process.stderr` unless a sink is supplied: stdout belongs to the
 * MCP transport.
 */

/**
 * Parse a verbosity value from the environment or the CLI.
 * Accepts non-negative integers plus `'true'` (= 1); anything else is 0.
 */
export function parseDebugLevel(raw: string | undefined): number {
  if (raw === undefined) return 0;
  if (raw === 'true') return 1;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/** Verbosity picked up from `WORKFLOW_LAYOUT_DEBUG` when no level is injected. */
export const ENV_DEBUG_LEVEL: number = parseDebugLevel(process.env['WORKFLOW_LAYOUT_DEBUG']);

/** Default line sink. */
export function stderrSink(line: string): void {
  process.stderr.write(`${line}\n`);
}

/** A single recorded pipeline step entry. */
export interface LayoutLogEntry {
  /** Step name (e.g. 'assignColumns'). */
  step: string;
  /** Elapsed time for this step in milliseconds. */
  durationMs: number;
  /** Notes attached while the step was running (only kept when enabled). */
  notes: string[];
}

export interface LayoutLoggerOptions {
  /** Verbosity; defaults to `WORKFLOW_LAYOUT_DEBUG`. */
  level?: number;
  /** Receives each formatted line instead of stderr. */
  sink?: (line: string) => void;
}

/**
 * Structured logger for one pipeline invocation.
 *
 * Create one instance per request and pass it down to each stage so steps
 * can attach notes without a process-wide debug switch.
 */
export class LayoutLogger {
  readonly level: number;
  private readonly pipelineName: string;
  private readonly sink: (line: string) => void;
  private readonly startTime: number;
  private readonly entries: LayoutLogEntry[] = [];
  private currentStep: string | null = null;
  private currentStepStart: number = 0;
  private currentNotes: string[] = [];

  constructor(pipelineName: string, options: LayoutLoggerOptions = {}) {
    this.pipelineName = pipelineName;
    this.level = options.level ?? ENV_DEBUG_LEVEL;
    this.sink = options.sink ?? stderrSink;
    this.startTime = Date.now();
  }

  /** Whether messages of the given verbosity are emitted. */
  enabled(lvl: number = 1): boolean {
    return this.level >= lvl;
  }

  /** Begin a named step.  Prefer `step()`, which pairs this with `endStep()`. */
  beginStep(name: string): void {
    this.currentStep = name;
    this.currentStepStart = Date.now();
    this.currentNotes = [];
  }

  /** End the current step and record its duration. */
  endStep(): void {
    if (!this.currentStep) return;
    const durationMs = Date.now() - this.currentStepStart;
    this.entries.push({ step: this.currentStep, durationMs, notes: [...this.currentNotes] });
    if (this.enabled(1)) {
      const notes = this.currentNotes.length ? ' — ' + this.currentNotes.join('; ') : '';
      this.emit(`  [${this.currentStep}] ${durationMs}ms${notes}`);
    }
    this.currentStep = null;
    this.currentNotes = [];
  }

  /** Run a synchronous function as a named step. */
  step<T>(name: string, fn: () => T): T {
    this.beginStep(name);
    try {
      return fn();
    } finally {
      this.endStep();
    }
  }

  /**
   * Attach a note to the current step, or emit it directly when no step
   * is active.  Dropped unless the logger's level reaches `lvl`.
   */
  note(context: string, message: string, lvl: number = 1): void {
    if (!this.enabled(lvl)) return;
    if (this.currentStep) {
      this.currentNotes.push(message);
    } else {
      this.emit(`  [${context}] ${message}`);
    }
  }

  /**
   * Emit a fine-grained trace line immediately (level 2 by default).
   * Unlike notes, traces never attach to a step.
   */
  trace(message: string, lvl: number = 2): void {
    if (this.enabled(lvl)) this.emit(`    ${message}`);
  }

  /** Log the total elapsed time. */
  finish(): void {
    if (!this.enabled(1)) return;
    const totalMs = Date.now() - this.startTime;
    this.emit(`${this.pipelineName} complete — ${totalMs}ms total, ${this.entries.length} steps`);
  }

  /** All recorded step entries. */
  getEntries(): readonly LayoutLogEntry[] {
    return this.entries;
  }

  private emit(message: string): void {
    this.sink(`[layout:${this.pipelineName}] ${message}`);
  }
}

/** Create a LayoutLogger for a given pipeline invocation. */
export function createLayoutLogger(
  pipelineName: string,
  options?: LayoutLoggerOptions
): LayoutLogger {
  return new LayoutLogger(pipelineName, options);
}

/** A logger that records steps but never prints; used when callers inject none. */
export function silentLogger(pipelineName: string): LayoutLogger {
  return new LayoutLogger(pipelineName, { level: 0 });
}
