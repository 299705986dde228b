/**
 * Slot preloading fast path.
 *
 * Starting a preloaded slot takes one ProgramFlowRequest instead of a full
 * upload, but every start still plays the hub's startup sound. Batch work
 * through {@link SlotRegistry.runSequence} to pay that cost once.
 */

import {
  ActionUnavailableError,
  CatalogTooLargeError,
  OperationAbortedError,
  PreloadError,
  UnknownActionError,
} from './exceptions';
import { HubState } from './models/enums';
import type { RunResult } from './models/results';
import { SLOT_COUNT } from './protocol/constants';
import { compileSequence, type SequenceStep } from './programs/builders';
import { toSteps, type ActionTranslator, type CatalogEntry } from './programs/catalog';
import type { FlowOptions, HubSession } from './session';
import { SignalQueue, type Signal } from './signals';

/**
 * One catalog action and the slot that holds it.
 */
export interface SlotEntry {
  readonly action: string;
  readonly slot: number;
  readonly program: Uint8Array;

  /** Set once the last preload stored the program on the hub */
  uploaded: boolean;

  /** Why the last preload of this entry failed */
  error?: Error;
}

export interface SlotRegistryOptions {
  /** Slots the hub offers (default: 20) */
  slotCount?: number;

  /** Scratch slot for batches and ad-hoc uploads (default: 18) */
  sequenceSlot?: number;

  /** Scratch slot for signalled runs (default: 17) */
  interactiveSlot?: number;

  /** Pause between batched steps (default: 100) */
  sequenceDelayMs?: number;

  /** Pause after each signalled step, giving other devices time to react (default: 1000) */
  interactiveGapMs?: number;

  /** File name stored with every uploaded program (default: "program.py") */
  fileName?: string;
}

export interface PreloadReport {
  loaded: string[];
  failed: Array<{ action: string; error: Error }>;
  elapsedMs: number;
}

export interface RunOptions {
  /** Wait for the hub to confirm the start (default: false) */
  waitForAck?: boolean;
  signal?: AbortSignal;
}

export interface SequenceOptions {
  /** Pause between steps; defaults to the registry's `sequenceDelayMs` */
  delayMs?: number;
  waitForAck?: boolean;
  signal?: AbortSignal;
}

export interface InteractiveOptions {
  /** Called after each step's signal, before the next one is awaited */
  onStepDone?: (completed: number) => void | Promise<void>;

  /** Wait per signal (default: 5000) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface InteractiveReport {
  completed: number;
  total: number;
  elapsedMs: number;
}

export interface SequenceReport {
  steps: number;
  slot: number;
  elapsedMs: number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Catalog of preloaded actions on one hub.
 *
 * Entries take slots 0..n-1 in catalog order; the sequence and interactive
 * slots are kept free for batches.
 *
 * @example
 * ```typescript
 * const registry = new SlotRegistry(hub, defaultCatalog());
 * await registry.preload();
 * await registry.run('beep_high');
 * await registry.runSequence([
 *   { kind: 'beep', frequency: 880, durationMs: 200 },
 *   { kind: 'display', text: 'Hi' },
 * ]);
 * ```
 */
export class SlotRegistry {
  static readonly DEFAULT_SLOT_COUNT = SLOT_COUNT;
  static readonly DEFAULT_SEQUENCE_SLOT = 18;
  static readonly DEFAULT_INTERACTIVE_SLOT = 17;
  static readonly DEFAULT_SEQUENCE_DELAY_MS = 100;
  static readonly DEFAULT_INTERACTIVE_GAP_MS = 1000;
  static readonly DEFAULT_SIGNAL_TIMEOUT_MS = 5000;
  static readonly DEFAULT_FILE_NAME = 'program.py';

  readonly sequenceSlot: number;
  readonly interactiveSlot: number;

  private readonly entries = new Map<string, SlotEntry>();
  private readonly sequenceDelayMs: number;
  private readonly interactiveGapMs: number;
  private readonly fileName: string;

  constructor(
    private readonly session: HubSession,
    catalog: readonly CatalogEntry[],
    options: SlotRegistryOptions = {}
  ) {
    const slotCount = options.slotCount ?? SlotRegistry.DEFAULT_SLOT_COUNT;
    this.sequenceSlot = options.sequenceSlot ?? SlotRegistry.DEFAULT_SEQUENCE_SLOT;
    this.interactiveSlot = options.interactiveSlot ?? SlotRegistry.DEFAULT_INTERACTIVE_SLOT;
    this.sequenceDelayMs = options.sequenceDelayMs ?? SlotRegistry.DEFAULT_SEQUENCE_DELAY_MS;
    this.interactiveGapMs = options.interactiveGapMs ?? SlotRegistry.DEFAULT_INTERACTIVE_GAP_MS;
    this.fileName = options.fileName ?? SlotRegistry.DEFAULT_FILE_NAME;

    for (const slot of [this.sequenceSlot, this.interactiveSlot]) {
      if (!Number.isInteger(slot) || slot < 0 || slot >= slotCount) {
        throw new RangeError(`Reserved slot ${slot} is outside 0..${slotCount - 1}`);
      }
    }
    if (this.sequenceSlot === this.interactiveSlot) {
      throw new RangeError(`Sequence and interactive slots must differ (both ${this.sequenceSlot})`);
    }

    const capacity = Math.min(this.sequenceSlot, this.interactiveSlot);
    if (catalog.length > capacity) {
      throw new CatalogTooLargeError(catalog.length, capacity);
    }

    catalog.forEach(({ action, program }, slot) => {
      if (this.entries.has(action)) {
        throw new PreloadError(`Duplicate action in catalog: ${action}`);
      }
      this.entries.set(action, { action, slot, program, uploaded: false });
    });
  }

  get actions(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Snapshot of every entry.
   */
  status(): SlotEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  /**
   * Upload every catalog program to its slot.
   *
   * Best effort: a failed entry is recorded and the rest still load.
   *
   * @throws {PreloadError} If the session is not ready
   * @throws {OperationAbortedError} If `signal` aborts; later entries are left untouched
   */
  async preload(options: { signal?: AbortSignal } = {}): Promise<PreloadReport> {
    if (this.session.state !== HubState.READY) {
      throw new PreloadError(`Cannot preload while session is ${this.session.state}`);
    }

    const startedAt = Date.now();
    const report: PreloadReport = { loaded: [], failed: [], elapsedMs: 0 };
    console.log(`[${this.session.deviceId}] Preloading ${this.entries.size} programs...`);

    for (const entry of this.entries.values()) {
      entry.uploaded = false;
      entry.error = undefined;

      try {
        await this.clearQuietly(entry.slot, options.signal);
        await this.session.upload(entry.slot, this.fileName, entry.program, {
          signal: options.signal,
        });
        entry.uploaded = true;
        report.loaded.push(entry.action);
        console.debug(`[${this.session.deviceId}] Slot ${entry.slot}: ${entry.action}`);
      } catch (error) {
        if (error instanceof OperationAbortedError) {
          throw error;
        }
        entry.error = toError(error);
        report.failed.push({ action: entry.action, error: entry.error });
        console.warn(
          `[${this.session.deviceId}] Slot ${entry.slot}: ${entry.action} failed: ${entry.error.message}`
        );
      }
    }

    report.elapsedMs = Date.now() - startedAt;
    console.log(
      `[${this.session.deviceId}] Preloaded ${report.loaded.length}/${this.entries.size} programs ` +
        `in ${report.elapsedMs}ms`
    );
    return report;
  }

  /**
   * Start a catalog action.
   *
   * An action that was never preloaded is uploaded to the sequence slot
   * first, which costs a full upload.
   *
   * @throws {UnknownActionError} If the action is not in the catalog
   * @throws {ActionUnavailableError} If its preload failed or the hub did not start it
   */
  async run(action: string, options: RunOptions = {}): Promise<RunResult> {
    const entry = this.entries.get(action);
    if (!entry) {
      throw new UnknownActionError(action, this.actions);
    }
    if (entry.error) {
      throw new ActionUnavailableError(action, { cause: entry.error });
    }

    const flowOptions: Omit<FlowOptions, 'stop'> = {
      waitForAck: options.waitForAck ?? false,
      signal: options.signal,
    };

    try {
      if (entry.uploaded) {
        const result = await this.session.startProgram(entry.slot, flowOptions);
        return { ...result, action, uploaded: false };
      }

      await this.clearQuietly(this.sequenceSlot, options.signal);
      await this.session.upload(this.sequenceSlot, this.fileName, entry.program, {
        signal: options.signal,
      });
      const result = await this.session.startProgram(this.sequenceSlot, flowOptions);
      return { ...result, action, uploaded: true };
    } catch (error) {
      if (error instanceof OperationAbortedError) {
        throw error;
      }
      throw new ActionUnavailableError(action, { cause: error });
    }
  }

  /**
   * Compile all steps into one program in the sequence slot and start it once.
   */
  async runSequence(
    steps: readonly SequenceStep[],
    options: SequenceOptions = {}
  ): Promise<SequenceReport> {
    const startedAt = Date.now();
    const program = compileSequence(steps, {
      delayMs: options.delayMs ?? this.sequenceDelayMs,
    });

    await this.clearQuietly(this.sequenceSlot, options.signal);
    await this.session.upload(this.sequenceSlot, this.fileName, program, {
      signal: options.signal,
    });
    await this.session.startProgram(this.sequenceSlot, {
      waitForAck: options.waitForAck ?? false,
      signal: options.signal,
    });

    return { steps: steps.length, slot: this.sequenceSlot, elapsedMs: Date.now() - startedAt };
  }

  /**
   * Run a high-level action through a translator as one batch.
   *
   * @throws {UnknownActionError} If the translator does not know the action
   * @throws {RunError} If a translated command cannot be parsed
   */
  async runTranslated(
    translator: ActionTranslator,
    action: string,
    params?: Readonly<Record<string, unknown>>,
    options: SequenceOptions = {}
  ): Promise<SequenceReport> {
    const commands = translator.translate(action, params);
    if (!commands) {
      throw new UnknownActionError(action, []);
    }
    // Translated commands carry their own pauses
    return this.runSequence(toSteps(commands), { delayMs: 0, ...options });
  }

  /**
   * Run steps that each print `DONE:<index>`, handing control back to the
   * caller as each one completes.
   *
   * Only this session's console output counts, and each step waits for its
   * own index; any other signal is discarded. Stops waiting at the first step
   * whose signal does not arrive in time.
   */
  async runInteractive(
    steps: readonly SequenceStep[],
    options: InteractiveOptions = {}
  ): Promise<InteractiveReport> {
    const startedAt = Date.now();
    const timeoutMs = options.timeoutMs ?? SlotRegistry.DEFAULT_SIGNAL_TIMEOUT_MS;
    const program = compileSequence(steps, { signalGapMs: this.interactiveGapMs });

    await this.clearQuietly(this.interactiveSlot, options.signal);
    await this.session.upload(this.interactiveSlot, this.fileName, program, {
      signal: options.signal,
    });

    const signals = new SignalQueue({ defaultSource: this.session.deviceId });
    const detach = signals.attach(this.session);
    try {
      await this.session.startProgram(this.interactiveSlot, {
        waitForAck: false,
        signal: options.signal,
      });

      let completed = 0;
      for (let step = 0; step < steps.length; step++) {
        if (options.signal?.aborted) {
          throw new OperationAbortedError();
        }

        const signal = await this.waitForStep(signals, step, timeoutMs);
        if (!signal) {
          console.warn(`[${this.session.deviceId}] No signal for step ${step} within ${timeoutMs}ms`);
          break;
        }

        completed++;
        console.debug(`[${this.session.deviceId}] Signal: ${signal.rawText}`);
        await options.onStepDone?.(completed);
      }

      return { completed, total: steps.length, elapsedMs: Date.now() - startedAt };
    } finally {
      detach();
      signals.clear('Interactive run finished');
    }
  }

  private async waitForStep(
    signals: SignalQueue,
    step: number,
    timeoutMs: number
  ): Promise<Signal | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }

      const signal = await signals.wait(remaining);
      if (!signal || signal.sequenceNumber === step) {
        return signal;
      }
      console.debug(
        `[${this.session.deviceId}] Discarding ${signal.rawText} while awaiting step ${step}`
      );
    }
  }

  private async clearQuietly(slot: number, signal: AbortSignal | undefined): Promise<void> {
    try {
      const accepted = await this.session.clearSlot(slot, { signal });
      if (!accepted) {
        console.debug(`[${this.session.deviceId}] Hub declined to clear slot ${slot}`);
      }
    } catch (error) {
      if (error instanceof OperationAbortedError) {
        throw error;
      }
      console.warn(
        `[${this.session.deviceId}] Could not clear slot ${slot}: ${toError(error).message}`
      );
    }
  }
}
