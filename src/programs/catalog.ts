/**
 * Default action catalog and translation of primitive command strings.
 */

import { RunError } from '../exceptions';
import {
  beepProgram,
  clearProgram,
  displayProgram,
  idleProgram,
  isMotorPort,
  type SequenceStep,
} from './builders';

/**
 * A named program that can be preloaded into a slot.
 */
export interface CatalogEntry {
  action: string;
  program: Uint8Array;
}

/** Duration of every catalog beep, in ms */
export const CATALOG_BEEP_MS = 300;

const BEEPS: ReadonlyArray<readonly [string, number]> = [
  ['beep_high', 880],
  ['beep_med', 440],
  ['beep_low', 220],
  ['beep_c', 523],
  ['beep_e', 659],
  ['beep_g', 784],
];

const FACES = ['happy', 'sad', 'heart', 'neutral', 'angry', 'surprised', 'check'];

/**
 * Build the default catalog: six beeps, seven pictures, `clear` and `stop`.
 */
export function defaultCatalog(): CatalogEntry[] {
  return [
    ...BEEPS.map(([action, frequency]) => ({
      action,
      program: beepProgram(frequency, CATALOG_BEEP_MS),
    })),
    ...FACES.map((action) => ({ action, program: displayProgram(action) })),
    { action: 'clear', program: clearProgram() },
    { action: 'stop', program: idleProgram() },
  ];
}

/**
 * Maps a high-level action to primitive commands, each paired with the
 * pause in ms to take after it.
 */
export interface ActionTranslator {
  translate(
    action: string,
    params?: Readonly<Record<string, unknown>>
  ): ReadonlyArray<readonly [string, number]> | null;
}

function parseInteger(
  command: string,
  value: string | undefined,
  fallback: number,
  signed: boolean = false
): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || (!signed && parsed < 0)) {
    throw new RunError(`Invalid number "${value}" in command: ${command}`);
  }
  return parsed;
}

/**
 * Parse one primitive command.
 *
 * Accepted forms: `beep [hz] [ms]`, `display <text>`, `delay <ms>`,
 * `motor <port> [speed] [ms]` and `signal`. Motor speed is in deg/s and may be
 * negative to reverse.
 *
 * @throws {RunError} If the command is not one of those
 */
export function parseCommand(command: string): SequenceStep {
  const [verb = '', ...args] = command.trim().split(/\s+/);

  switch (verb.toLowerCase()) {
    case 'beep':
      return {
        kind: 'beep',
        frequency: parseInteger(command, args[0], 440),
        durationMs: parseInteger(command, args[1], 200),
      };
    case 'display':
      return { kind: 'display', text: args.length > 0 ? args.join(' ') : 'Hi' };
    case 'delay':
      return { kind: 'delay', ms: parseInteger(command, args[0], 100) };
    case 'motor': {
      const port = args[0]?.toUpperCase() ?? '';
      if (!isMotorPort(port)) {
        throw new RunError(`Invalid motor port "${args[0] ?? ''}" in command: ${command}`);
      }
      return {
        kind: 'motor',
        port,
        speed: parseInteger(command, args[1], 50, true),
        durationMs: parseInteger(command, args[2], 1000),
      };
    }
    case 'signal':
      return { kind: 'signal' };
    default:
      throw new RunError(`Unsupported command: ${command}`);
  }
}

/**
 * Turn translated commands into steps, inserting each command's pause as a
 * `delay` step.
 */
export function toSteps(commands: ReadonlyArray<readonly [string, number]>): SequenceStep[] {
  const steps: SequenceStep[] = [];
  for (const [command, pauseMs] of commands) {
    steps.push(parseCommand(command));
    if (pauseMs > 0) {
      steps.push({ kind: 'delay', ms: pauseMs });
    }
  }
  return steps;
}
