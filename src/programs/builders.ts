/**
 * MicroPython program sources for the hub's App 3 firmware.
 *
 * `sound.beep()` and `light_matrix.write()` are coroutines and run inside
 * `runloop.run(main())`; `light_matrix.set_pixel()` and `clear()` are plain
 * calls.
 */

import { PATTERNS, isPattern, type Note } from './patterns';

/**
 * One step of a batched program.
 */
export type SequenceStep =
  | { kind: 'beep'; frequency: number; durationMs: number }
  | { kind: 'display'; text: string }
  | { kind: 'delay'; ms: number }
  | { kind: 'motor'; port: MotorPort; speed: number; durationMs: number }
  | { kind: 'signal' };

export const MOTOR_PORTS = ['A', 'B', 'C', 'D', 'E', 'F'] as const;

export type MotorPort = (typeof MOTOR_PORTS)[number];

export function isMotorPort(value: string): value is MotorPort {
  return MOTOR_PORTS.some((port) => port === value);
}

export interface CompileOptions {
  /** Pause after every step (default: 0) */
  delayMs?: number;

  /** Print `DONE:<index>` after every step, followed by this pause in ms */
  signalGapMs?: number;
}

/** Pause after a `signal` step so the print leaves the hub before the next step */
export const SIGNAL_FLUSH_MS = 100;

const textEncoder = new TextEncoder();

const SEQUENCE_HEADER = [
  'import runloop',
  'from hub import sound, light_matrix, port',
  'import time',
  'sound.volume(100)',
  '',
  'async def main():',
];

const SEQUENCE_FOOTER = ['', 'runloop.run(main())', ''];

/**
 * Encode program source as the UTF-8 bytes uploaded to a slot.
 */
export function toProgram(source: string): Uint8Array {
  return textEncoder.encode(source);
}

/** Python string literal for `text` */
function quote(text: string): string {
  return JSON.stringify(text);
}

function seconds(ms: number): string {
  return String(ms / 1000);
}

function checkTone(frequency: number, durationMs: number): void {
  if (!Number.isInteger(frequency) || frequency < 0) {
    throw new RangeError(`Invalid frequency: ${frequency}`);
  }
  if (!Number.isInteger(durationMs) || durationMs < 0) {
    throw new RangeError(`Invalid duration: ${durationMs}`);
  }
}

export function beepProgram(frequency: number, durationMs: number): Uint8Array {
  checkTone(frequency, durationMs);
  return toProgram(
    [
      'import runloop',
      'from hub import sound',
      'sound.volume(100)',
      '',
      'async def main():',
      `    await sound.beep(${frequency}, ${durationMs})`,
      '',
      'runloop.run(main())',
      '',
    ].join('\n')
  );
}

/**
 * Show a named pattern, or scroll `name` as text when it is not one.
 *
 * Pattern programs keep running so the picture stays lit.
 */
export function displayProgram(name: string, brightness: number = 100): Uint8Array {
  if (!isPattern(name)) {
    return toProgram(
      [
        'import runloop',
        'from hub import light_matrix',
        '',
        'async def main():',
        `    await light_matrix.write(${quote(name)})`,
        '',
        'runloop.run(main())',
        '',
      ].join('\n')
    );
  }

  return toProgram(
    [
      'from hub import light_matrix',
      'import time',
      '',
      'light_matrix.clear()',
      ...PATTERNS[name].map(([x, y]) => `light_matrix.set_pixel(${x}, ${y}, ${brightness})`),
      '',
      'while True:',
      '    time.sleep(1)',
      '',
    ].join('\n')
  );
}

export function melodyProgram(notes: readonly Note[]): Uint8Array {
  const body = notes.map(([frequency, durationMs]) => {
    checkTone(frequency, durationMs);
    return frequency === 0
      ? `    time.sleep(${seconds(durationMs)})`
      : `    await sound.beep(${frequency}, ${durationMs})`;
  });

  return toProgram(
    [
      'import runloop',
      'from hub import sound',
      'import time',
      '',
      'async def main():',
      ...(body.length > 0 ? body : ['    pass']),
      '',
      'runloop.run(main())',
      '',
    ].join('\n')
  );
}

function checkMotor(speed: number, durationMs: number): void {
  if (!Number.isInteger(speed)) {
    throw new RangeError(`Invalid motor speed: ${speed}`);
  }
  if (!Number.isInteger(durationMs) || durationMs < 0) {
    throw new RangeError(`Invalid duration: ${durationMs}`);
  }
}

/** Degrees covered at `speed` deg/s over `durationMs`, truncated toward zero */
function motorDegrees(speed: number, durationMs: number): number {
  return Math.trunc((speed * durationMs) / 1000);
}

/**
 * Turn the motor on `port` at `speed` deg/s for roughly `durationMs`.
 *
 * The program outlives the move by half a second so it is not cut short.
 */
export function motorProgram(port: MotorPort, speed: number, durationMs: number): Uint8Array {
  checkMotor(speed, durationMs);
  return toProgram(
    [
      'from hub import port',
      'import time',
      '',
      `motor = port.${port}.motor`,
      `motor.run_for_degrees(${motorDegrees(speed, durationMs)}, ${speed})`,
      `time.sleep(${seconds(durationMs + 500)})`,
      '',
    ].join('\n')
  );
}

export function clearProgram(): Uint8Array {
  return toProgram('from hub import light_matrix\nlight_matrix.clear()\n');
}

/** Program that exits at once; starting it ends whatever was running. */
export function idleProgram(): Uint8Array {
  return toProgram('pass\n');
}

/**
 * Compile a list of steps into a single program, so the whole batch costs
 * one start (and one startup sound).
 */
export function compileSequence(
  steps: readonly SequenceStep[],
  options: CompileOptions = {}
): Uint8Array {
  const { delayMs = 0, signalGapMs } = options;
  const lines = [...SEQUENCE_HEADER];

  steps.forEach((step, index) => {
    switch (step.kind) {
      case 'beep':
        checkTone(step.frequency, step.durationMs);
        lines.push(`    await sound.beep(${step.frequency}, ${step.durationMs})`);
        break;
      case 'display':
        lines.push(`    await light_matrix.write(${quote(step.text)})`);
        break;
      case 'delay':
        lines.push(`    time.sleep(${seconds(step.ms)})`);
        break;
      case 'motor':
        checkMotor(step.speed, step.durationMs);
        lines.push(
          `    port.${step.port}.motor.run_for_degrees(${motorDegrees(step.speed, step.durationMs)}, ${step.speed})`
        );
        lines.push(`    time.sleep(${seconds(step.durationMs)})`);
        break;
      case 'signal':
        // With signalGapMs every step already prints its index below
        if (signalGapMs === undefined) {
          lines.push(`    print("DONE:${index}")`);
          lines.push(`    time.sleep(${seconds(SIGNAL_FLUSH_MS)})`);
        }
        break;
    }

    if (signalGapMs !== undefined) {
      lines.push(`    print("DONE:${index}")`);
      lines.push(`    time.sleep(${seconds(signalGapMs)})`);
    } else if (delayMs > 0) {
      lines.push(`    time.sleep(${seconds(delayMs)})`);
    }
  });

  if (steps.length === 0) {
    lines.push('    pass');
  }
  lines.push(...SEQUENCE_FOOTER);

  return toProgram(lines.join('\n'));
}
