import { describe, expect, it } from 'vitest';
import {
  beepProgram,
  clearProgram,
  compileSequence,
  displayProgram,
  idleProgram,
  melodyProgram,
  motorProgram,
} from './builders';
import { MELODIES } from './patterns';

const decoder = new TextDecoder();

function source(program: Uint8Array): string {
  return decoder.decode(program);
}

describe('beepProgram', () => {
  it('awaits the beep inside runloop', () => {
    expect(source(beepProgram(880, 300))).toBe(
      [
        'import runloop',
        'from hub import sound',
        'sound.volume(100)',
        '',
        'async def main():',
        '    await sound.beep(880, 300)',
        '',
        'runloop.run(main())',
        '',
      ].join('\n')
    );
  });

  it('rejects non-integer tones', () => {
    expect(() => beepProgram(440.5, 100)).toThrow(RangeError);
    expect(() => beepProgram(440, -1)).toThrow(RangeError);
  });
});

describe('displayProgram', () => {
  it('lights the pixels of a known pattern and keeps running', () => {
    const lines = source(displayProgram('check')).split('\n');
    expect(lines).toEqual([
      'from hub import light_matrix',
      'import time',
      '',
      'light_matrix.clear()',
      'light_matrix.set_pixel(4, 0, 100)',
      'light_matrix.set_pixel(3, 1, 100)',
      'light_matrix.set_pixel(2, 2, 100)',
      'light_matrix.set_pixel(1, 3, 100)',
      'light_matrix.set_pixel(0, 2, 100)',
      '',
      'while True:',
      '    time.sleep(1)',
      '',
    ]);
  });

  it('writes other names as quoted text', () => {
    expect(source(displayProgram('say "hi"'))).toContain(
      '    await light_matrix.write("say \\"hi\\"")\n'
    );
  });

  it('does not treat inherited keys as patterns', () => {
    expect(source(displayProgram('toString'))).toContain('light_matrix.write("toString")');
  });
});

describe('melodyProgram', () => {
  it('beeps each note and sleeps through rests', () => {
    const lines = source(melodyProgram(MELODIES.alert)).split('\n');
    expect(lines.slice(4, 8)).toEqual([
      'async def main():',
      '    await sound.beep(880, 100)',
      '    time.sleep(0.05)',
      '    await sound.beep(880, 100)',
    ]);
  });
});

describe('motorProgram', () => {
  it('runs the motor for the degrees covered in the duration', () => {
    expect(source(motorProgram('A', 50, 1000))).toBe(
      [
        'from hub import port',
        'import time',
        '',
        'motor = port.A.motor',
        'motor.run_for_degrees(50, 50)',
        'time.sleep(1.5)',
        '',
      ].join('\n')
    );
  });

  it('reverses with a negative speed', () => {
    expect(source(motorProgram('D', -25, 800))).toContain(
      'motor.run_for_degrees(-20, -25)\ntime.sleep(1.3)\n'
    );
  });

  it('rejects fractional speeds', () => {
    expect(() => motorProgram('B', 12.5, 100)).toThrow(RangeError);
  });
});

describe('fixed programs', () => {
  it('clears the display', () => {
    expect(source(clearProgram())).toBe('from hub import light_matrix\nlight_matrix.clear()\n');
  });

  it('does nothing', () => {
    expect(source(idleProgram())).toBe('pass\n');
  });
});

describe('compileSequence', () => {
  it('puts every step and the pauses in one main()', () => {
    const program = source(
      compileSequence(
        [
          { kind: 'beep', frequency: 880, durationMs: 200 },
          { kind: 'display', text: 'Hi' },
          { kind: 'delay', ms: 250 },
        ],
        { delayMs: 100 }
      )
    );

    expect(program).toBe(
      [
        'import runloop',
        'from hub import sound, light_matrix, port',
        'import time',
        'sound.volume(100)',
        '',
        'async def main():',
        '    await sound.beep(880, 200)',
        '    time.sleep(0.1)',
        '    await light_matrix.write("Hi")',
        '    time.sleep(0.1)',
        '    time.sleep(0.25)',
        '    time.sleep(0.1)',
        '',
        'runloop.run(main())',
        '',
      ].join('\n')
    );
    expect(program.match(/runloop\.run/g)).toHaveLength(1);
  });

  it('prints the step index for signal steps', () => {
    const program = source(
      compileSequence([{ kind: 'beep', frequency: 440, durationMs: 100 }, { kind: 'signal' }])
    );
    expect(program).toContain('    print("DONE:1")\n    time.sleep(0.1)\n');
    expect(program).not.toContain('DONE:0');
  });

  it('signals after every step when asked', () => {
    const lines = source(
      compileSequence(
        [
          { kind: 'beep', frequency: 523, durationMs: 150 },
          { kind: 'beep', frequency: 659, durationMs: 150 },
        ],
        { signalGapMs: 1000, delayMs: 100 }
      )
    ).split('\n');

    expect(lines.slice(6, 12)).toEqual([
      '    await sound.beep(523, 150)',
      '    print("DONE:0")',
      '    time.sleep(1)',
      '    await sound.beep(659, 150)',
      '    print("DONE:1")',
      '    time.sleep(1)',
    ]);
  });

  it('prints a signal step only once when every step signals', () => {
    const lines = source(
      compileSequence(
        [
          { kind: 'beep', frequency: 440, durationMs: 100 },
          { kind: 'signal' },
          { kind: 'beep', frequency: 660, durationMs: 100 },
        ],
        { signalGapMs: 1000 }
      )
    ).split('\n');

    expect(lines.slice(6, 14)).toEqual([
      '    await sound.beep(440, 100)',
      '    print("DONE:0")',
      '    time.sleep(1)',
      '    print("DONE:1")',
      '    time.sleep(1)',
      '    await sound.beep(660, 100)',
      '    print("DONE:2")',
      '    time.sleep(1)',
    ]);
  });

  it('runs motor steps for their duration', () => {
    const lines = source(
      compileSequence([{ kind: 'motor', port: 'B', speed: 30, durationMs: 300 }])
    ).split('\n');

    expect(lines.slice(6, 8)).toEqual([
      '    port.B.motor.run_for_degrees(9, 30)',
      '    time.sleep(0.3)',
    ]);
  });

  it('compiles an empty batch to a valid body', () => {
    expect(source(compileSequence([]))).toContain('async def main():\n    pass\n');
  });
});
