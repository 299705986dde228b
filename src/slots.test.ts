import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ActionUnavailableError,
  CatalogTooLargeError,
  FlowRejectedError,
  FlowTimeoutError,
  PreloadError,
  UnknownActionError,
} from './exceptions';
import { DeliveryStatus } from './models/enums';
import { MessageType } from './protocol/constants';
import { beepProgram, compileSequence, toProgram, type SequenceStep } from './programs/builders';
import { defaultCatalog, toSteps, type ActionTranslator, type CatalogEntry } from './programs/catalog';
import { HubSession, type HubTimeouts } from './session';
import { SignalQueue } from './signals';
import { SlotRegistry } from './slots';
import { FakeHub } from './testing/fake-hub';

function numberedCatalog(count: number): CatalogEntry[] {
  return Array.from({ length: count }, (_, index) => ({
    action: `action${index + 1}`,
    program: toProgram(`print(${index + 1})\n`),
  }));
}

async function connected(
  timeouts: Partial<HubTimeouts> = {}
): Promise<{ hub: FakeHub; session: HubSession }> {
  const hub = new FakeHub();
  const session = new HubSession({ transport: hub, deviceId: 'test-hub', timeouts });
  await session.connect();
  return { hub, session };
}

function flowStarts(hub: FakeHub): Array<{ slot: number; stop: boolean }> {
  return hub
    .requestsOf(MessageType.ProgramFlowRequest)
    .map(({ slot, stop }) => ({ slot, stop }));
}

describe('SlotRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('assigns slots in catalog order', async () => {
      const { session } = await connected();
      const registry = new SlotRegistry(session, numberedCatalog(3));

      expect(registry.status().map(({ action, slot, uploaded }) => ({ action, slot, uploaded }))).toEqual([
        { action: 'action1', slot: 0, uploaded: false },
        { action: 'action2', slot: 1, uploaded: false },
        { action: 'action3', slot: 2, uploaded: false },
      ]);
    });

    it('rejects a catalog that reaches the reserved slots', async () => {
      const { session } = await connected();
      expect(() => new SlotRegistry(session, numberedCatalog(18))).toThrow(CatalogTooLargeError);
      expect(() => new SlotRegistry(session, numberedCatalog(17))).not.toThrow();
    });

    it('bounds the catalog by the configured slots', async () => {
      const { session } = await connected();
      const options = { slotCount: 10, sequenceSlot: 9, interactiveSlot: 8 };

      expect(() => new SlotRegistry(session, numberedCatalog(9), options)).toThrow(
        'Catalog has 9 actions but only 8 slots are free'
      );
      expect(() => new SlotRegistry(session, numberedCatalog(3), { slotCount: 10 })).toThrow(RangeError);
    });

    it('rejects duplicate actions', async () => {
      const { session } = await connected();
      const catalog = [...numberedCatalog(2), ...numberedCatalog(1)];
      expect(() => new SlotRegistry(session, catalog)).toThrow(PreloadError);
    });
  });

  describe('preload', () => {
    it('clears and uploads every entry to its slot', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, numberedCatalog(2));

      const report = await registry.preload();

      expect(report.loaded).toEqual(['action1', 'action2']);
      expect(report.failed).toEqual([]);
      expect(hub.requests.slice(1).map((request) => request.type)).toEqual([
        MessageType.ClearSlotRequest,
        MessageType.StartFileUploadRequest,
        MessageType.TransferChunkRequest,
        MessageType.ClearSlotRequest,
        MessageType.StartFileUploadRequest,
        MessageType.TransferChunkRequest,
      ]);
      expect(hub.slots.get(1)).toEqual(toProgram('print(2)\n'));
      expect(hub.requestsOf(MessageType.StartFileUploadRequest)[0]?.fileName).toBe('program.py');
      expect(registry.status().every((entry) => entry.uploaded)).toBe(true);
    });

    it('keeps going when a slot cannot be cleared', async () => {
      const { hub, session } = await connected();
      hub.rejectWhen = (request) => request.type === MessageType.ClearSlotRequest;
      const registry = new SlotRegistry(session, numberedCatalog(2));

      await expect(registry.preload()).resolves.toMatchObject({ loaded: ['action1', 'action2'] });
    });

    it('loads the rest of the catalog when one entry fails', async () => {
      const { hub, session } = await connected();
      hub.rejectWhen = (request) =>
        request.type === MessageType.TransferChunkRequest &&
        hub.requestsOf(MessageType.StartFileUploadRequest).at(-1)?.slot === 3;
      const registry = new SlotRegistry(session, numberedCatalog(10));

      const report = await registry.preload();

      expect(report.loaded).toHaveLength(9);
      expect(report.failed.map(({ action }) => action)).toEqual(['action4']);
      expect(report.failed[0]?.error.name).toBe('UploadFailedError');

      const failed = registry.status().find((entry) => entry.action === 'action4');
      expect(failed?.uploaded).toBe(false);

      await expect(registry.run('action4')).rejects.toThrow(ActionUnavailableError);
      await expect(registry.run('action5', { waitForAck: true })).resolves.toMatchObject({
        status: DeliveryStatus.ACKNOWLEDGED,
        slot: 4,
        action: 'action5',
        uploaded: false,
      });
    });

    it('needs a ready session', async () => {
      const session = new HubSession({ transport: new FakeHub() });
      const registry = new SlotRegistry(session, numberedCatalog(1));

      await expect(registry.preload()).rejects.toThrow(PreloadError);
    });
  });

  describe('run', () => {
    it('returns before the response without waiting for the ack', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, defaultCatalog());
      await registry.preload();
      hub.holdResponses = true;

      const result = await registry.run('beep_high', { waitForAck: false });

      expect(result).toMatchObject({ status: DeliveryStatus.SENT, slot: 0, action: 'beep_high' });
      expect(hub.heldCount).toBe(1);
      hub.holdResponses = false;
      hub.releaseHeld();
    });

    it('waits for the response with the ack', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, defaultCatalog());
      await registry.preload();
      hub.holdResponses = true;

      let settled = false;
      const running = registry.run('beep_high', { waitForAck: true }).then((result) => {
        settled = true;
        return result;
      });
      await vi.waitFor(() => expect(hub.heldCount).toBe(1));
      expect(settled).toBe(false);

      hub.holdResponses = false;
      hub.releaseHeld();
      await expect(running).resolves.toMatchObject({ status: DeliveryStatus.ACKNOWLEDGED });
    });

    it('reports a flow timeout as an unavailable action', async () => {
      const { hub, session } = await connected({ flow: 20 });
      const registry = new SlotRegistry(session, defaultCatalog());
      await registry.preload();
      hub.silent.add(MessageType.ProgramFlowRequest);

      const error = await registry.run('happy', { waitForAck: true }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ActionUnavailableError);
      expect(error).toMatchObject({ action: 'happy', cause: expect.any(FlowTimeoutError) });
    });

    it('reports a rejected start as an unavailable action', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, defaultCatalog());
      await registry.preload();
      hub.rejectWhen = (request) => request.type === MessageType.ProgramFlowRequest;

      await expect(registry.run('sad', { waitForAck: true })).rejects.toMatchObject({
        cause: expect.any(FlowRejectedError),
      });
    });

    it('rejects actions outside the catalog', async () => {
      const { session } = await connected();
      const registry = new SlotRegistry(session, numberedCatalog(2));

      await expect(registry.run('dance')).rejects.toThrow(
        new UnknownActionError('dance', ['action1', 'action2']).message
      );
    });

    it('uploads an action that was never preloaded to the sequence slot', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, defaultCatalog());

      const result = await registry.run('beep_high', { waitForAck: true });

      expect(result).toMatchObject({ slot: 18, uploaded: true, action: 'beep_high' });
      expect(hub.slots.get(18)).toEqual(beepProgram(880, 300));
      expect(flowStarts(hub)).toEqual([{ slot: 18, stop: false }]);
    });
  });

  describe('runSequence', () => {
    const steps: SequenceStep[] = [
      { kind: 'beep', frequency: 523, durationMs: 150 },
      { kind: 'beep', frequency: 659, durationMs: 150 },
      { kind: 'display', text: 'Go' },
      { kind: 'delay', ms: 200 },
      { kind: 'beep', frequency: 784, durationMs: 300 },
    ];

    it('starts exactly one program for the whole batch', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, defaultCatalog());

      const report = await registry.runSequence(steps, { waitForAck: true });

      expect(report).toMatchObject({ steps: 5, slot: 18 });
      expect(flowStarts(hub)).toEqual([{ slot: 18, stop: false }]);
      expect(hub.requestsOf(MessageType.StartFileUploadRequest)).toHaveLength(1);
      expect(hub.slots.get(18)).toEqual(compileSequence(steps, { delayMs: 100 }));
    });

    it('uses the configured sequence slot and delay', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, [], { sequenceSlot: 15, sequenceDelayMs: 0 });

      await registry.runSequence(steps, { waitForAck: true });

      expect(hub.slots.get(15)).toEqual(compileSequence(steps));
    });
  });

  describe('runTranslated', () => {
    const translator: ActionTranslator = {
      translate: (action) =>
        action === 'greet'
          ? [
              ['beep 880 200', 300],
              ['display Hi', 0],
            ]
          : null,
    };

    it('runs the translated commands as one batch', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, []);

      await registry.runTranslated(translator, 'greet', {}, { waitForAck: true });

      const expected = toSteps([
        ['beep 880 200', 300],
        ['display Hi', 0],
      ]);
      expect(hub.slots.get(18)).toEqual(compileSequence(expected));
      expect(flowStarts(hub)).toHaveLength(1);
    });

    it('rejects actions the translator does not know', async () => {
      const { session } = await connected();
      const registry = new SlotRegistry(session, []);

      await expect(registry.runTranslated(translator, 'fly')).rejects.toThrow(UnknownActionError);
    });
  });

  describe('runInteractive', () => {
    const steps: SequenceStep[] = [
      { kind: 'beep', frequency: 440, durationMs: 100 },
      { kind: 'beep', frequency: 660, durationMs: 100 },
      { kind: 'beep', frequency: 880, durationMs: 100 },
    ];

    it('waits for one signal per step', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, []);
      const onStepDone = vi.fn();

      const running = registry.runInteractive(steps, { onStepDone, timeoutMs: 500 });
      await vi.waitFor(() => expect(flowStarts(hub)).toHaveLength(1));
      hub.printConsole('DONE:0');
      hub.printConsole('DONE:1');
      hub.printConsole('DONE:2');

      await expect(running).resolves.toMatchObject({ completed: 3, total: 3 });
      expect(onStepDone.mock.calls).toEqual([[1], [2], [3]]);
      expect(flowStarts(hub)).toEqual([{ slot: 17, stop: false }]);
      expect(hub.slots.get(17)).toEqual(compileSequence(steps, { signalGapMs: 1000 }));
    });

    it('stops at the first missing signal', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, [], { interactiveGapMs: 200 });

      const running = registry.runInteractive(steps, { timeoutMs: 30 });
      await vi.waitFor(() => expect(flowStarts(hub)).toHaveLength(1));
      hub.printConsole('DONE:0');

      await expect(running).resolves.toMatchObject({ completed: 1, total: 3 });
    });

    it('counts each step once when the batch has a signal step', async () => {
      const { hub, session } = await connected();
      const registry = new SlotRegistry(session, []);
      const onStepDone = vi.fn();
      const mixed: SequenceStep[] = [
        { kind: 'beep', frequency: 440, durationMs: 100 },
        { kind: 'signal' },
        { kind: 'beep', frequency: 660, durationMs: 100 },
      ];

      const running = registry.runInteractive(mixed, { onStepDone, timeoutMs: 50 });
      await vi.waitFor(() => expect(flowStarts(hub)).toHaveLength(1));
      hub.printConsole('DONE:0');
      hub.printConsole('DONE:1');
      hub.printConsole('DONE:1');

      await expect(running).resolves.toMatchObject({ completed: 2, total: 3 });
      expect(onStepDone.mock.calls).toEqual([[1], [2]]);
      const uploaded = new TextDecoder().decode(hub.slots.get(17));
      expect(uploaded.match(/DONE:1/g)).toHaveLength(1);
    });

    it('ignores signals printed by another hub', async () => {
      const first = await connected();
      const secondHub = new FakeHub();
      const second = new HubSession({ transport: secondHub, deviceId: 'other-hub' });
      await second.connect();
      const shared = new SignalQueue();
      shared.attach(first.session);
      shared.attach(second);
      const registry = new SlotRegistry(first.session, []);

      const running = registry.runInteractive(steps.slice(0, 1), { timeoutMs: 50 });
      await vi.waitFor(() => expect(flowStarts(first.hub)).toHaveLength(1));
      secondHub.printConsole('DONE:0');

      await expect(running).resolves.toMatchObject({ completed: 0, total: 1 });
      expect(shared.tryTake()).toMatchObject({ sourceDeviceId: 'other-hub', sequenceNumber: 0 });
    });
  });
});
