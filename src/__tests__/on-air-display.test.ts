import { describe, it, beforeEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { setImmediate as nextTick } from 'node:timers/promises';
import { OnAirDisplay } from '../display/on-air-display';
import { EmulatedIndicator, EmulatedCommand } from '../indicators/emulated-indicator';
import { InvalidPayloadError } from '../errors';

const instant = async (): Promise<void> => {};

const RED: EmulatedCommand = { action: 'set', rgb: [255, 0, 0] };
const BLUE: EmulatedCommand = { action: 'set', rgb: [0, 0, 255] };
const GREEN: EmulatedCommand = { action: 'set', rgb: [0, 255, 0] };
const OFF: EmulatedCommand = { action: 'off' };

describe('OnAirDisplay', () => {
  let light: EmulatedIndicator;
  let display: OnAirDisplay;

  beforeEach(() => {
    light = new EmulatedIndicator();
    display = new OnAirDisplay({ device: light, sleep: instant });
  });

  // --- End-to-end scenarios ---

  describe('scenarios', () => {
    it('cold start with no sources leaves the light untouched', () => {
      assert.deepEqual(display.aggregator.state, { audio: false, video: false });
      assert.equal(display.machine.heldColor, 'off');
      assert.deepEqual(light.commandLog, []);
    });

    it('cold start with an explicit all-false message has no display effect', async () => {
      const update = await display.update({ source: 'A', audio: false, video: false });
      assert.equal(update.changed, null);
      assert.deepEqual(update.commands, []);
      assert.deepEqual(light.commandLog, []);
    });

    it('audio from A then video from B runs two sequences: audio then video', async () => {
      const first = await display.update({ source: 'A', audio: true, video: false });
      assert.deepEqual(first.changed, { audio: true, video: false });
      assert.equal(first.commands.length, 7);

      const second = await display.update({ source: 'B', audio: false, video: true });
      assert.deepEqual(second.changed, { audio: true, video: true });
      assert.equal(second.commands.length, 7);

      assert.deepEqual(light.commandLog, [
        BLUE, OFF, BLUE, OFF, BLUE, OFF, BLUE,
        RED, BLUE, RED, BLUE, RED, BLUE, RED,
      ]);
    });

    it('a single source going fully idle pulses clear and settles off', async () => {
      await display.update({ source: 'A', audio: true, video: true });
      light.clearLog();

      const update = await display.update({ source: 'A', audio: false, video: false });
      assert.deepEqual(update.changed, { audio: false, video: false });
      assert.deepEqual(light.commandLog, [GREEN, RED, GREEN, RED, GREEN, RED, OFF]);
      assert.equal(display.machine.heldColor, 'off');
    });

    it('a duplicated message triggers the display only once', async () => {
      const payload = { source: 'A', audio: true, video: false };
      await display.update(payload);
      const again = await display.update(payload);
      assert.equal(again.changed, null);
      assert.deepEqual(again.commands, []);
      assert.equal(light.commandLog.length, 7);
    });

    it('redundant updates that keep the combined state add no commands', async () => {
      await display.update({ source: 'A', audio: true, video: false });
      await display.update({ source: 'B', audio: true, video: false });
      await display.update({ source: 'C', audio: false, video: false });
      await display.update({ source: 'B', audio: false, video: false });
      assert.equal(light.commandLog.length, 7);
    });
  });

  // --- Serialization ---

  describe('serialization', () => {
    it('should finish one transition before starting the next', async () => {
      const slow = new OnAirDisplay({
        device: light,
        sleep: async () => { await nextTick(); },
      });

      const first = slow.update({ source: 'A', audio: true, video: false });
      const second = slow.update({ source: 'B', audio: false, video: true });
      assert.equal(slow.backlog, 2);

      await Promise.all([first, second]);
      const log = light.commandLog;
      assert.deepEqual(log.slice(0, 7), [BLUE, OFF, BLUE, OFF, BLUE, OFF, BLUE]);
      assert.deepEqual(log.slice(7), [RED, BLUE, RED, BLUE, RED, BLUE, RED]);
      assert.equal(slow.backlog, 0);
    });

    it('should keep processing after a malformed payload', async () => {
      const bad = display.update(JSON.parse('{"source":"","audio":true,"video":false}'));
      const good = display.update({ source: 'A', audio: true, video: false });

      await assert.rejects(bad, InvalidPayloadError);
      const update = await good;
      assert.deepEqual(update.changed, { audio: true, video: false });
    });

    it('should resolve drain once queued updates are done', async () => {
      void display.update({ source: 'A', audio: false, video: true });
      await display.drain();
      assert.equal(display.machine.heldColor, 'video');
    });
  });

  // --- Shutdown ---

  describe('close', () => {
    it('should turn the light off and be idempotent', async () => {
      await display.update({ source: 'A', audio: true, video: false });
      light.clearLog();
      display.close();
      display.close();
      assert.deepEqual(light.commandLog, [OFF]);
    });
  });
});
