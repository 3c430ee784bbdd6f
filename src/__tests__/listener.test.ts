import { describe, it, beforeEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { setImmediate as settle } from 'node:timers/promises';
import { StateListener } from '../listener';
import { OnAirDisplay } from '../display/on-air-display';
import { EmulatedIndicator } from '../indicators/emulated-indicator';
import { LoopbackTransport } from '../transport/loopback-transport';
import { IncomingMessage } from '../transport/transport';

const instant = async (): Promise<void> => {};

const NOW = 1_700_000_000_000;

function message(body: string, receivedAt = NOW): IncomingMessage {
  return { data: Buffer.from(body, 'utf-8'), receivedAt };
}

describe('StateListener', () => {
  let light: EmulatedIndicator;
  let display: OnAirDisplay;
  let listener: StateListener;

  beforeEach(() => {
    light = new EmulatedIndicator();
    display = new OnAirDisplay({ device: light, sleep: instant });
    listener = new StateListener({ display });
  });

  // --- Outcomes ---

  describe('handleMessage', () => {
    it('should apply a valid message that changes the state', async () => {
      const outcome = await listener.handleMessage(
        message(`{"source":"A","audio":true,"video":false,"sentAt":${NOW - 500}}`),
      );
      assert.equal(outcome, 'applied');
      assert.deepEqual(light.color, [0, 0, 255]);
    });

    it('should report a duplicate delivery as unchanged', async () => {
      const body = `{"source":"A","audio":true,"video":false,"sentAt":${NOW}}`;
      await listener.handleMessage(message(body));
      const outcome = await listener.handleMessage(message(body));
      assert.equal(outcome, 'unchanged');
      assert.equal(light.commandLog.length, 7);
    });

    it('should drop a message that is not JSON', async () => {
      assert.equal(await listener.handleMessage(message('{oops')), 'invalid');
      assert.deepEqual(light.commandLog, []);
    });

    it('should drop a message with wrong field types', async () => {
      assert.equal(
        await listener.handleMessage(message('{"source":"A","audio":1,"video":false}')),
        'invalid',
      );
    });

    it('should apply a message without a timestamp', async () => {
      assert.equal(
        await listener.handleMessage(message('{"source":"A","audio":false,"video":true}')),
        'applied',
      );
    });

    it('should ignore unknown extra fields', async () => {
      assert.equal(
        await listener.handleMessage(message('{"source":"A","audio":false,"video":true,"room":"lab"}')),
        'applied',
      );
    });
  });

  // --- Staleness ---

  describe('staleness', () => {
    it('should discard a message older than the window', async () => {
      const outcome = await listener.handleMessage(
        message(`{"source":"A","audio":true,"video":false,"sentAt":${NOW - 60_001}}`),
      );
      assert.equal(outcome, 'stale');
      assert.deepEqual(light.commandLog, []);
    });

    it('should accept a message exactly at the window edge', async () => {
      const outcome = await listener.handleMessage(
        message(`{"source":"A","audio":true,"video":false,"sentAt":${NOW - 60_000}}`),
      );
      assert.equal(outcome, 'applied');
    });

    it('should use a configured window', async () => {
      const strict = new StateListener({ display, staleAfterMs: 1000 });
      const outcome = await strict.handleMessage(
        message(`{"source":"A","audio":true,"video":false,"sentAt":${NOW - 1001}}`),
      );
      assert.equal(outcome, 'stale');
    });
  });

  // --- Stats ---

  it('should count outcomes', async () => {
    await listener.handleMessage(message('{"source":"A","audio":true,"video":false}'));
    await listener.handleMessage(message('{"source":"A","audio":true,"video":false}'));
    await listener.handleMessage(message('garbage'));
    await listener.handleMessage(message(`{"source":"B","audio":true,"video":false,"sentAt":1}`));
    assert.deepEqual(listener.stats, { applied: 1, unchanged: 1, stale: 1, invalid: 1 });
  });

  // --- Transport wiring ---

  describe('listen', () => {
    it('should feed messages from the transport into the display', async () => {
      const transport = new LoopbackTransport();
      await listener.listen(transport);

      transport.inject('{"source":"A","audio":false,"video":true}');
      await display.drain();
      await settle();

      assert.equal(display.machine.heldColor, 'video');
      assert.equal(listener.stats.applied, 1);
    });

    it('should turn the light off and close the transport on close', async () => {
      const transport = new LoopbackTransport();
      await listener.listen(transport);
      transport.inject('{"source":"A","audio":true,"video":false}');
      await display.drain();
      light.clearLog();

      await listener.close();
      await listener.close();

      assert.deepEqual(light.commandLog, [{ action: 'off' }]);
      await assert.rejects(transport.publish('{}'), /closed/);
    });
  });
});
