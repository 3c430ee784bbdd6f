import { describe, it, before, after } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildConfig, loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('config', () => {
  // --- Defaults ---

  describe('buildConfig defaults', () => {
    it('should fill every section for an empty document', () => {
      const config = buildConfig({});
      assert.deepEqual(config.transport, {
        type: 'mqtt',
        brokerUrl: 'mqtt://localhost:1883',
        topic: 'on-air/state',
        clientId: undefined,
        qos: 1,
        reconnectPeriodMs: undefined,
      });
      assert.deepEqual(config.stream, { pollIntervalMs: 2000, sourceName: os.hostname() });
      assert.deepEqual(config.listen, { staleAfterMs: 60_000 });
      assert.deepEqual(config.indicator, { type: 'emulated' });
      assert.equal(config.display.blinkRepeat, 3);
      assert.equal(config.display.blinkDurationMs, 100);
      assert.deepEqual(config.display.palette.video, [255, 0, 0]);
    });

    it('should fill indicator defaults for the osc type', () => {
      const config = buildConfig({ indicator: { type: 'osc' } });
      assert.deepEqual(config.indicator, {
        type: 'osc',
        host: '127.0.0.1',
        port: 12000,
        address: '/light/color',
      });
    });
  });

  // --- Validation ---

  describe('validation', () => {
    it('should reject an out-of-range port with the field path', () => {
      assert.throws(
        () => buildConfig({ indicator: { type: 'osc', port: 70000 } }),
        (err: unknown) => {
          assert.ok(err instanceof ConfigError);
          assert.match(err.message, /indicator\.port/);
          return true;
        },
      );
    });

    it('should reject a wildcard topic', () => {
      assert.throws(
        () => buildConfig({ transport: { topic: 'on-air/#' } }),
        /Topic must not contain wildcards/,
      );
    });

    it('should reject an unknown indicator type', () => {
      assert.throws(() => buildConfig({ indicator: { type: 'lava-lamp' } }), ConfigError);
    });

    it('should reject palette channels above 255', () => {
      assert.throws(
        () => buildConfig({ display: { palette: { audio: [0, 0, 256] } } }),
        /display\.palette\.audio\.2/,
      );
    });
  });

  // --- Overrides ---

  describe('overrides', () => {
    it('should apply command-line overrides over the file', () => {
      const config = buildConfig(
        { stream: { sourceName: 'from-file', pollIntervalMs: 5000 }, indicator: { type: 'osc' } },
        { sourceName: 'from-cli', pollIntervalMs: 250, noIndicator: true, verbose: true },
      );
      assert.equal(config.stream.sourceName, 'from-cli');
      assert.equal(config.stream.pollIntervalMs, 250);
      assert.deepEqual(config.indicator, { type: 'none' });
      assert.equal(config.logging.level, 'debug');
    });

    it('should merge palette overrides with the defaults', () => {
      const config = buildConfig({ display: { palette: { clear: [255, 255, 255] } } });
      assert.deepEqual(config.display.palette.clear, [255, 255, 255]);
      assert.deepEqual(config.display.palette.audio, [0, 0, 255]);
    });
  });

  // --- Files ---

  describe('loadConfig', () => {
    let dir: string;

    before(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'on-air-config-'));
    });

    after(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should read a YAML file', () => {
      const file = path.join(dir, 'listen.yml');
      fs.writeFileSync(file, [
        'transport:',
        '  brokerUrl: mqtt://broker.local:1883',
        '  topic: office/on-air',
        'listen:',
        '  staleAfterMs: 30000',
        'indicator:',
        '  type: osc',
        '  host: 10.0.0.20',
        '  port: 7001',
        '',
      ].join('\n'));

      const config = loadConfig(file);
      assert.equal(config.transport.brokerUrl, 'mqtt://broker.local:1883');
      assert.equal(config.transport.topic, 'office/on-air');
      assert.equal(config.listen.staleAfterMs, 30000);
      assert.deepEqual(config.indicator, { type: 'osc', host: '10.0.0.20', port: 7001, address: '/light/color' });
    });

    it('should treat an empty file as defaults', () => {
      const file = path.join(dir, 'empty.yml');
      fs.writeFileSync(file, '');
      assert.equal(loadConfig(file).listen.staleAfterMs, 60_000);
    });

    it('should fail for an explicit path that does not exist', () => {
      assert.throws(() => loadConfig(path.join(dir, 'missing.yml')), /Config file not found/);
    });

    it('should fail for malformed YAML', () => {
      const file = path.join(dir, 'broken.yml');
      fs.writeFileSync(file, 'transport: [unclosed\n');
      assert.throws(() => loadConfig(file), /Cannot parse/);
    });
  });
});
