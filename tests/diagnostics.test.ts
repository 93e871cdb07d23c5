import { describe, expect, it } from 'vitest';
import { TeleinfoMode } from '../src/constants/constants.js';
import { TeleinfoRecord } from '../src/record/teleinfo-record.js';
import { Diagnostics } from '../src/utils/diagnostics.js';

const valid = new TeleinfoRecord(TeleinfoMode.Legacy, [], true);
const invalid = new TeleinfoRecord(TeleinfoMode.Standard, [], false);

describe('Diagnostics', () => {
  it('starts empty', () => {
    const stats = new Diagnostics().getStats();
    expect(stats.totalFrames).toBe(0);
    expect(stats.invalidRate).toBe(0);
    expect(stats.averageDecodeTime).toBeNull();
    expect(stats.framesByMode).toEqual({ legacy: 0, standard: 0 });
    expect(stats.lastFrameTimestamp).toBeNull();
  });

  it('counts frames, modes and decode times', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordFrame(valid, 100);
    diagnostics.recordFrame(valid, 300);
    diagnostics.recordFrame(invalid, 200);
    diagnostics.recordBytesReceived(120);
    diagnostics.recordBytesReceived(80);

    const stats = diagnostics.getStats();
    expect(stats.totalFrames).toBe(3);
    expect(stats.validFrames).toBe(2);
    expect(stats.invalidFrames).toBe(1);
    expect(stats.framesByMode).toEqual({ legacy: 2, standard: 1 });
    expect(stats.averageDecodeTime).toBe(200);
    expect(stats.minDecodeTime).toBe(100);
    expect(stats.maxDecodeTime).toBe(300);
    expect(stats.bytesReceived).toBe(200);
    expect(stats.lastFrameTimestamp).not.toBeNull();
  });

  it('keeps the last error message', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordParseError('bad frame');
    diagnostics.recordTransportError('port closed');
    diagnostics.recordTimeout();

    const stats = diagnostics.getStats();
    expect(stats.parseErrors).toBe(1);
    expect(stats.transportErrors).toBe(1);
    expect(stats.timeouts).toBe(1);
    expect(stats.lastErrorMessage).toBe('port closed');
  });

  it('warns when the invalid rate exceeds the threshold', () => {
    const diagnostics = new Diagnostics({ invalidRateThreshold: 40 });
    diagnostics.recordFrame(valid, 10);
    diagnostics.recordFrame(invalid, 10);

    const result = diagnostics.analyze();
    expect(result.isHealthy).toBe(false);
    expect(result.warnings).toEqual(['High invalid frame rate: 50.00% (threshold: 40%)']);
  });

  it('warns on repeated timeouts', () => {
    const diagnostics = new Diagnostics({ notificationThreshold: 1 });
    diagnostics.recordTimeout();
    expect(diagnostics.analyze().isHealthy).toBe(true);
    diagnostics.recordTimeout();
    expect(diagnostics.analyze().warnings).toEqual(['High timeout count: 2']);
  });

  it('resets its counters', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordFrame(invalid, 5);
    diagnostics.recordParseError('x');
    diagnostics.reset();

    const stats = diagnostics.getStats();
    expect(stats.totalFrames).toBe(0);
    expect(stats.parseErrors).toBe(0);
    expect(stats.lastErrorMessage).toBeNull();
    expect(JSON.parse(diagnostics.serialize())).toMatchObject({ totalFrames: 0 });
  });
});
