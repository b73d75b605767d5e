import { describe, it, expect } from 'vitest';
import { CLILogger, formatDuration, type LogSink } from './logger.js';
import type { LogLevel } from '../../core/utils/logger.js';

function capture(): LogSink & { lines: Array<[LogLevel, string]> } {
  const lines: Array<[LogLevel, string]> = [];
  return {
    lines,
    write(level, line) {
      lines.push([level, line]);
    },
  };
}

function stepClock(start: number, step: number): () => number {
  let now = start - step;
  return () => {
    now += step;
    return now;
  };
}

const START = Date.parse('2025-11-10T06:00:00.000Z');

describe('CLILogger', () => {
  it('should write JSON lines with service and command context', () => {
    const sink = capture();
    const logger = new CLILogger({ level: 'info', json: true }, sink, () => START);

    logger.setCommand('update');
    logger.warn('ATL: no schools available', { region: 'ATL' });

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]?.[0]).toBe('warn');
    expect(JSON.parse(sink.lines[0]?.[1] ?? '')).toEqual({
      timestamp: '2025-11-10T06:00:00.000Z',
      level: 'warn',
      message: 'ATL: no schools available',
      service: 'storm-impact',
      command: 'update',
      region: 'ATL',
    });
  });

  it('should drop entries below the configured level', () => {
    const sink = capture();
    const logger = new CLILogger({ level: 'warn', json: true }, sink, () => START);

    logger.debug('debug');
    logger.info('info');
    logger.error('error');

    expect(sink.lines.map(([level]) => level)).toEqual(['error']);
  });

  it('should report command duration on completion', () => {
    const sink = capture();
    // constructor, setCommand, commandStart timestamp, elapsed, end timestamp
    const logger = new CLILogger({ level: 'info', json: true }, sink, stepClock(START, 250));

    logger.commandStart('run');
    logger.commandEnd(false, { regions: 2 });

    const end = JSON.parse(sink.lines[1]?.[1] ?? '');
    expect(sink.lines[1]?.[0]).toBe('error');
    expect(end.message).toBe('Command failed');
    expect(end.duration_ms).toBe(500);
    expect(end.regions).toBe(2);
  });

  it('should render human lines with the message and metadata', () => {
    const sink = capture();
    const logger = new CLILogger({ level: 'info', json: false }, sink, () => START);

    logger.info('Region ready', { region: 'ATL' });

    expect(sink.lines[0]?.[1]).toBe(
      '\x1b[2m2025-11-10T06:00:00.000Z\x1b[0m \x1b[34mINFO \x1b[0m Region ready \x1b[2m(\x1b[36mregion\x1b[0m=ATL)\x1b[0m'
    );
  });
});
