import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockSchedule } = vi.hoisted(() => ({
  mockSchedule: vi.fn(),
}));

// Mock node-cron
vi.mock('node-cron', () => ({
  default: { schedule: mockSchedule },
}));

import { start_session_sweeper, sweep_once } from '../src/scheduler.js';

function fake_engine(sweep: (max_idle_ms: number) => string[]) {
  return { sweep_idle_sessions: vi.fn(sweep) };
}

beforeEach(() => {
  mockSchedule.mockReset();
  mockSchedule.mockReturnValue({ stop: vi.fn() });
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('start_session_sweeper', () => {
  it('should not schedule anything when sweeping is disabled', () => {
    const engine = fake_engine(() => []);
    expect(start_session_sweeper(engine, 0)).toBeNull();
    expect(start_session_sweeper(engine, -5)).toBeNull();
    expect(mockSchedule).not.toHaveBeenCalled();
  });

  it('should sweep every minute with the idle limit in milliseconds', () => {
    const engine = fake_engine(() => ['tg:1']);

    const task = start_session_sweeper(engine, 30);

    expect(task).not.toBeNull();
    expect(mockSchedule).toHaveBeenCalledTimes(1);
    const [expression, tick] = mockSchedule.mock.calls[0];
    expect(expression).toBe('* * * * *');
    tick();
    expect(engine.sweep_idle_sessions).toHaveBeenCalledWith(1_800_000);
  });
});

describe('sweep_once', () => {
  it('should report how many sessions were removed', () => {
    expect(sweep_once(fake_engine(() => ['a', 'b']), 1000)).toBe(2);
  });

  it('should log and swallow a failing sweep', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('database is closed');

    const removed = sweep_once(fake_engine(() => {
      throw failure;
    }), 1000);

    expect(removed).toBe(0);
    expect(error).toHaveBeenCalledWith('[scheduler] Idle sweep failed:', failure);
  });
});
