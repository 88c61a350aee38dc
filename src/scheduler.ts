import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { ConversationEngine } from './conversation.js';

type Sweepable = Pick<ConversationEngine, 'sweep_idle_sessions'>;

export function sweep_once(engine: Sweepable, idle_ms: number): number {
  try {
    return engine.sweep_idle_sessions(idle_ms).length;
  } catch (err) {
    console.error('[scheduler] Idle sweep failed:', err);
    return 0;
  }
}

/** Every minute: drop sessions idle for longer than idle_minutes. Disabled when idle_minutes <= 0. */
export function start_session_sweeper(engine: Sweepable, idle_minutes: number): ScheduledTask | null {
  if (!(idle_minutes > 0)) {
    console.log('[scheduler] Idle-session sweeping disabled');
    return null;
  }
  const idle_ms = idle_minutes * 60_000;
  const task = cron.schedule('* * * * *', () => {
    sweep_once(engine, idle_ms);
  });
  console.log(`[scheduler] Started: sweeping sessions idle for more than ${idle_minutes} minute(s)`);
  return task;
}
