import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { DAY_MS, type ConversationStore } from './types.js';

type ConversationRetentionSchedulerOptions = {
  store: ConversationStore;
  /** Conversations idle longer than this are removed; 0 disables the scheduler. */
  maxAgeDays: number;
  intervalMinutes: number;
  logger?: RuntimeLogger;
  nowMs?: () => number;
};

export type ConversationRetentionStatus = {
  enabled: boolean;
  running: boolean;
  totalRuns: number;
  totalExpired: number;
  lastRunFinishedAtMs: number | null;
  lastError: string | null;
};

export type ConversationRetentionScheduler = {
  isEnabled: () => boolean;
  runNow: () => Promise<number>;
  start: () => void;
  stop: () => void;
  getStatus: () => ConversationRetentionStatus;
};

export function createConversationRetentionScheduler(
  options: ConversationRetentionSchedulerOptions,
): ConversationRetentionScheduler {
  const enabled =
    Number.isFinite(options.maxAgeDays) &&
    options.maxAgeDays > 0 &&
    Number.isFinite(options.intervalMinutes) &&
    options.intervalMinutes > 0;
  const maxIdleMs = options.maxAgeDays * DAY_MS;
  const nowMs = options.nowMs ?? (() => Date.now());

  let intervalHandle: NodeJS.Timeout | null = null;
  let inFlight: Promise<number> | null = null;

  const status: ConversationRetentionStatus = {
    enabled,
    running: false,
    totalRuns: 0,
    totalExpired: 0,
    lastRunFinishedAtMs: null,
    lastError: null,
  };

  const executeRun = async (): Promise<number> => {
    status.running = true;
    status.totalRuns += 1;
    try {
      const expired = await options.store.expireIdle(maxIdleMs);
      status.totalExpired += expired;
      status.lastError = null;
      return expired;
    } catch (err) {
      status.lastError = err instanceof Error ? err.message : String(err);
      options.logger?.error('conversation retention run failed', { error: serializeError(err) });
      return 0;
    } finally {
      status.running = false;
      status.lastRunFinishedAtMs = nowMs();
    }
  };

  // Overlapping triggers share the run already in progress.
  const runNow = async (): Promise<number> => {
    if (!enabled) return 0;
    if (inFlight) return inFlight;

    inFlight = executeRun().finally(() => {
      inFlight = null;
    });
    return inFlight;
  };

  const start = () => {
    if (!enabled || intervalHandle) return;

    void runNow();
    intervalHandle = setInterval(() => {
      void runNow();
    }, options.intervalMinutes * 60 * 1000);
    intervalHandle.unref?.();

    options.logger?.info('conversation retention started', {
      maxAgeDays: options.maxAgeDays,
      intervalMinutes: options.intervalMinutes,
    });
  };

  const stop = () => {
    if (!intervalHandle) return;
    clearInterval(intervalHandle);
    intervalHandle = null;
  };

  return {
    isEnabled: () => enabled,
    runNow,
    start,
    stop,
    getStatus: () => ({ ...status }),
  };
}
