/**
 * Progress broadcaster tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ProgressBroadcaster } from '../src/integrations/orchestration/progress-broadcaster.js';
import type { RunEvent } from '../src/integrations/orchestration/run-events.js';
import { formatRunEvent, isTerminalEvent } from '../src/integrations/orchestration/run-events.js';

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

describe('ProgressBroadcaster', () => {
  it('stamps increasing sequence numbers and a timestamp', () => {
    const broadcaster = new ProgressBroadcaster({ now: fixedNow });
    const a = broadcaster.publish({ type: 'run_started', runId: 'r1' });
    const b = broadcaster.publish({ type: 'run_started', runId: 'r2' });

    expect(a.seq).toBe(1);
    expect(b.seq).toBe(2);
    expect(a.timestamp).toBe('2026-01-02T03:04:05.000Z');
  });

  it('delivers events to a subscriber in publish order', async () => {
    const broadcaster = new ProgressBroadcaster();
    const sub = broadcaster.subscribe();

    broadcaster.publish({ type: 'run_started', runId: 'r1' });
    broadcaster.publish({ type: 'agent_started', runId: 'r1', agentId: 'a' });
    broadcaster.publish({ type: 'agent_completed', runId: 'r1', agentId: 'a' });

    const types = [(await sub.next())?.type, (await sub.next())?.type, (await sub.next())?.type];
    expect(types).toEqual(['run_started', 'agent_started', 'agent_completed']);
  });

  it('filters by run id', async () => {
    const broadcaster = new ProgressBroadcaster();
    const sub = broadcaster.subscribe({ runId: 'r2' });

    broadcaster.publish({ type: 'run_started', runId: 'r1' });
    broadcaster.publish({ type: 'run_started', runId: 'r2' });

    const event = await sub.next();
    expect(event?.runId).toBe('r2');
    expect(event?.seq).toBe(2);
  });

  it('hands an event straight to a waiting reader', async () => {
    const broadcaster = new ProgressBroadcaster();
    const sub = broadcaster.subscribe();

    const pending = sub.next();
    broadcaster.publish({ type: 'run_started', runId: 'r1' });

    expect((await pending)?.type).toBe('run_started');
  });

  it('drops the oldest events when a subscriber falls behind', async () => {
    const broadcaster = new ProgressBroadcaster({ bufferSize: 2 });
    const slow = broadcaster.subscribe();

    for (let i = 0; i < 5; i++) {
      broadcaster.publish({ type: 'agent_started', runId: 'r1', agentId: `a${i}` });
    }

    expect(slow.dropped).toBe(3);
    expect((await slow.next())?.agentId).toBe('a3');
    expect((await slow.next())?.agentId).toBe('a4');
    expect(broadcaster.stats().dropped).toBe(3);
  });

  it('iterates until closed', async () => {
    const broadcaster = new ProgressBroadcaster();
    const sub = broadcaster.subscribe();
    broadcaster.publish({ type: 'run_started', runId: 'r1' });
    broadcaster.publish({ type: 'run_completed', runId: 'r1' });
    broadcaster.close();

    const seen: RunEvent[] = [];
    for await (const event of sub) {
      seen.push(event);
    }
    expect(seen.map((e) => e.type)).toEqual(['run_started', 'run_completed']);
    expect(sub.closed).toBe(true);
  });

  it('resolves a pending read with undefined on close', async () => {
    const broadcaster = new ProgressBroadcaster();
    const sub = broadcaster.subscribe();
    const pending = sub.next();
    sub.close();
    expect(await pending).toBeUndefined();
    expect(broadcaster.stats().subscribers).toBe(0);
  });

  it('keeps publishing when a listener throws', () => {
    const broadcaster = new ProgressBroadcaster();
    const good = vi.fn();
    broadcaster.on(() => {
      throw new Error('bad listener');
    });
    broadcaster.on(good);

    broadcaster.publish({ type: 'run_started', runId: 'r1' });
    expect(good).toHaveBeenCalledTimes(1);
  });

  it('stops calling a listener after unsubscribe', () => {
    const broadcaster = new ProgressBroadcaster();
    const listener = vi.fn();
    const off = broadcaster.on(listener);
    off();
    broadcaster.publish({ type: 'run_started', runId: 'r1' });
    expect(listener).not.toHaveBeenCalled();
  });

  it('hands a closed subscription to late subscribers after close', async () => {
    const broadcaster = new ProgressBroadcaster();
    broadcaster.close();
    const sub = broadcaster.subscribe();
    expect(sub.closed).toBe(true);
    expect(await sub.next()).toBeUndefined();
  });
});

describe('run events', () => {
  it('recognises terminal events', () => {
    expect(isTerminalEvent({ type: 'run_completed' })).toBe(true);
    expect(isTerminalEvent({ type: 'run_cancelled' })).toBe(true);
    expect(isTerminalEvent({ type: 'agent_failed' })).toBe(false);
  });

  it('formats an event as one line', () => {
    const line = formatRunEvent({
      type: 'agent_failed',
      runId: 'r1',
      agentId: 'trend_analysis',
      seq: 7,
      timestamp: '2026-01-02T03:04:05.000Z',
      error: { category: 'timeout', message: 'too slow' },
    });
    expect(line).toBe('Agent trend_analysis failed [timeout]: too slow');
  });
});
