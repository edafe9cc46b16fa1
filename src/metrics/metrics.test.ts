import { describe, it, expect } from 'vitest';
import { MetricsWindow } from './metrics-window.js';
import { MetricsTracker } from './metrics-tracker.js';

describe('MetricsWindow', () => {
  it('evicts the oldest sample once full', () => {
    const window = new MetricsWindow(3);
    [1, 2, 3, 4, 5].forEach(v => window.push(v));

    expect(window.size).toBe(3);
    expect(window.values()).toEqual([3, 4, 5]);
    expect(window.mean()).toBe(4);
    expect(window.min()).toBe(3);
    expect(window.max()).toBe(5);
  });

  it('never grows past its capacity', () => {
    const window = new MetricsWindow(30);
    for (let i = 0; i < 1000; i++) window.push(i);

    expect(window.size).toBe(30);
    expect(window.values()[0]).toBe(970);
  });

  it('reports zero when empty', () => {
    const window = new MetricsWindow(5);

    expect(window.mean()).toBe(0);
    expect(window.max()).toBe(0);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new MetricsWindow(0)).toThrow(RangeError);
  });
});

describe('MetricsTracker', () => {
  it('reports 0 FPS before two arrivals', () => {
    const tracker = new MetricsTracker(30);
    expect(tracker.currentFps()).toBe(0);

    tracker.recordArrival(100);
    expect(tracker.currentFps()).toBe(0);
  });

  it.each([1 / 30, 0.1, 0.5])('reports 1/Δ for a fixed interval of %f s', (delta) => {
    const tracker = new MetricsTracker(30);
    for (let i = 0; i < 50; i++) {
      tracker.recordArrival(1000 + i * delta);
    }

    expect(tracker.currentFps()).toBeCloseTo(1 / delta, 6);
  });

  it('follows a rate change once the window has turned over', () => {
    const tracker = new MetricsTracker(5);
    let t = 0;
    for (let i = 0; i < 10; i++) tracker.recordArrival((t += 0.1));
    for (let i = 0; i < 5; i++) tracker.recordArrival((t += 0.05));

    expect(tracker.currentFps()).toBeCloseTo(20, 6);
  });

  it('measures latency as now minus capture time', () => {
    const tracker = new MetricsTracker();

    expect(tracker.latency(10, 10)).toBe(0);
    expect(tracker.latency(10, 10.25)).toBe(0.25);
  });

  it('grows latency monotonically with now', () => {
    const tracker = new MetricsTracker();
    let previous = -Infinity;
    for (let now = 50; now < 60; now += 0.5) {
      const value = tracker.latency(50, now);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeGreaterThan(previous);
      previous = value;
    }
  });

  it('keeps latency per stream in the snapshot', () => {
    const tracker = new MetricsTracker(10);
    tracker.recordLatency('ego_view', 10, 10.5);
    tracker.recordLatency('ego_view', 11, 11.25);
    tracker.recordLatency('head', 11, 11.125);
    tracker.recordTimeout();
    tracker.recordDrop();

    const snapshot = tracker.snapshot();

    expect(snapshot.latency.ego_view).toEqual({ lastMs: 250, meanMs: 375, maxMs: 500 });
    expect(snapshot.latency.head).toEqual({ lastMs: 125, meanMs: 125, maxMs: 125 });
    expect(snapshot.timeouts).toBe(1);
    expect(snapshot.drops).toBe(1);
    expect(snapshot.misses).toBe(0);
  });
});
