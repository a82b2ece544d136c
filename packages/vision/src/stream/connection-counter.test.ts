/**
 * ConnectionCounter Tests
 */
import { describe, it, expect } from 'vitest';
import { ConnectionCounter } from './connection-counter.js';

describe('ConnectionCounter', () => {
  it('should track the active count and its peak', () => {
    const counter = new ConnectionCounter();

    expect(counter.increment()).toBe(1);
    expect(counter.increment()).toBe(2);
    expect(counter.decrement()).toBe(1);
    expect(counter.increment()).toBe(2);
    expect(counter.increment()).toBe(3);

    expect(counter.value).toBe(3);
    expect(counter.peakValue).toBe(3);
  });

  it('should never go below zero', () => {
    const counter = new ConnectionCounter();

    expect(counter.decrement()).toBe(0);
    counter.increment();
    counter.decrement();
    counter.decrement();

    expect(counter.value).toBe(0);
  });

  it('should return to zero after interleaved connects and disconnects', async () => {
    const counter = new ConnectionCounter();
    const sessions = Array.from({ length: 50 }, async (_, i) => {
      counter.increment();
      await new Promise((resolve) => setTimeout(resolve, i % 5));
      counter.decrement();
    });

    await Promise.all(sessions);

    expect(counter.value).toBe(0);
    expect(counter.peakValue).toBe(50);
  });
});
