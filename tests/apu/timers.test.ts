import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Timers } from '../../src/apu/timers';

describe('Timers', () => {
  it('tick at zero stays at zero', () => {
    const t = new Timers();
    t.tick();
    expect(t.getDelay()).toBe(0);
    expect(t.getSound()).toBe(0);
    expect(t.isSoundActive()).toBe(false);
  });

  it('tick decrements each non-zero timer by exactly one', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (dv, sv) => {
        const t = new Timers();
        t.setDelay(dv);
        t.setSound(sv);
        t.tick();
        expect(t.getDelay()).toBe(Math.max(0, dv - 1));
        expect(t.getSound()).toBe(Math.max(0, sv - 1));
        expect(t.isSoundActive()).toBe(sv - 1 > 0);
      })
    );
  });

  it('sound goes quiet exactly when the counter reaches zero', () => {
    const t = new Timers();
    t.setSound(2);
    expect(t.isSoundActive()).toBe(true);
    t.tick();
    expect(t.isSoundActive()).toBe(true);
    t.tick();
    expect(t.isSoundActive()).toBe(false);
  });

  it('setters clamp to a byte', () => {
    const t = new Timers();
    t.setDelay(300);
    t.setSound(-4);
    expect(t.getDelay()).toBe(255);
    expect(t.getSound()).toBe(0);
    t.setDelay(Number.NaN);
    expect(t.getDelay()).toBe(0);
  });

  it('reset zeroes both', () => {
    const t = new Timers();
    t.setDelay(5);
    t.setSound(5);
    t.reset();
    expect([t.getDelay(), t.getSound()]).toEqual([0, 0]);
  });
});
