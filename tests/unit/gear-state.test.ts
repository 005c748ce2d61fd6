import { describe, it, expect } from 'vitest';
import { GearState, chainringCogFor } from '../../src/gear-state.js';
import type { GearTable } from '../../src/types.js';

const gears = { totalGears: 24, currentGear: 12, minGear: 1, maxGear: 24 };

describe('GearState', () => {
  it('should start at the configured gear', () => {
    const state = new GearState(gears);
    expect(state.currentGear).toBe(12);
  });

  it('should shift up and down by one gear', () => {
    const state = new GearState(gears);

    expect(state.shift('up')).toBe(13);
    expect(state.shift('up')).toBe(14);
    expect(state.shift('down')).toBe(13);
    expect(state.currentGear).toBe(13);
  });

  it('should saturate at max gear on repeated up shifts', () => {
    const state = new GearState({ ...gears, currentGear: 23 });

    expect(state.shift('up')).toBe(24);
    for (let i = 0; i < 5; i++) {
      expect(state.shift('up')).toBe(24);
    }
    expect(state.isAtLimit('up')).toBe(true);
  });

  it('should saturate at min gear on repeated down shifts', () => {
    const state = new GearState({ ...gears, currentGear: 2 });

    expect(state.shift('down')).toBe(1);
    for (let i = 0; i < 5; i++) {
      expect(state.shift('down')).toBe(1);
    }
    expect(state.isAtLimit('down')).toBe(true);
    expect(state.isAtLimit('up')).toBe(false);
  });

  it('should respect a narrowed gear range', () => {
    const state = new GearState({ totalGears: 24, currentGear: 6, minGear: 5, maxGear: 7 });

    expect(state.shift('down')).toBe(5);
    expect(state.shift('down')).toBe(5);
    expect(state.shift('up')).toBe(6);
    expect(state.shift('up')).toBe(7);
    expect(state.shift('up')).toBe(7);
  });

  it('should display the plain gear number without a gear table', () => {
    const state = new GearState(gears);
    expect(state.display()).toBe('12');
  });

  describe('gear table display', () => {
    const table: GearTable = {
      chainrings: [39, 53],
      cassette: [28, 25, 23, 21, 19, 17, 15, 14, 13, 12, 11, 11]
    };

    it('should show the chainring-cog pair for the current gear', () => {
      const state = new GearState({ ...gears, currentGear: 1 }, table);
      expect(state.display()).toBe('1 (39-28)');

      state.shift('up');
      expect(state.display()).toBe('2 (39-25)');
    });

    it('should move to the next chainring after the last cog', () => {
      const state = new GearState({ ...gears, currentGear: 12 }, table);
      expect(state.display()).toBe('12 (39-11)');

      state.shift('up');
      expect(state.display()).toBe('13 (53-28)');
    });

    it('should fall back to the gear number beyond the table', () => {
      const small: GearTable = { chainrings: [34], cassette: [32, 28] };
      const state = new GearState({ totalGears: 4, currentGear: 3, minGear: 1, maxGear: 4 }, small);
      expect(state.display()).toBe('3');
    });

    it('should map gears to chainring and cog', () => {
      expect(chainringCogFor(24, table)).toEqual({ chainring: 53, cog: 11 });
      expect(chainringCogFor(0, table)).toBeNull();
      expect(chainringCogFor(25, table)).toBeNull();
    });
  });
});
