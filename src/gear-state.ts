import type { GearConfiguration, GearTable, ShiftDirection } from './types.js';

/**
 * Virtual gear position. Shifts saturate at the configured bounds: a shift
 * past either end leaves the gear where it is.
 */
export class GearState {
  private current: number;
  readonly minGear: number;
  readonly maxGear: number;

  constructor(config: GearConfiguration, private readonly gearTable?: GearTable) {
    this.minGear = config.minGear;
    this.maxGear = config.maxGear;
    this.current = Math.min(Math.max(config.currentGear, config.minGear), config.maxGear);
  }

  get currentGear(): number {
    return this.current;
  }

  shift(direction: ShiftDirection): number {
    this.current = direction === 'up'
      ? Math.min(this.current + 1, this.maxGear)
      : Math.max(this.current - 1, this.minGear);
    return this.current;
  }

  isAtLimit(direction: ShiftDirection): boolean {
    return direction === 'up' ? this.current === this.maxGear : this.current === this.minGear;
  }

  /**
   * Gear number for rider feedback, with the chainring-cog pair when a gear
   * table was supplied and covers the current gear.
   */
  display(): string {
    const combo = this.gearTable ? chainringCogFor(this.current, this.gearTable) : null;
    return combo ? `${this.current} (${combo.chainring}-${combo.cog})` : String(this.current);
  }
}

export function chainringCogFor(
  gear: number,
  table: GearTable
): { chainring: number; cog: number } | null {
  const cogCount = table.cassette.length;
  const ringIndex = Math.floor((gear - 1) / cogCount);
  const cogIndex = (gear - 1) % cogCount;

  if (gear < 1 || ringIndex >= table.chainrings.length) {
    return null;
  }
  return { chainring: table.chainrings[ringIndex], cog: table.cassette[cogIndex] };
}
