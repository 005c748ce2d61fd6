import type {
  GearRange,
  ResistanceConfiguration,
  SimulationCommand,
  SimulationConfiguration,
  TrainerCommand,
  TrainerMapping
} from './types.js';
import { clamp } from './utils.js';

// Linear in the offset from the lowest gear, so minGear always maps to the base value.
function linearOffset(gear: number, minGear: number, config: ResistanceConfiguration): number {
  return config.baseResistancePercent + (gear - minGear) * config.resistancePerGear;
}

export function resistanceFor(gear: number, minGear: number, config: ResistanceConfiguration): number {
  return clamp(
    linearOffset(gear, minGear, config),
    config.minResistancePercent,
    config.maxResistancePercent
  );
}

/**
 * ERG mode: the same linear value, read as watts on top of the base power.
 */
export function targetPowerFor(gear: number, minGear: number, config: ResistanceConfiguration): number {
  return clamp(
    Math.round(config.ergBasePowerWatts + linearOffset(gear, minGear, config)),
    config.ergMinPowerWatts,
    config.ergMaxPowerWatts
  );
}

/**
 * Simulation mode: grade in percent, zero at the middle of the gear range.
 * Gears above the middle climb, gears below descend.
 */
export function gradeFor(gear: number, range: GearRange, config: SimulationConfiguration): number {
  const middle = (range.minGear + range.maxGear) / 2;
  return clamp((gear - middle) * config.gradePerGearPercent, -config.maxGradePercent, config.maxGradePercent);
}

export function simulationCommand(gradePercent: number, config: SimulationConfiguration): SimulationCommand {
  return {
    kind: 'simulation',
    gradePercent,
    windSpeedMps: config.windSpeedMps,
    rollingResistance: config.rollingResistance,
    windResistance: config.windResistance
  };
}

export function commandFor(gear: number, range: GearRange, mapping: TrainerMapping): TrainerCommand {
  switch (mapping.mode) {
    case 'simulation':
      return simulationCommand(gradeFor(gear, range, mapping.simulation), mapping.simulation);
    case 'erg':
      return { kind: 'power', watts: targetPowerFor(gear, range.minGear, mapping.resistance) };
    case 'resistance':
      return { kind: 'resistance', percent: resistanceFor(gear, range.minGear, mapping.resistance) };
  }
}

export function describeCommand(command: TrainerCommand): string {
  switch (command.kind) {
    case 'power':
      return `${command.watts} W target`;
    case 'resistance':
      return `${command.percent.toFixed(1)}% resistance`;
    case 'simulation':
      return `${command.gradePercent > 0 ? '+' : ''}${command.gradePercent.toFixed(1)}% grade`;
  }
}
