export type DeviceRole = 'trainer' | 'left_controller' | 'right_controller';

export type ControllerSide = 'left' | 'right';

export type ShiftDirection = 'up' | 'down';

export interface ShiftEvent {
  readonly source: ControllerSide;
  readonly direction: ShiftDirection;
  readonly timestamp: number;
}

export type TrainerMode = 'resistance' | 'erg' | 'simulation';

export interface SimulationCommand {
  kind: 'simulation';
  gradePercent: number;
  windSpeedMps: number;
  rollingResistance: number;
  windResistance: number;
}

export type TrainerCommand =
  | { kind: 'resistance'; percent: number }
  | { kind: 'power'; watts: number }
  | SimulationCommand;

export type TargetState =
  | 'unresolved'
  | 'scanning'
  | 'connected'
  | 'disconnected'
  | 'reconnecting'
  | 'terminated';

export interface GearConfiguration {
  totalGears: number;
  currentGear: number;
  minGear: number;
  maxGear: number;
}

export interface ResistanceConfiguration {
  baseResistancePercent: number;
  resistancePerGear: number;
  minResistancePercent: number;
  maxResistancePercent: number;
  ergBasePowerWatts: number;
  ergMinPowerWatts: number;
  ergMaxPowerWatts: number;
}

/**
 * Indoor bike simulation: each gear away from the middle of the range adds
 * gradePerGearPercent of grade, higher gears climbing.
 */
export interface SimulationConfiguration {
  enabled: boolean;
  gradePerGearPercent: number;
  maxGradePercent: number;
  rollingResistance: number;
  windSpeedMps: number;
  windResistance: number;
}

export interface GearRange {
  minGear: number;
  maxGear: number;
}

export interface TrainerMapping {
  mode: TrainerMode;
  resistance: ResistanceConfiguration;
  simulation: SimulationConfiguration;
}

/**
 * Cosmetic chainring/cassette lookup. Cassette is listed easiest cog first.
 */
export interface GearTable {
  chainrings: number[];
  cassette: number[];
}
