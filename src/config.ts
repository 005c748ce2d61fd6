import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { GearConfiguration, GearTable, ResistanceConfiguration, SimulationConfiguration, TrainerMode } from './types.js';

export const DEFAULT_CONFIG_FILE = 'config.json';

const bluetoothSchema = z.object({
  kickr_name: z.string().min(1).default('KICKR'),
  click_left_name: z.string().min(1).default('Zwift Click'),
  click_right_name: z.string().min(1).default('Zwift Click'),
  scan_timeout: z.number().positive().default(10),
  write_timeout_ms: z.number().int().positive().default(3000),
  reconnect_attempts: z.number().int().min(0).default(3),
  reconnect_delay_ms: z.number().int().min(0).default(2000)
}).strict();

const gearsSchema = z.object({
  total_gears: z.number().int().default(24),
  current_gear: z.number().int().default(12),
  min_gear: z.number().int().default(1),
  max_gear: z.number().int().default(24),
  shift_smoothing_ms: z.number().int().min(0).default(100),
  max_pending_shifts: z.number().int().positive().default(32)
}).strict();

const resistanceSchema = z.object({
  base_resistance: z.number().default(0),
  resistance_per_gear: z.number().default(2.5),
  min_resistance_percent: z.number().min(0).max(100).default(0),
  max_resistance_percent: z.number().min(0).max(100).default(100),
  enable_erg_mode: z.boolean().default(false),
  erg_base_power: z.number().min(0).default(150),
  erg_min_power: z.number().int().min(0).default(0),
  erg_max_power: z.number().int().max(32767).default(1000)
}).strict();

// Grade in percent, wind in m/s, wind resistance (CW) in kg/m
const simulationSchema = z.object({
  enabled: z.boolean().default(false),
  grade_per_gear: z.number().positive().default(1),
  max_grade: z.number().positive().max(40).default(10),
  crr: z.number().min(0).max(0.0255).default(0.004),
  wind_speed: z.number().min(-32.768).max(32.767).default(0),
  wind_resistance: z.number().min(0).max(2.55).default(0)
}).strict();

const gearTableSchema = z.object({
  chainrings: z.array(z.number().int().positive()).min(1),
  cassette: z.array(z.number().int().positive()).min(1)
}).strict();

const displaySchema = z.object({
  show_gear_changes: z.boolean().default(true),
  gear_table: gearTableSchema.optional()
}).strict();

const configSchema = z.object({
  bluetooth: bluetoothSchema.default({}),
  gears: gearsSchema.default({}),
  resistance: resistanceSchema.default({}),
  simulation: simulationSchema.default({}),
  display: displaySchema.default({})
}).strict().superRefine((config, ctx) => {
  const { total_gears, current_gear, min_gear, max_gear } = config.gears;
  const issue = (pathSegments: string[], message: string) => {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: pathSegments, message });
  };

  if (total_gears < 1) {
    issue(['gears', 'total_gears'], `must be at least 1 (got ${total_gears})`);
  }
  if (min_gear < 1 || min_gear > total_gears) {
    issue(['gears', 'min_gear'], `must be within [1, ${total_gears}] (got ${min_gear})`);
  }
  if (max_gear < 1 || max_gear > total_gears) {
    issue(['gears', 'max_gear'], `must be within [1, ${total_gears}] (got ${max_gear})`);
  }
  if (min_gear > max_gear) {
    issue(['gears', 'min_gear'], `min_gear (${min_gear}) must not exceed max_gear (${max_gear})`);
  }
  if (current_gear < min_gear || current_gear > max_gear) {
    issue(['gears', 'current_gear'], `must be within [${min_gear}, ${max_gear}] (got ${current_gear})`);
  }

  const { min_resistance_percent, max_resistance_percent, erg_min_power, erg_max_power } = config.resistance;
  if (min_resistance_percent > max_resistance_percent) {
    issue(['resistance', 'min_resistance_percent'],
      `min_resistance_percent (${min_resistance_percent}) must not exceed max_resistance_percent (${max_resistance_percent})`);
  }
  if (erg_min_power > erg_max_power) {
    issue(['resistance', 'erg_min_power'],
      `erg_min_power (${erg_min_power}) must not exceed erg_max_power (${erg_max_power})`);
  }
  if (config.simulation.enabled && config.resistance.enable_erg_mode) {
    issue(['simulation', 'enabled'], 'simulation mode and ERG mode cannot both be enabled');
  }
});

export type RawConfig = z.input<typeof configSchema>;

export interface BluetoothSettings {
  trainerName: string;
  leftControllerName: string;
  rightControllerName: string;
  scanTimeoutSeconds: number;
  writeTimeoutMs: number;
  reconnectAttempts: number;
  reconnectDelayMs: number;
}

export interface AppConfig {
  bluetooth: BluetoothSettings;
  gears: GearConfiguration;
  shiftSmoothingMs: number;
  maxPendingShifts: number;
  mode: TrainerMode;
  resistance: ResistanceConfiguration;
  simulation: SimulationConfiguration;
  showGearChanges: boolean;
  gearTable?: GearTable;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a parsed configuration document and fill in defaults.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }

  const { bluetooth, gears, resistance, simulation, display } = result.data;
  return {
    bluetooth: {
      trainerName: bluetooth.kickr_name,
      leftControllerName: bluetooth.click_left_name,
      rightControllerName: bluetooth.click_right_name,
      scanTimeoutSeconds: bluetooth.scan_timeout,
      writeTimeoutMs: bluetooth.write_timeout_ms,
      reconnectAttempts: bluetooth.reconnect_attempts,
      reconnectDelayMs: bluetooth.reconnect_delay_ms
    },
    gears: {
      totalGears: gears.total_gears,
      currentGear: gears.current_gear,
      minGear: gears.min_gear,
      maxGear: gears.max_gear
    },
    shiftSmoothingMs: gears.shift_smoothing_ms,
    maxPendingShifts: gears.max_pending_shifts,
    mode: simulation.enabled ? 'simulation' : resistance.enable_erg_mode ? 'erg' : 'resistance',
    resistance: {
      baseResistancePercent: resistance.base_resistance,
      resistancePerGear: resistance.resistance_per_gear,
      minResistancePercent: resistance.min_resistance_percent,
      maxResistancePercent: resistance.max_resistance_percent,
      ergBasePowerWatts: resistance.erg_base_power,
      ergMinPowerWatts: resistance.erg_min_power,
      ergMaxPowerWatts: resistance.erg_max_power
    },
    simulation: {
      enabled: simulation.enabled,
      gradePerGearPercent: simulation.grade_per_gear,
      maxGradePercent: simulation.max_grade,
      rollingResistance: simulation.crr,
      windSpeedMps: simulation.wind_speed,
      windResistance: simulation.wind_resistance
    },
    showGearChanges: display.show_gear_changes,
    gearTable: display.gear_table
  };
}

/**
 * Load the configuration file. Without an explicit path a missing
 * config.json in the working directory means "all defaults".
 */
export function loadConfig(configPath?: string): AppConfig {
  const explicit = configPath !== undefined;
  const resolved = path.resolve(process.cwd(), configPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(resolved)) {
    if (explicit) {
      throw new ConfigurationError([`config file not found: ${resolved}`]);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError([`could not read ${resolved}: ${reason}`]);
  }
  return parseConfig(raw);
}
