/**
 * Telemetry snapshot: one instant of simulator state as written by the
 * simulator bridge into stratus_telemetry.json.
 *
 * The file is snake_case; in code the snapshot is camelCased and frozen.
 */
import { z } from "zod";

const positionSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  altitude_msl_m: z.number(),
  altitude_agl_m: z.number(),
});

const orientationSchema = z.object({
  heading_mag: z.number(),
  heading_true: z.number(),
  pitch: z.number(),
  roll: z.number(),
});

const speedSchema = z.object({
  ground_speed_mps: z.number(),
  ias_kts: z.number(),
  tas_mps: z.number(),
  vertical_speed_fpm: z.number(),
});

const radiosSchema = z.object({
  com1_hz: z.number().int(),
  com1_standby_hz: z.number().int(),
  com2_hz: z.number().int(),
  com2_standby_hz: z.number().int(),
  nav1_hz: z.number().int(),
  nav2_hz: z.number().int(),
});

const transponderSchema = z.object({
  code: z.number().int(),
  mode: z.number().int(),
});

const flightStateSchema = z.object({
  on_ground: z.boolean(),
  paused: z.boolean(),
});

export const telemetryFileSchema = z.object({
  timestamp: z.number().int(),
  simulator: z.string(),
  aircraft: z.string(),
  position: positionSchema,
  orientation: orientationSchema,
  speed: speedSchema,
  radios: radiosSchema,
  transponder: transponderSchema,
  state: flightStateSchema,
});

export type TelemetryFile = z.infer<typeof telemetryFileSchema>;

export interface TelemetrySnapshot {
  readonly timestamp: number;
  readonly simulator: string;
  readonly aircraft: string;
  readonly position: {
    readonly latitude: number;
    readonly longitude: number;
    readonly altitudeMslM: number;
    readonly altitudeAglM: number;
  };
  readonly orientation: {
    readonly headingMag: number;
    readonly headingTrue: number;
    readonly pitch: number;
    readonly roll: number;
  };
  readonly speed: {
    readonly groundSpeedMps: number;
    readonly iasKts: number;
    readonly tasMps: number;
    readonly verticalSpeedFpm: number;
  };
  readonly radios: {
    readonly com1Hz: number;
    readonly com1StandbyHz: number;
    readonly com2Hz: number;
    readonly com2StandbyHz: number;
    readonly nav1Hz: number;
    readonly nav2Hz: number;
  };
  readonly transponder: {
    readonly code: number;
    readonly mode: number;
  };
  readonly state: {
    readonly onGround: boolean;
    readonly paused: boolean;
  };
}

export function toSnapshot(f: TelemetryFile): TelemetrySnapshot {
  return Object.freeze({
    timestamp: f.timestamp,
    simulator: f.simulator,
    aircraft: f.aircraft,
    position: Object.freeze({
      latitude: f.position.latitude,
      longitude: f.position.longitude,
      altitudeMslM: f.position.altitude_msl_m,
      altitudeAglM: f.position.altitude_agl_m,
    }),
    orientation: Object.freeze({
      headingMag: f.orientation.heading_mag,
      headingTrue: f.orientation.heading_true,
      pitch: f.orientation.pitch,
      roll: f.orientation.roll,
    }),
    speed: Object.freeze({
      groundSpeedMps: f.speed.ground_speed_mps,
      iasKts: f.speed.ias_kts,
      tasMps: f.speed.tas_mps,
      verticalSpeedFpm: f.speed.vertical_speed_fpm,
    }),
    radios: Object.freeze({
      com1Hz: f.radios.com1_hz,
      com1StandbyHz: f.radios.com1_standby_hz,
      com2Hz: f.radios.com2_hz,
      com2StandbyHz: f.radios.com2_standby_hz,
      nav1Hz: f.radios.nav1_hz,
      nav2Hz: f.radios.nav2_hz,
    }),
    transponder: Object.freeze({ code: f.transponder.code, mode: f.transponder.mode }),
    state: Object.freeze({ onGround: f.state.on_ground, paused: f.state.paused }),
  });
}

/** Stand-in used before the simulator bridge has written anything. */
export function emptySnapshot(): TelemetrySnapshot {
  return toSnapshot({
    timestamp: 0,
    simulator: "",
    aircraft: "",
    position: { latitude: 0, longitude: 0, altitude_msl_m: 0, altitude_agl_m: 0 },
    orientation: { heading_mag: 0, heading_true: 0, pitch: 0, roll: 0 },
    speed: { ground_speed_mps: 0, ias_kts: 0, tas_mps: 0, vertical_speed_fpm: 0 },
    radios: { com1_hz: 0, com1_standby_hz: 0, com2_hz: 0, com2_standby_hz: 0, nav1_hz: 0, nav2_hz: 0 },
    transponder: { code: 0, mode: 0 },
    state: { on_ground: false, paused: false },
  });
}

/** Radio frequency in Hz → "118.300" style MHz string. */
export function formatFrequency(hz: number): string {
  return (hz / 1_000_000).toFixed(3);
}
