/**
 * Output device profiles.
 */

export const DEVICE_MODES = ['phone', 'headset', 'terminal'] as const;
export type DeviceMode = (typeof DEVICE_MODES)[number];

export interface DeviceProfile {
  mode: DeviceMode;
  /** Output gain in dB */
  gainDb: number;
  /** Speaking pace multiplier */
  paceFactor: number;
  /** Pause between phrases in ms */
  pauseMs: number;
}

export const DEVICE_PROFILES: Readonly<Record<DeviceMode, DeviceProfile>> = {
  phone: { mode: 'phone', gainDb: -2.0, paceFactor: 1.05, pauseMs: 60 },
  headset: { mode: 'headset', gainDb: 0.0, paceFactor: 1.0, pauseMs: 40 },
  terminal: { mode: 'terminal', gainDb: 1.5, paceFactor: 0.95, pauseMs: 80 },
};

export function getDeviceProfile(mode: DeviceMode): DeviceProfile {
  return { ...DEVICE_PROFILES[mode] };
}
