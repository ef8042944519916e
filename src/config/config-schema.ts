import { z } from 'zod';
import type { StageName } from '../types/index.js';
import type { StabilizerConfig } from '../layers/regulation/stabilizer.js';
import type { NeuralSyncConfig } from '../layers/regulation/neural-sync.js';
import type { SoftGuardConfig } from '../layers/regulation/soft-guard.js';
import type { MetaCognitionConfig } from '../layers/observation/meta-cognition.js';
import type { SilenceClassifierConfig } from '../layers/observation/silence-classifier.js';
import { DEFAULT_STABILIZER_CONFIG } from '../layers/regulation/stabilizer.js';
import { DEFAULT_NEURAL_SYNC_CONFIG } from '../layers/regulation/neural-sync.js';
import { DEFAULT_SOFT_GUARD_CONFIG } from '../layers/regulation/soft-guard.js';
import { DEFAULT_META_COGNITION_CONFIG } from '../layers/observation/meta-cognition.js';
import { DEFAULT_SILENCE_CONFIG } from '../layers/observation/silence-classifier.js';
import { DEVICE_MODES, type DeviceMode } from '../simulation/device.js';
import { DEFAULT_VOICE_CONFIG, type VoiceConfig } from '../simulation/voice-io.js';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** compact: sparklines only; full: also the metric table of the last turn */
export const VIZ_MODES = ['compact', 'full'] as const;
export type VizMode = (typeof VIZ_MODES)[number];

const unit = z.number().min(0).max(1);

/**
 * Config file sections (data/config/regulator.json).
 * Each section is validated on its own; an invalid one falls back to defaults.
 */
export const configFileSections = {
  session: z
    .object({
      mode: z.enum(DEVICE_MODES),
      cycles: z.number().int().min(1).max(10_000),
      script: z.string().nullable(),
      inputsFile: z.string().nullable(),
      strict: z.boolean(),
    })
    .partial(),

  layers: z
    .object({
      stabilizer: z.boolean(),
      sync: z.boolean(),
      guard: z.boolean(),
      awareness: z.boolean(),
      compassion: z.boolean(),
      silence: z.boolean(),
    })
    .partial(),

  stabilizer: z
    .object({
      emaAlpha: z.number().gt(0).max(1),
      warmDrift: unit,
      hotDrift: unit,
      lowResonance: unit,
      coolSteps: z.number().int().min(1),
      calmBoost: z.number().min(0).max(0.2),
    })
    .partial(),

  sync: z
    .object({
      baselines: z.object({ drift: unit, resonance: unit }).partial(),
      lrFast: unit,
      lrSlow: unit,
      syncStep: z.number().gt(0).max(0.2),
    })
    .partial(),

  guard: z
    .object({
      driftLimit: unit,
      resonanceLimit: unit,
    })
    .partial(),

  awareness: z
    .object({
      metaAlpha: z.number().gt(0).max(1),
    })
    .partial(),

  silence: z
    .object({
      minSilenceMs: z.number().int().min(0),
    })
    .partial(),

  voice: z
    .object({
      sampleRate: z.number().int().min(8000).max(192_000),
      channels: z.number().int().min(1).max(8),
      frameMs: z.number().int().min(1).max(1000),
    })
    .partial(),

  report: z
    .object({
      metrics: z.boolean(),
      viz: z.enum(VIZ_MODES),
    })
    .partial(),

  sessionLog: z
    .object({
      enabled: z.boolean(),
      dir: z.string().min(1),
    })
    .partial(),

  logging: z
    .object({
      level: z.enum(LOG_LEVELS),
      pretty: z.boolean(),
      maxFiles: z.number().int().min(1),
    })
    .partial(),
} as const;

export type ConfigSectionName = keyof typeof configFileSections;

/**
 * Regulator configuration file. Every section is optional.
 */
export interface RegulatorConfigFile {
  version?: number;
  session?: z.infer<(typeof configFileSections)['session']>;
  layers?: z.infer<(typeof configFileSections)['layers']>;
  stabilizer?: z.infer<(typeof configFileSections)['stabilizer']>;
  sync?: z.infer<(typeof configFileSections)['sync']>;
  guard?: z.infer<(typeof configFileSections)['guard']>;
  awareness?: z.infer<(typeof configFileSections)['awareness']>;
  silence?: z.infer<(typeof configFileSections)['silence']>;
  voice?: z.infer<(typeof configFileSections)['voice']>;
  report?: z.infer<(typeof configFileSections)['report']>;
  sessionLog?: z.infer<(typeof configFileSections)['sessionLog']>;
  logging?: z.infer<(typeof configFileSections)['logging']>;
}

/**
 * Merged application configuration.
 *
 * This is the final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables (highest priority)
 */
export interface MergedConfig {
  session: {
    mode: DeviceMode;
    /** Turns to run when no script or inputs file is given */
    cycles: number;
    /** `;`-separated utterances */
    script: string | null;
    /** File with one utterance per line */
    inputsFile: string | null;
    /** Exit non-zero when the health check fails */
    strict: boolean;
  };

  layers: Record<StageName, boolean>;

  stabilizer: StabilizerConfig;
  sync: NeuralSyncConfig;
  guard: SoftGuardConfig;
  awareness: MetaCognitionConfig;
  silence: SilenceClassifierConfig;

  voice: VoiceConfig;

  report: {
    /** Print the per-turn `[metrics]` latency line */
    metrics: boolean;
    viz: VizMode;
  };

  sessionLog: {
    enabled: boolean;
    dir: string;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    /** Log files kept in logDir */
    maxFiles: number;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  session: {
    mode: 'phone',
    cycles: 6,
    script: null,
    inputsFile: null,
    strict: false,
  },

  layers: {
    stabilizer: true,
    sync: true,
    guard: true,
    awareness: true,
    compassion: true,
    silence: true,
  },

  stabilizer: { ...DEFAULT_STABILIZER_CONFIG },
  sync: {
    ...DEFAULT_NEURAL_SYNC_CONFIG,
    baselines: { ...DEFAULT_NEURAL_SYNC_CONFIG.baselines },
  },
  guard: { ...DEFAULT_SOFT_GUARD_CONFIG },
  awareness: { ...DEFAULT_META_COGNITION_CONFIG },
  silence: { ...DEFAULT_SILENCE_CONFIG },

  voice: { ...DEFAULT_VOICE_CONFIG },

  report: {
    metrics: true,
    viz: 'compact',
  },

  sessionLog: {
    enabled: false,
    dir: 'data/logs/sessions',
  },

  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: 'data/logs',
    maxFiles: 10,
  },
};
