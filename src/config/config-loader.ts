import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { z } from 'zod';
import type { StageName } from '../types/index.js';
import { STAGE_ORDER } from '../types/index.js';
import type { MergedConfig, RegulatorConfigFile } from './config-schema.js';
import {
  CONFIG_FILE_VERSION,
  DEFAULT_CONFIG,
  LOG_LEVELS,
  VIZ_MODES,
  configFileSections,
} from './config-schema.js';
import { ConfigError } from './config-errors.js';
import { DEVICE_MODES } from '../simulation/device.js';

export const CONFIG_FILE_NAME = 'regulator.json';

/** Environment variable that toggles each stage */
export const STAGE_ENV_VARS: Record<StageName, string> = {
  stabilizer: 'REGULATOR_STABILIZER',
  sync: 'REGULATOR_SYNC',
  guard: 'REGULATOR_GUARD',
  awareness: 'REGULATOR_AWARENESS',
  compassion: 'REGULATOR_COMPASSION',
  silence: 'REGULATOR_SILENCE',
};

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

type Env = Record<string, string | undefined>;

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/regulator.json)
 * 3. Hardcoded defaults
 *
 * Malformed values never fail the load: they are skipped, recorded in
 * getWarnings(), and the lower-priority value stays in effect.
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: Env;
  private warnings: string[] = [];

  constructor(configPath = 'data/config', env: Env = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    this.warnings = [];
    const loadedConfig = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);

    if (loadedConfig) {
      this.mergeConfigFile(config, loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Warnings collected by the last load(), for logging once a logger exists.
   */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  /**
   * Load config file from disk and validate it section by section.
   */
  private async loadConfigFile(): Promise<RegulatorConfigFile | null> {
    const filePath = join(this.configPath, CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(filePath, message, 'READ_FAILED');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(filePath, message, 'PARSE_FAILED');
    }

    if (!isRecord(raw)) {
      this.warnings.push(`${filePath}: expected a JSON object, using defaults`);
      return null;
    }

    return this.validateSections(raw);
  }

  private validateSections(raw: Record<string, unknown>): RegulatorConfigFile {
    const file: RegulatorConfigFile = {};

    const version = raw['version'];
    if (typeof version === 'number') {
      file.version = version;
      if (version > CONFIG_FILE_VERSION) {
        this.warnings.push(
          `Config file version (${String(version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
        );
      }
    }

    const sections = configFileSections;
    const parse = <S extends z.ZodTypeAny>(name: keyof typeof sections, schema: S): z.infer<S> | undefined => {
      const value = raw[name];
      if (value === undefined) return undefined;
      const result = schema.safeParse(value);
      if (!result.success) {
        this.warnings.push(`Invalid "${name}" section ignored: ${result.error.message}`);
        return undefined;
      }
      return result.data;
    };

    const session = parse('session', sections.session);
    if (session) file.session = session;
    const layers = parse('layers', sections.layers);
    if (layers) file.layers = layers;
    const stabilizer = parse('stabilizer', sections.stabilizer);
    if (stabilizer) file.stabilizer = stabilizer;
    const sync = parse('sync', sections.sync);
    if (sync) file.sync = sync;
    const guard = parse('guard', sections.guard);
    if (guard) file.guard = guard;
    const awareness = parse('awareness', sections.awareness);
    if (awareness) file.awareness = awareness;
    const silence = parse('silence', sections.silence);
    if (silence) file.silence = silence;
    const voice = parse('voice', sections.voice);
    if (voice) file.voice = voice;
    const report = parse('report', sections.report);
    if (report) file.report = report;
    const sessionLog = parse('sessionLog', sections.sessionLog);
    if (sessionLog) file.sessionLog = sessionLog;
    const logging = parse('logging', sections.logging);
    if (logging) file.logging = logging;

    return file;
  }

  /**
   * Merge config file values into the config object.
   */
  private mergeConfigFile(config: MergedConfig, file: RegulatorConfigFile): void {
    if (file.session) {
      const { mode, cycles, script, inputsFile, strict } = file.session;
      if (mode !== undefined) config.session.mode = mode;
      if (cycles !== undefined) config.session.cycles = cycles;
      if (script !== undefined) config.session.script = script;
      if (inputsFile !== undefined) config.session.inputsFile = inputsFile;
      if (strict !== undefined) config.session.strict = strict;
    }

    if (file.layers) {
      for (const stage of STAGE_ORDER) {
        const enabled = file.layers[stage];
        if (enabled !== undefined) config.layers[stage] = enabled;
      }
    }

    if (file.stabilizer) {
      config.stabilizer = { ...config.stabilizer, ...file.stabilizer };
    }

    if (file.sync) {
      const { baselines, ...rates } = file.sync;
      config.sync = { ...config.sync, ...rates };
      if (baselines) {
        config.sync.baselines = { ...config.sync.baselines, ...baselines };
      }
    }

    if (file.guard) {
      config.guard = { ...config.guard, ...file.guard };
    }

    if (file.awareness) {
      config.awareness = { ...config.awareness, ...file.awareness };
    }

    if (file.silence) {
      config.silence = { ...config.silence, ...file.silence };
    }

    if (file.voice) {
      config.voice = { ...config.voice, ...file.voice };
    }

    if (file.report) {
      config.report = { ...config.report, ...file.report };
    }

    if (file.sessionLog) {
      config.sessionLog = { ...config.sessionLog, ...file.sessionLog };
    }

    if (file.logging) {
      config.logging = { ...config.logging, ...file.logging };
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    // Data paths first so explicit log dirs below win
    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.logging.logDir = join(dataPath, 'logs');
      config.sessionLog.dir = join(dataPath, 'logs', 'sessions');
    }

    const mode = this.readEnv('REGULATOR_MODE');
    if (mode !== undefined) {
      const normalized = mode.toLowerCase();
      const known = DEVICE_MODES.find((m) => m === normalized);
      if (known) {
        config.session.mode = known;
      } else {
        this.warnings.push(
          `REGULATOR_MODE="${mode}" is not one of ${DEVICE_MODES.join(', ')}; keeping ${config.session.mode}`
        );
      }
    }

    const cycles = this.readInteger('REGULATOR_CYCLES', 1, 10_000);
    if (cycles !== undefined) config.session.cycles = cycles;

    const script = this.readEnv('REGULATOR_SCRIPT');
    if (script !== undefined) config.session.script = script;

    const inputs = this.readEnv('REGULATOR_INPUTS');
    if (inputs !== undefined) config.session.inputsFile = inputs;

    const strict = this.readBoolean('REGULATOR_STRICT');
    if (strict !== undefined) config.session.strict = strict;

    const log = this.readBoolean('REGULATOR_LOG');
    if (log !== undefined) config.sessionLog.enabled = log;

    const logDir = this.readEnv('REGULATOR_LOG_DIR');
    if (logDir !== undefined) config.sessionLog.dir = logDir;

    for (const stage of STAGE_ORDER) {
      const enabled = this.readBoolean(STAGE_ENV_VARS[stage]);
      if (enabled !== undefined) config.layers[stage] = enabled;
    }

    const baselineDrift = this.readNumber('REGULATOR_BASELINE_DRIFT', 0, 1);
    if (baselineDrift !== undefined) config.sync.baselines.drift = baselineDrift;

    const baselineRes = this.readNumber('REGULATOR_BASELINE_RES', 0, 1);
    if (baselineRes !== undefined) config.sync.baselines.resonance = baselineRes;

    const syncStep = this.readNumber('REGULATOR_SYNC_STEP', 0.001, 0.2);
    if (syncStep !== undefined) config.sync.syncStep = syncStep;

    const metrics = this.readBoolean('REGULATOR_METRICS');
    if (metrics !== undefined) config.report.metrics = metrics;

    const viz = this.readEnv('REGULATOR_VIZ');
    if (viz !== undefined) {
      const mode = VIZ_MODES.find((m) => m === viz.toLowerCase());
      if (mode) {
        config.report.viz = mode;
      } else {
        this.warnings.push(
          `REGULATOR_VIZ="${viz}" is not one of ${VIZ_MODES.join(', ')}; keeping ${config.report.viz}`
        );
      }
    }

    const frameMs = this.readInteger('REGULATOR_FRAME_MS', 1, 1000);
    if (frameMs !== undefined) config.voice.frameMs = frameMs;

    const logLevel = this.readEnv('LOG_LEVEL');
    if (logLevel !== undefined) {
      const level = LOG_LEVELS.find((l) => l === logLevel);
      if (level) {
        config.logging.level = level;
      } else {
        this.warnings.push(`LOG_LEVEL="${logLevel}" is not a log level; keeping ${config.logging.level}`);
      }
    }
  }

  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  private readBoolean(name: string): boolean | undefined {
    const value = this.readEnv(name);
    if (value === undefined) return undefined;

    const normalized = value.toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;

    this.warnings.push(`${name}="${value}" is not a boolean; using default`);
    return undefined;
  }

  private readNumber(name: string, min: number, max: number): number | undefined {
    const value = this.readEnv(name);
    if (value === undefined) return undefined;

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
      this.warnings.push(
        `${name}="${value}" is not a number in [${String(min)}, ${String(max)}]; using default`
      );
      return undefined;
    }
    return parsed;
  }

  private readInteger(name: string, min: number, max: number): number | undefined {
    const parsed = this.readNumber(name, min, max);
    if (parsed === undefined) return undefined;
    if (!Number.isInteger(parsed)) {
      this.warnings.push(`${name}="${String(parsed)}" is not an integer; using default`);
      return undefined;
    }
    return parsed;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: Env): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  const loader = createConfigLoader(configPath);
  return loader.load();
}
