// Configuration Manager - loads startup settings from config.json and the environment
import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationManager as IConfigurationManager, Configuration } from '../interfaces';
import { ConfigurationModel, isAudioBackendSetting } from '../models';

export const CONFIG_FILE_NAME = 'config.json';

type Environment = Record<string, string | undefined>;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * Loads configuration once at startup. The result is frozen: the step size,
 * bind address and audio backend never change while the process runs.
 */
export class ConfigurationManagerImpl extends EventEmitter implements IConfigurationManager {
  private config: ConfigurationModel;
  private readonly configFilePath: string;
  private readonly env: Environment;
  private isLoaded: boolean = false;

  constructor(configDir?: string, env: Environment = process.env) {
    super();
    this.config = new ConfigurationModel();
    this.configFilePath = path.join(configDir || process.cwd(), CONFIG_FILE_NAME);
    this.env = env;
  }

  public async loadConfiguration(): Promise<Configuration> {
    const warnings: string[] = [];

    try {
      const data = await fs.readFile(this.configFilePath, 'utf-8');
      const parsed: unknown = JSON.parse(data);

      if (!isRecord(parsed)) {
        throw new Error('Config file must contain a JSON object');
      }

      this.config = ConfigurationModel.fromJSON(parsed, warnings);
      this.emit('config_loaded', this.config.toJSON());
    } catch (error) {
      this.config = new ConfigurationModel();

      if (isErrnoException(error) && error.code === 'ENOENT') {
        // File doesn't exist, use defaults
        console.log('[Config] Config file not found, using defaults');
        this.emit('config_defaults_applied', this.config.toJSON());
      } else {
        // Parse error or other issue - use defaults but log warning
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[Config] Error loading ${this.configFilePath}, using defaults:`, message);
        this.emit('config_load_error', { error: message });
      }
    }

    // Override with env vars if present
    this.applyEnvOverrides(warnings);

    for (const warning of warnings) {
      console.warn(`[Config] ${warning}`);
    }

    this.isLoaded = true;
    return this.getConfiguration();
  }

  private applyEnvOverrides(warnings: string[]): void {
    const overrides: Record<string, unknown> = {};
    const env = this.env;

    if (env.VOLUME_STEP) {
      overrides.step = parseInteger(env.VOLUME_STEP) ?? env.VOLUME_STEP;
    }

    if (env.HOST) {
      overrides.host = env.HOST;
    }

    if (env.PORT) {
      overrides.port = parseInteger(env.PORT) ?? env.PORT;
    }

    if (env.AUDIO_BACKEND) {
      const backend = env.AUDIO_BACKEND.trim().toLowerCase();
      overrides.audioBackend = isAudioBackendSetting(backend) ? backend : env.AUDIO_BACKEND;
    }

    if (env.PULSE_SINK) {
      overrides.sinkName = env.PULSE_SINK;
    }

    if (env.ALSA_CONTROL) {
      overrides.mixerControl = env.ALSA_CONTROL;
    }

    if (env.COMMAND_TIMEOUT_MS) {
      overrides.commandTimeoutMs = parseInteger(env.COMMAND_TIMEOUT_MS) ?? env.COMMAND_TIMEOUT_MS;
    }

    if (Object.keys(overrides).length === 0) {
      return;
    }

    // Env values go through the same validation as file values
    this.config = ConfigurationModel.fromJSON(overrides, warnings, this.config.toJSON());
    this.emit('config_env_applied', Object.keys(overrides));
  }

  // Getters for current configuration
  public getConfiguration(): Configuration {
    return Object.freeze(this.config.toJSON());
  }

  public isConfigLoaded(): boolean {
    return this.isLoaded;
  }

  // Validation
  public validateConfiguration(): string[] {
    return this.config.validate();
  }
}
