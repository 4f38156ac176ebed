// Data models for the remote volume control service
import { AudioBackendSetting, Configuration, VolumeState } from '../interfaces';

export const MIN_PERCENT = 0;
export const MAX_PERCENT = 100;

export function clampPercent(value: number): number {
  return Math.max(MIN_PERCENT, Math.min(MAX_PERCENT, value));
}

export class VolumeStateModel implements VolumeState {
  public readonly percent: number;
  public readonly muted: boolean;

  constructor(percent: number, muted: boolean) {
    this.percent = clampPercent(Math.round(percent));
    this.muted = muted;
    Object.freeze(this);
  }

  public toJSON(): VolumeState {
    return {
      percent: this.percent,
      muted: this.muted
    };
  }
}

const AUDIO_BACKEND_SETTINGS: readonly AudioBackendSetting[] = ['auto', 'pactl', 'amixer'];

export function isAudioBackendSetting(value: unknown): value is AudioBackendSetting {
  return AUDIO_BACKEND_SETTINGS.some((setting) => setting === value);
}

function isIntegerInRange(value: unknown, min: number, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max;
}

// Sink and control names end up as command arguments; a leading dash would read as a flag
function isCommandArgument(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '' && !value.startsWith('-');
}

export class ConfigurationModel implements Configuration {
  public step: number;
  public host: string;
  public port: number;
  public audioBackend: AudioBackendSetting;
  public sinkName: string;
  public mixerControl: string;
  public commandTimeoutMs: number;

  constructor(base: Partial<Configuration> = {}) {
    // Default configuration
    this.step = base.step ?? 5;
    this.host = base.host ?? '0.0.0.0';
    this.port = base.port ?? 5000;
    this.audioBackend = base.audioBackend ?? 'auto';
    this.sinkName = base.sinkName ?? '@DEFAULT_SINK@';
    this.mixerControl = base.mixerControl ?? 'Master';
    this.commandTimeoutMs = base.commandTimeoutMs ?? 3000;
  }

  public toJSON(): Configuration {
    return {
      step: this.step,
      host: this.host,
      port: this.port,
      audioBackend: this.audioBackend,
      sinkName: this.sinkName,
      mixerControl: this.mixerControl,
      commandTimeoutMs: this.commandTimeoutMs
    };
  }

  /**
   * Build a configuration from untrusted JSON layered over `base` (the defaults
   * unless given). Fields that fail validation keep the base value and are
   * reported through `warnings`.
   */
  public static fromJSON(
    data: Record<string, unknown>,
    warnings: string[] = [],
    base: Partial<Configuration> = {}
  ): ConfigurationModel {
    const config = new ConfigurationModel(base);
    const reject = (field: string): void => {
      warnings.push(`Ignoring invalid ${field}: ${JSON.stringify(data[field])}`);
    };

    if (data.step !== undefined) {
      if (isIntegerInRange(data.step, 1, 100)) config.step = data.step;
      else reject('step');
    }
    if (data.host !== undefined) {
      if (typeof data.host === 'string' && data.host.trim() !== '') config.host = data.host.trim();
      else reject('host');
    }
    if (data.port !== undefined) {
      if (isIntegerInRange(data.port, 0, 65535)) config.port = data.port;
      else reject('port');
    }
    if (data.audioBackend !== undefined) {
      if (isAudioBackendSetting(data.audioBackend)) config.audioBackend = data.audioBackend;
      else reject('audioBackend');
    }
    if (data.sinkName !== undefined) {
      if (isCommandArgument(data.sinkName)) config.sinkName = data.sinkName;
      else reject('sinkName');
    }
    if (data.mixerControl !== undefined) {
      if (isCommandArgument(data.mixerControl)) config.mixerControl = data.mixerControl;
      else reject('mixerControl');
    }
    if (data.commandTimeoutMs !== undefined) {
      if (isIntegerInRange(data.commandTimeoutMs, 100, 60000)) config.commandTimeoutMs = data.commandTimeoutMs;
      else reject('commandTimeoutMs');
    }

    return config;
  }

  public validate(): string[] {
    const errors: string[] = [];

    if (!isIntegerInRange(this.step, 1, 100)) {
      errors.push('Step must be an integer between 1 and 100');
    }

    if (this.host.trim() === '') {
      errors.push('Host must not be empty');
    }

    if (!isIntegerInRange(this.port, 0, 65535)) {
      errors.push('Port must be an integer between 0 and 65535');
    }

    if (!isAudioBackendSetting(this.audioBackend)) {
      errors.push('Audio backend must be one of auto, pactl, amixer');
    }

    if (!isCommandArgument(this.sinkName)) {
      errors.push('Sink name must be non-empty and must not start with "-"');
    }

    if (!isCommandArgument(this.mixerControl)) {
      errors.push('Mixer control must be non-empty and must not start with "-"');
    }

    if (!isIntegerInRange(this.commandTimeoutMs, 100, 60000)) {
      errors.push('Command timeout must be between 100 and 60000ms');
    }

    return errors;
  }
}
