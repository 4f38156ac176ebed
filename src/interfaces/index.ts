// Core interfaces for the remote volume control service

export interface VolumeState {
  readonly percent: number; // 0 - 100
  readonly muted: boolean;
}

export type AudioBackend = 'pactl' | 'amixer';

export type AudioBackendSetting = AudioBackend | 'auto';

export interface Configuration {
  step: number;
  host: string;
  port: number;
  audioBackend: AudioBackendSetting;
  sinkName: string;
  mixerControl: string;
  commandTimeoutMs: number;
}

// Service interfaces
export interface VolumeController {
  readonly step: number;
  getStatus(): Promise<VolumeState>;
  increase(): Promise<VolumeState>;
  decrease(): Promise<VolumeState>;
  toggleMute(): Promise<VolumeState>;
  setLevel(requested: unknown): Promise<VolumeState>;
}

export interface ConfigurationManager {
  loadConfiguration(): Promise<Configuration>;
  getConfiguration(): Configuration;
}
