import type { AudioBackend, VolumeState } from '../../interfaces';

/**
 * Interface for system audio adapters
 * Each audio utility (pactl, amixer) implements this interface
 */
export interface IAudioAdapter {
  /** The audio utility this adapter drives */
  readonly backend: AudioBackend;

  /**
   * Query the sink's current volume and mute flag
   * @throws AdapterError if the state cannot be read
   */
  getState(): Promise<VolumeState>;

  /**
   * Set the sink volume
   * @param percent - Absolute level, an integer in 0-100
   * @throws AdapterError if the volume cannot be set
   */
  setVolume(percent: number): Promise<void>;

  /**
   * Set the sink mute state explicitly (never a toggle)
   * @throws AdapterError if the mute state cannot be set
   */
  setMute(muted: boolean): Promise<void>;

  /**
   * Check if this adapter can function on the current host
   */
  isSupported(): boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs one external process per call with an argument vector, never a shell
 */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

export type AdapterErrorKind =
  | 'CommandUnavailable'
  | 'CommandFailed'
  | 'ParseFailure'
  | 'Timeout'
  | 'InvalidArgument';

export interface AdapterErrorDetails {
  command?: string;
  exitCode?: number;
  /** Kept for server logs, never sent to clients */
  stderr?: string;
}

/**
 * Error class for audio adapter failures
 * Carries a kind for the controller and troubleshooting guidance for the logs
 */
export class AdapterError extends Error {
  constructor(
    message: string,
    public readonly kind: AdapterErrorKind,
    public readonly troubleshooting: string,
    public readonly details: AdapterErrorDetails = {}
  ) {
    super(message);
    this.name = 'AdapterError';
  }
}
