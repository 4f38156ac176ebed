// Volume Controller - step, clamp and toggle rules on top of an audio adapter
import { VolumeController as IVolumeController, VolumeState } from '../interfaces';
import { clampPercent } from '../models';
import { AdapterError, AdapterErrorKind, IAudioAdapter } from './audio-adapters';

export type ControllerErrorKind = Exclude<AdapterErrorKind, 'InvalidArgument'> | 'InvalidInput';

export const DEFAULT_STEP = 5;

export class ControllerError extends Error {
  constructor(
    message: string,
    public readonly kind: ControllerErrorKind,
    public readonly troubleshooting?: string
  ) {
    super(message);
    this.name = 'ControllerError';
  }

  /** Client mistakes are 400, everything the audio system does wrong is 500 */
  public get statusCode(): number {
    return this.kind === 'InvalidInput' ? 400 : 500;
  }

  public static fromError(error: unknown): ControllerError {
    if (error instanceof ControllerError) {
      return error;
    }

    if (error instanceof AdapterError) {
      const kind: ControllerErrorKind = error.kind === 'InvalidArgument' ? 'InvalidInput' : error.kind;
      return new ControllerError(error.message, kind, error.troubleshooting);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new ControllerError(
      'Unexpected audio control error',
      'CommandFailed',
      `Unexpected error: ${message}`
    );
  }
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `"${value}"`;
  if (Array.isArray(value)) return 'an array';
  if (value !== null && typeof value === 'object') return 'an object';
  return String(value);
}

/**
 * Coerce a client-supplied level into an integer.
 * Accepts integral numbers and strings of digits with an optional sign.
 */
export function parseLevel(requested: unknown): number {
  let value: number | null = null;

  if (typeof requested === 'number' && Number.isSafeInteger(requested)) {
    value = requested;
  } else if (typeof requested === 'string' && INTEGER_PATTERN.test(requested.trim())) {
    const parsed = Number(requested.trim());
    if (Number.isSafeInteger(parsed)) {
      value = parsed;
    }
  }

  if (value === null) {
    throw new ControllerError(
      `percent must be an integer, got ${describeValue(requested)}`,
      'InvalidInput'
    );
  }

  return value;
}

export interface VolumeControllerConfig {
  /** Percentage applied per increase/decrease call */
  step: number;
}

/**
 * VolumeControllerImpl applies volume rules against the audio adapter.
 *
 * It keeps no volume state of its own: every call queries the sink, and every
 * mutation is followed by a fresh query, so the audio daemon stays the single
 * source of truth.
 *
 * No lock is taken across calls. Two concurrent increase() calls can both read
 * 50 and both set 55, dropping one step; the daemon would have to be locked to
 * prevent that.
 */
export class VolumeControllerImpl implements IVolumeController {
  public readonly step: number;
  private readonly adapter: IAudioAdapter;

  constructor(adapter: IAudioAdapter, config: Partial<VolumeControllerConfig> = {}) {
    const step = config.step ?? DEFAULT_STEP;
    if (!Number.isInteger(step) || step <= 0) {
      throw new Error(`Volume step must be a positive integer, got ${step}`);
    }

    this.adapter = adapter;
    this.step = step;
  }

  public getStatus(): Promise<VolumeState> {
    return this.guard(() => this.adapter.getState());
  }

  public increase(): Promise<VolumeState> {
    return this.guard(() => this.stepBy(this.step));
  }

  public decrease(): Promise<VolumeState> {
    return this.guard(() => this.stepBy(-this.step));
  }

  public toggleMute(): Promise<VolumeState> {
    return this.guard(async () => {
      const current = await this.adapter.getState();
      await this.adapter.setMute(!current.muted);
      return this.adapter.getState();
    });
  }

  public setLevel(requested: unknown): Promise<VolumeState> {
    return this.guard(async () => {
      const target = clampPercent(parseLevel(requested));
      await this.adapter.setVolume(target);
      return this.adapter.getState();
    });
  }

  private async stepBy(delta: number): Promise<VolumeState> {
    const current = await this.adapter.getState();
    const target = clampPercent(current.percent + delta);

    // Already at the bound
    if (target === current.percent) {
      return current;
    }

    await this.adapter.setVolume(target);
    return this.adapter.getState();
  }

  private async guard(operation: () => Promise<VolumeState>): Promise<VolumeState> {
    try {
      return await operation();
    } catch (error) {
      throw ControllerError.fromError(error);
    }
  }
}
