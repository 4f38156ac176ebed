import type { VolumeState } from '../../interfaces';
import { VolumeStateModel } from '../../models';
import type { CommandRunner, IAudioAdapter } from './types';
import { AdapterError } from './types';
import { assertLevel, assertMuteFlag } from './validation';

const PACTL = 'pactl';

/**
 * Extract the first channel's percentage from `pactl get-sink-volume` output, e.g.
 *   Volume: front-left: 32768 /  50% / -18.06 dB,   front-right: 32768 /  50% / -18.06 dB
 */
export function parsePactlVolume(output: string): number {
  const match = /(\d+)\s*%/.exec(output);
  if (!match) {
    throw new AdapterError(
      `Could not parse volume from "${PACTL}" output`,
      'ParseFailure',
      'Expected a percentage such as "50%". Check that the configured sink exists: pactl list short sinks',
      { command: PACTL }
    );
  }
  return parseInt(match[1], 10);
}

/**
 * Extract the mute flag from `pactl get-sink-mute` output, e.g. "Mute: no"
 */
export function parsePactlMute(output: string): boolean {
  const match = /^\s*mute:\s*(yes|no)\s*$/im.exec(output);
  if (!match) {
    throw new AdapterError(
      `Could not parse mute state from "${PACTL}" output`,
      'ParseFailure',
      'Expected "Mute: yes" or "Mute: no". Check that pactl is not running under a translated locale.',
      { command: PACTL }
    );
  }
  return match[1].toLowerCase() === 'yes';
}

/**
 * PulseAudio / PipeWire adapter using pactl
 */
export class PactlAudioAdapter implements IAudioAdapter {
  readonly backend = 'pactl' as const;

  constructor(
    private readonly runner: CommandRunner,
    private readonly sinkName: string = '@DEFAULT_SINK@'
  ) {}

  /**
   * Check if this adapter is supported (running on Linux)
   */
  isSupported(): boolean {
    return process.platform === 'linux';
  }

  async getState(): Promise<VolumeState> {
    const volume = await this.runner.run(PACTL, ['get-sink-volume', this.sinkName]);
    const percent = parsePactlVolume(volume.stdout);

    const mute = await this.runner.run(PACTL, ['get-sink-mute', this.sinkName]);
    const muted = parsePactlMute(mute.stdout);

    // PulseAudio can go above 100%, the model clamps to our range
    return new VolumeStateModel(percent, muted);
  }

  async setVolume(percent: number): Promise<void> {
    assertLevel(percent);
    await this.runner.run(PACTL, ['set-sink-volume', this.sinkName, `${percent}%`]);
  }

  async setMute(muted: boolean): Promise<void> {
    assertMuteFlag(muted);
    await this.runner.run(PACTL, ['set-sink-mute', this.sinkName, muted ? '1' : '0']);
  }
}
