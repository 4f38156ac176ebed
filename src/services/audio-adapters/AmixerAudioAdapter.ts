import type { VolumeState } from '../../interfaces';
import { VolumeStateModel } from '../../models';
import type { CommandRunner, IAudioAdapter } from './types';
import { AdapterError } from './types';
import { assertLevel, assertMuteFlag } from './validation';

const AMIXER = 'amixer';

/**
 * Parse `amixer get <control>` output. Playback lines look like:
 *   Front Left: Playback 45875 [70%] [-9.00dB] [on]
 * The first channel wins; `[off]` means the playback switch is muted.
 */
export function parseAmixerState(output: string): VolumeState {
  const volume = /\[(\d+)%\]/.exec(output);
  if (!volume) {
    throw new AdapterError(
      `Could not parse volume from "${AMIXER}" output`,
      'ParseFailure',
      'Expected a level such as "[70%]". Check the mixer control name with: amixer scontrols',
      { command: AMIXER }
    );
  }

  const playbackSwitch = /\[(on|off)\]/i.exec(output);
  if (!playbackSwitch) {
    throw new AdapterError(
      `Could not parse mute state from "${AMIXER}" output`,
      'ParseFailure',
      'The mixer control has no playback switch. Pick a control that can be muted, such as Master.',
      { command: AMIXER }
    );
  }

  return new VolumeStateModel(
    parseInt(volume[1], 10),
    playbackSwitch[1].toLowerCase() === 'off'
  );
}

/**
 * ALSA adapter using amixer
 */
export class AmixerAudioAdapter implements IAudioAdapter {
  readonly backend = 'amixer' as const;

  constructor(
    private readonly runner: CommandRunner,
    private readonly control: string = 'Master'
  ) {}

  isSupported(): boolean {
    return process.platform === 'linux';
  }

  async getState(): Promise<VolumeState> {
    const { stdout } = await this.runner.run(AMIXER, ['get', this.control]);
    return parseAmixerState(stdout);
  }

  async setVolume(percent: number): Promise<void> {
    assertLevel(percent);
    await this.runner.run(AMIXER, ['set', this.control, `${percent}%`]);
  }

  async setMute(muted: boolean): Promise<void> {
    assertMuteFlag(muted);
    await this.runner.run(AMIXER, ['set', this.control, muted ? 'mute' : 'unmute']);
  }
}
