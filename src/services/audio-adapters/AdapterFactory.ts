import type { AudioBackend, AudioBackendSetting } from '../../interfaces';
import type { CommandRunner, IAudioAdapter } from './types';
import { AdapterError } from './types';
import { PactlAudioAdapter } from './PactlAudioAdapter';
import { AmixerAudioAdapter } from './AmixerAudioAdapter';

export interface AudioAdapterOptions {
  sinkName?: string;
  mixerControl?: string;
}

/**
 * Factory for creating audio adapters
 * Probes the host for a usable audio utility when asked for `auto`
 */
export class AudioAdapterFactory {
  /**
   * Create an adapter for the specified backend
   */
  static createAdapter(
    backend: AudioBackend,
    runner: CommandRunner,
    options: AudioAdapterOptions = {}
  ): IAudioAdapter {
    switch (backend) {
      case 'pactl':
        return new PactlAudioAdapter(runner, options.sinkName);
      case 'amixer':
        return new AmixerAudioAdapter(runner, options.mixerControl);
      default: {
        const _exhaustive: never = backend;
        throw new Error(`Unsupported audio backend: ${String(_exhaustive)}`);
      }
    }
  }

  /**
   * Turn a backend setting into a concrete backend.
   * `auto` prefers pactl, then amixer; when neither runs it stays on pactl so
   * each request reports the missing utility.
   */
  static async resolveBackend(
    requested: AudioBackendSetting,
    runner: CommandRunner
  ): Promise<AudioBackend> {
    if (requested !== 'auto') {
      return requested;
    }

    const candidates: AudioBackend[] = ['pactl', 'amixer'];
    for (const candidate of candidates) {
      if (await this.isAvailable(candidate, runner)) {
        return candidate;
      }
    }

    console.warn('[AudioAdapterFactory] Neither pactl nor amixer could be run, defaulting to pactl');
    return 'pactl';
  }

  /**
   * Resolve the backend setting and create the matching adapter
   */
  static async createForHost(
    requested: AudioBackendSetting,
    runner: CommandRunner,
    options: AudioAdapterOptions = {}
  ): Promise<IAudioAdapter> {
    const backend = await this.resolveBackend(requested, runner);
    return this.createAdapter(backend, runner, options);
  }

  private static async isAvailable(backend: AudioBackend, runner: CommandRunner): Promise<boolean> {
    try {
      await runner.run(backend, ['--version']);
      return true;
    } catch (error) {
      if (error instanceof AdapterError) {
        console.log(`[AudioAdapterFactory] ${backend} not usable: ${error.message}`);
        return false;
      }
      throw error;
    }
  }
}
