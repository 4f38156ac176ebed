import { MAX_PERCENT, MIN_PERCENT } from '../../models';
import { AdapterError } from './types';

// Values are checked here, at the last step before they become command arguments

export function assertLevel(percent: unknown): asserts percent is number {
  if (
    typeof percent !== 'number' ||
    !Number.isInteger(percent) ||
    percent < MIN_PERCENT ||
    percent > MAX_PERCENT
  ) {
    throw new AdapterError(
      `Volume must be an integer between ${MIN_PERCENT} and ${MAX_PERCENT}, got ${String(percent)}`,
      'InvalidArgument',
      'Clamp and round the level before handing it to the adapter.'
    );
  }
}

export function assertMuteFlag(muted: unknown): asserts muted is boolean {
  if (typeof muted !== 'boolean') {
    throw new AdapterError(
      `Mute flag must be a boolean, got ${String(muted)}`,
      'InvalidArgument',
      'Pass true or false; toggling is done by the controller.'
    );
  }
}
