// Types and interfaces
export { IAudioAdapter, CommandRunner, CommandResult, AdapterError, AdapterErrorKind, AdapterErrorDetails } from './types';

// Command execution
export { ExecFileCommandRunner, classifyExecFailure, DEFAULT_COMMAND_TIMEOUT_MS } from './CommandRunner';

// Utility-specific adapters
export { PactlAudioAdapter, parsePactlVolume, parsePactlMute } from './PactlAudioAdapter';
export { AmixerAudioAdapter, parseAmixerState } from './AmixerAudioAdapter';

// Factory
export { AudioAdapterFactory, AudioAdapterOptions } from './AdapterFactory';
