// Export all services
export * from './audio-adapters';
export * from './VolumeController';
export * from './ConfigurationManager';
export * from './ErrorHandler';
