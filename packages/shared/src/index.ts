// Shared types and constants

export * from './translation/types';
export * from './translation/engines';
export * from './translation/geometry';
export * from './translation/prompt';
export * from './ai/types';
