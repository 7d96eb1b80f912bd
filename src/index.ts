export * from './types';
export * from './core/coords';
export * from './core/config';
export * from './core/errors';
export * from './core/logger';
export * from './core/nodeTypes';
export * from './core/port';
export * from './core/node';
export * from './core/edge';
export * from './core/gesture';
export * from './core/notifications';
export * from './core/document';
export * from './core/invariants';
export * from './core/registry';
export * from './io/documentFile';
export * from './state/store';
export * from './state/autosave';
export * from './react/useGraph';
