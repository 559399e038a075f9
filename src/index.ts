export * from './types';
export * from './core/point';
export * from './core/rect';
export * from './core/rotate';
export * from './core/handles';
export * from './core/resize';
