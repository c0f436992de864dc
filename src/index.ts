export * from './shared/types/zoom';
export * from './zoom/easing';
export * from './zoom/command-queue';
export * from './zoom/cursor-sampler';
export * from './zoom/zoom-state-machine';
export * from './zoom/zoom-session';
export * from './display/coordinate-classifier';
export * from './display/display-registry';
export * from './display/coordinate-mapper';
export * from './display/display-enumerator';
export * from './config/profile-store';
export * from './config/config-manager';
export * from './remote/protocol';
export * from './remote/server';
export { createCursorZoomApp, applyEnvironment } from './main/index';
export type { CursorZoomApp, CreateAppOptions } from './main/index';
