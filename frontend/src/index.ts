export * from './catalog';
export * from './search';
export * from './playback';
export { loadConfig } from './config';
export type { EnvSource, PlayerConfig } from './config';
export { createPlayerApp } from './app';
export type { PlayerApp, PlayerAppDeps } from './app';
