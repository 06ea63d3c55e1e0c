/**
 * Library entry: the managers behind the mihomo-manager CLI.
 */

export { HomeContext, HOME_ENV_VAR, getPlatformConfigDir } from './core/home-context';
export type { HomeResolveOptions, HomeSource } from './core/home-context';
export * from './errors';
export * from './version';
export * from './config';
export * from './service';
export * from './client';
export * from './monitor';
