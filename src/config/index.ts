export { OAuthConfig, createOAuthConfigSchema, checkEndpointUri } from './oauth-config.js';
export type { OAuthConfigInput, OAuthConfigOptions } from './oauth-config.js';
export { PROVIDER_PRESETS, PRESET_NAMES, findPreset } from './providers.js';
export type { StaticProvider } from './providers.js';
export { fromEnvironment, environmentPrefix } from './from-environment.js';
export type { FromEnvironmentOptions } from './from-environment.js';
