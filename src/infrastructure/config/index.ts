export { resolveSettings, loadSettingsFromEnv, loadTlsMaterial, credentialsFrom } from './settings.js';
export type { TlsMaterial } from './settings.js';
