export { env, KEY_SIZE_OPTIONS } from './env.js';
export type { AppEnvironment } from './env.js';
