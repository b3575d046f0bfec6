export { parseEnvInt, parseEnvFloat } from './env-utils';
export type { EnvSource } from './env-utils';
