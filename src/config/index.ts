import { ConfigError } from '../errors.js';
import type { QueryOptions } from '../types.js';
import { QueryConfigSchema, type QueryConfig } from './schema.js';

export { QueryConfigSchema, type QueryConfig, type ProtocolName } from './schema.js';

export function resolveConfig(raw: unknown = {}): QueryConfig {
  const result = QueryConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.flatten();
    throw new ConfigError(`Invalid query configuration: ${JSON.stringify(issues)}`, issues);
  }
  return result.data;
}

function getEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = getEnvString(env, key);
  return value === undefined ? undefined : Number(value);
}

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string): boolean | string | undefined {
  const value = getEnvString(env, key);
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  // Left as a string so validation reports it.
  return value;
}

/**
 * Reads MAILBOX_QUERY_PROTOCOL, MAILBOX_QUERY_DEFAULT_LIMIT and
 * MAILBOX_QUERY_WARN_ON_UNCOMMITTED. Unset variables take the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): QueryConfig {
  const raw: Record<string, unknown> = {};
  const protocol = getEnvString(env, 'MAILBOX_QUERY_PROTOCOL');
  const defaultLimit = getEnvNumber(env, 'MAILBOX_QUERY_DEFAULT_LIMIT');
  const warnOnUncommitted = getEnvBoolean(env, 'MAILBOX_QUERY_WARN_ON_UNCOMMITTED');
  if (protocol !== undefined) raw['protocol'] = protocol;
  if (defaultLimit !== undefined) raw['defaultLimit'] = defaultLimit;
  if (warnOnUncommitted !== undefined) raw['warnOnUncommitted'] = warnOnUncommitted;
  return resolveConfig(raw);
}

export type QueryHooks = Pick<QueryOptions, 'onExecute' | 'onUncommitted'>;

/**
 * Query options for a validated config. An explicit onUncommitted hook wins;
 * otherwise warnOnUncommitted: false silences the console default.
 */
export function toQueryOptions(config: QueryConfig, hooks: QueryHooks = {}): QueryOptions {
  const onUncommitted = hooks.onUncommitted ?? (config.warnOnUncommitted ? undefined : () => undefined);
  return {
    ...(config.defaultLimit !== undefined ? { defaultLimit: config.defaultLimit } : {}),
    ...(hooks.onExecute !== undefined ? { onExecute: hooks.onExecute } : {}),
    ...(onUncommitted !== undefined ? { onUncommitted } : {}),
  };
}
