import { StartupError } from '../errors';

export type Environment = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ListenAddress {
  readonly host: string;
  readonly port: number;
}

export interface AppConfig {
  readonly environment: Environment;
  readonly credentials: readonly string[];
  readonly listen: ListenAddress;
  readonly metrics?: ListenAddress;
  readonly logLevel: LogLevel;
  readonly logDirectory?: string;
  readonly metricsPrefix: string;
}

export const CREDENTIAL_DELIMITER = ';';
export const DEFAULT_LISTEN_ADDR = ':8080';
export const DEFAULT_METRICS_PREFIX = '';
/** Dual-stack wildcard: IPv6 and, through mapped addresses, IPv4. */
export const ALL_INTERFACES = '::';

const ENVIRONMENTS: readonly Environment[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const metricsAddr = nonEmpty(env.METRICS_ADDR);
  const logDirectory = nonEmpty(env.LOG_DIR);

  return {
    environment: parseEnvironment(env.NODE_ENV),
    credentials: parseCredentials(env.GEMINI_API_KEY),
    listen: parseListenAddress(nonEmpty(env.LISTEN_ADDR) ?? DEFAULT_LISTEN_ADDR, 'LISTEN_ADDR'),
    ...(metricsAddr ? { metrics: parseListenAddress(metricsAddr, 'METRICS_ADDR') } : {}),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    ...(logDirectory ? { logDirectory } : {}),
    metricsPrefix: env.METRICS_PREFIX ?? DEFAULT_METRICS_PREFIX
  };
}

export function parseCredentials(raw: string | undefined): string[] {
  if (!raw) {
    throw new StartupError('GEMINI_API_KEY is required');
  }

  const credentials = raw.split(CREDENTIAL_DELIMITER).map(credential => credential.trim());
  const emptyAt = credentials.findIndex(credential => credential.length === 0);

  if (emptyAt !== -1) {
    throw new StartupError(`GEMINI_API_KEY contains an empty credential at position ${emptyAt}`);
  }

  return credentials;
}

/**
 * Accepts `host:port`, `:port` (all interfaces, both address families) and
 * `[v6-host]:port`.
 */
export function parseListenAddress(raw: string, name: string): ListenAddress {
  const separator = raw.lastIndexOf(':');
  if (separator === -1) {
    throw new StartupError(`${name} must be in host:port form, got "${raw}"`);
  }

  let host = raw.slice(0, separator);
  const portText = raw.slice(separator + 1);
  const port = Number(portText);

  if (portText.length === 0 || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new StartupError(`${name} has an invalid port "${portText}"`);
  }

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  return { host: host || ALL_INTERFACES, port };
}

function parseEnvironment(raw: string | undefined): Environment {
  const environment = ENVIRONMENTS.find(candidate => candidate === raw);
  return environment ?? 'development';
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === '') {
    return 'info';
  }

  const level = LOG_LEVELS.find(candidate => candidate === raw.toLowerCase());
  if (!level) {
    throw new StartupError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
