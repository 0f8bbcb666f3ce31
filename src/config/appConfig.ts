import { Env, LogLevel, NodeEnv, readEnv } from './env';

/**
 * Application configuration
 *
 * Built once at startup from the validated environment and handed to
 * createApp() as part of the AppContext. Every level is frozen.
 */
export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly service: {
    readonly name: string;
    readonly version: string;
  };
  readonly database: {
    readonly uri: string;
    readonly maxConnections: number;
    readonly ssl: boolean;
  };
  readonly logging: LoggingConfig;
  readonly http: {
    readonly forceHttps: boolean;
    readonly trustProxy: boolean;
    readonly bodyLimit: string;
    readonly rateLimit: {
      readonly windowMs: number;
      readonly maxRequests: number;
    };
  };
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly pretty: boolean;
}

export const SERVICE_INFO = {
  name: 'Account REST API Service',
  version: '1.0',
} as const;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export function buildConfig(env: Env): AppConfig {
  return deepFreeze({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    service: { ...SERVICE_INFO },
    database: {
      uri: env.DATABASE_URI,
      maxConnections: env.DB_MAX_CONNECTIONS,
      ssl: env.DB_SSL,
    },
    logging: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV === 'development' && env.LOG_PRETTY,
    },
    http: {
      forceHttps: env.FORCE_HTTPS,
      trustProxy: env.TRUST_PROXY,
      bodyLimit: '10kb',
      rateLimit: {
        windowMs: env.RATE_LIMIT_WINDOW_MS,
        maxRequests: env.RATE_LIMIT_MAX,
      },
    },
  });
}

/**
 * Read, validate and freeze configuration from an environment
 * (process.env plus .env when no source is given)
 */
export function loadConfig(source?: NodeJS.ProcessEnv): AppConfig {
  return buildConfig(readEnv(source));
}
