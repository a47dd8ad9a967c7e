import { readFile } from 'fs/promises';
import { SandboxedPath } from './paths.js';
import { encodeBasicCredential, parseCredentialPair } from './auth.js';
import { ConfigError } from './errors.js';

export interface TlsCredentials {
  cert: Buffer;
  key: Buffer;
}

/** Process-wide, read-only after startup */
export interface ServerConfig {
  readonly root: SandboxedPath;
  /** base64 of `user:pass`, as carried by a Basic Authorization header */
  readonly credential: string | null;
  readonly tls: TlsCredentials | null;
}

export interface RuntimeOptions {
  port: number;
  host: string;
  corsOrigin: string;
  trustProxy: string;
  rateLimitWrite: number;
  logRequests: boolean;
}

export interface LoadedConfig {
  server: ServerConfig;
  runtime: RuntimeOptions;
}

type Env = Record<string, string | undefined>;

function parseIntOption(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value < 0) throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  return value;
}

async function loadTls(env: Env): Promise<TlsCredentials | null> {
  const certPath = env.TLS_CERT || '';
  const keyPath = env.TLS_KEY || '';
  if (!certPath && !keyPath) return null;
  if (!certPath || !keyPath) throw new ConfigError('TLS_CERT and TLS_KEY must be set together');
  try {
    const [cert, key] = await Promise.all([readFile(certPath), readFile(keyPath)]);
    return { cert, key };
  } catch (err) {
    throw new ConfigError(`cannot read TLS material: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Build the startup configuration from environment variables (see .env.example) */
export async function loadConfig(env: Env = process.env, cwd = process.cwd()): Promise<LoadedConfig> {
  const port = parseIntOption(env, 'PORT', 8080);
  if (port > 65535) throw new ConfigError(`invalid port: ${port}`);

  let credential: string | null = null;
  if (env.AUTH) {
    const pair = parseCredentialPair(env.AUTH);
    if (!pair) throw new ConfigError('AUTH must look like user:pass');
    credential = encodeBasicCredential(pair.user, pair.password);
  }

  const root = await SandboxedPath.open(env.SHARE_DIR || cwd);
  const tls = await loadTls(env);

  return {
    server: Object.freeze({ root, credential, tls }),
    runtime: {
      port,
      host: env.HOST || '0.0.0.0',
      corsOrigin: env.CORS_ORIGIN || '',
      trustProxy: env.TRUST_PROXY || '',
      rateLimitWrite: parseIntOption(env, 'RATE_LIMIT_WRITE', 60),
      logRequests: env.LOG_REQUESTS !== 'false',
    },
  };
}
