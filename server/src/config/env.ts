import dotenv from 'dotenv';
import { parseArgs } from 'util';
import { z } from 'zod';

dotenv.config();

const PortSchema = z.coerce.number().int().min(0).max(65535);

const ConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: PortSchema.default(65432),
  httpPort: PortSchema.default(4000),
  maxWorkers: z.coerce.number().int().min(1).default(10),
  corsOrigin: z.string().default('*'),
  clientIdleTimeoutMs: z.coerce.number().int().min(0).default(300_000),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        host: { type: 'string' },
        port: { type: 'string' },
        'max-workers': { type: 'string' },
        'http-port': { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Resolves configuration from the environment, with command-line flags
 * (`--host`, `--port`, `--max-workers`, `--http-port`) taking precedence.
 */
export function loadConfig(argv: string[] = [], source: NodeJS.ProcessEnv = process.env): ServerConfig {
  const values = parseFlags(argv);

  const parsed = ConfigSchema.safeParse({
    host: values.host ?? blankToUndefined(source.HOST),
    port: values.port ?? blankToUndefined(source.PORT),
    httpPort: values['http-port'] ?? blankToUndefined(source.HTTP_PORT),
    maxWorkers: values['max-workers'] ?? blankToUndefined(source.MAX_WORKERS),
    corsOrigin: blankToUndefined(source.CORS_ORIGIN),
    clientIdleTimeoutMs: blankToUndefined(source.CLIENT_IDLE_TIMEOUT_MS),
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
