import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
export const DEFAULT_MODEL = 'gemini-1.5-flash';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    port: number;
  };
  model: {
    apiKey?: string;
    baseUrl: string;
    name: string;
    maxTurns: number;
  };
  email: {
    recipients: string[];
  };
}

// Zod validation schema
export const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    port: z.number().int().min(1).max(65535),
  }),
  model: z.object({
    // A missing key only surfaces when the first agent call fails
    apiKey: z.string().optional(),
    baseUrl: z.string().url('Invalid model base URL format'),
    name: z.string().min(1, 'Model name must not be empty'),
    maxTurns: z.number().int().min(1).max(50),
  }),
  email: z.object({
    recipients: z.array(z.string().min(1)).min(1, 'At least 1 recipient is required'),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --model gemini-1.5-flash --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from environment variables or CLI arguments.
 * CLI arguments win over the environment. Throws a ZodError when invalid.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKeys: string[], defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    for (const envKey of envKeys) {
      const envValue = env[envKey];
      if (envValue) return envValue;
    }
    return defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : (envValue === 'false' ? false : defaultValue);
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = getString(cliKey, [envKey], '');
    return value ? parseInt(value, 10) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = getString(cliKey, [envKey], '');
    if (!value) return defaultValue;
    return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
  };

  const apiKey = getString('api-key', ['MODEL_API_KEY', 'GEMINI_API_KEY'], '');

  const rawConfig = {
    server: {
      name: getString('server-name', ['SERVER_NAME'], 'meeting-summarizer'),
      version: getString('server-version', ['SERVER_VERSION'], '0.1.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      port: getNumber('port', 'PORT', 8000),
    },
    model: {
      apiKey: apiKey || undefined,
      baseUrl: getString('base-url', ['MODEL_BASE_URL'], DEFAULT_BASE_URL),
      name: getString('model', ['MODEL_NAME'], DEFAULT_MODEL),
      maxTurns: getNumber('max-turns', 'AGENT_MAX_TURNS', 10),
    },
    email: {
      recipients: getStringArray('recipients', 'EMAIL_RECIPIENTS', ['team@example.com']),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Print a validation failure field by field
 */
export function printConfigErrors(error: z.ZodError): void {
  console.error('\n❌ Configuration Validation Failed!\n');
  console.error('Errors:');
  error.errors.forEach(err => {
    const path = err.path.join('.');
    console.error(`  • ${path || 'root'}: ${err.message}`);
  });
  console.error('\n💡 Tips:');
  console.error('  - Check your .env file');
  console.error('  - Verify CLI arguments');
  console.error('  - The model base URL must be valid (e.g., https://api.openai.com/v1)');
  console.error();
}

/**
 * Print configuration summary at startup
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║              Meeting Summarizer - Configuration                  ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🌐 Port: ${config.server.port}`);
  console.error(`🔗 Model endpoint: ${config.model.baseUrl}`);
  console.error(`🤖 Model: ${config.model.name} (max ${config.model.maxTurns} turns per agent)`);
  console.error(`🔑 API key: ${config.model.apiKey ? 'set' : 'not set'}`);
  console.error(`📧 Summary recipients: ${config.email.recipients.join(', ')}`);

  console.error('\n' + '─'.repeat(68));
}
