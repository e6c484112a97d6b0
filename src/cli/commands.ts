import { createTranslationClient, type TranslationClient } from '../translation/client';
import type { TextFormat, TranslationClientConfig } from '../translation/types';
import { ApiError, ConfigurationError, type Logger } from '../types';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
}

export type ClientFactory = (config: TranslationClientConfig) => TranslationClient;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const VALUE_FLAGS = ['--to', '--from', '--format', '--target', '--api-key', '--base-url', '--max-retries', '--timeout'];

export const HELP = `
Translation API CLI

Usage:
  translate-cli <command> [options]

Commands:
  translate <text...>  Translate text (--to <lang> required, --from <lang>, --format text|html)
  detect <text>        Detect the language of text
  languages            List supported languages (--target <lang> for localized names)
  help                 Show this help message

Options:
  --api-key <key>      API key (default: $TRANSLATION_API_KEY)
  --base-url <url>     Service URL (default: $TRANSLATION_BASE_URL)
  --max-retries <n>    Retries for transient failures (default: 2)
  --timeout <ms>       Per-request timeout in milliseconds (default: 30000)

Examples:
  translate-cli translate "Hello world" --to nl
  translate-cli detect "Bonjour tout le monde"
  translate-cli languages --target de
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function getFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${name} requires a value`);
  }
  return value;
}

function getPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.includes(args[i])) {
      i++;
      continue;
    }
    if (args[i].startsWith('--')) {
      throw new UsageError(`Unknown option: ${args[i]}`);
    }
    positionals.push(args[i]);
  }
  return positionals;
}

function parseNumber(args: string[], name: string): number | undefined {
  const raw = getFlag(args, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new UsageError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseFormat(args: string[]): TextFormat | undefined {
  const format = getFlag(args, '--format');
  if (format === undefined || format === 'text' || format === 'html') {
    return format;
  }
  throw new UsageError(`--format must be "text" or "html", got "${format}"`);
}

function resolveConfig(args: string[], env: CliIO['env'], logger: Logger): TranslationClientConfig {
  const apiKey = getFlag(args, '--api-key') ?? env.TRANSLATION_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError('An API key is required: pass --api-key or set TRANSLATION_API_KEY');
  }

  return {
    apiKey,
    logger,
    baseURL: getFlag(args, '--base-url') ?? (env.TRANSLATION_BASE_URL || undefined),
    maxRetries: parseNumber(args, '--max-retries'),
    timeout: parseNumber(args, '--timeout'),
  };
}

function stderrLogger(io: CliIO): Logger {
  return {
    debug: (message?: unknown) => io.stderr(String(message)),
    warn: (message?: unknown, ...rest: unknown[]) => io.stderr([message, ...rest].map(String).join(' ')),
  };
}

function printJSON(io: CliIO, value: unknown): void {
  io.stdout(JSON.stringify(value, null, 2));
}

function describeError(error: unknown): string {
  if (error instanceof ApiError) {
    const detail = error.status > 0 ? ` (status ${error.status}${error.code ? `, ${error.code}` : ''})` : '';
    return `Error: ${error.message}${detail}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

async function runCommand(
  client: TranslationClient,
  command: string,
  args: string[],
  positionals: string[],
  io: CliIO
): Promise<void> {
  switch (command) {
    case 'translate': {
      const target = getFlag(args, '--to');
      if (!target) {
        throw new UsageError('translate requires --to <lang>');
      }
      if (positionals.length === 0) {
        throw new UsageError('translate requires text to translate');
      }
      const options = { target, source: getFlag(args, '--from'), format: parseFormat(args) };
      const result =
        positionals.length === 1
          ? await client.translate(positionals[0], options)
          : await client.translate(positionals, options);
      printJSON(io, result);
      break;
    }

    case 'detect': {
      if (positionals.length === 0) {
        throw new UsageError('detect requires text');
      }
      printJSON(io, await client.detect(positionals.join(' ')));
      break;
    }

    case 'languages': {
      printJSON(io, await client.languages(getFlag(args, '--target')));
      break;
    }

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Runs the CLI against `argv` (without the node and script entries) and
 * resolves with the process exit code.
 */
export async function run(
  argv: string[],
  io: CliIO,
  createClient: ClientFactory = createTranslationClient
): Promise<number> {
  const [command, ...args] = argv;

  if (!command || command === 'help' || command === '--help') {
    io.stdout(HELP);
    return EXIT_OK;
  }

  let client: TranslationClient;
  let positionals: string[];
  try {
    if (!['translate', 'detect', 'languages'].includes(command)) {
      throw new UsageError(`Unknown command: ${command}`);
    }
    positionals = getPositionals(args);
    client = createClient(resolveConfig(args, io.env, stderrLogger(io)));
  } catch (error) {
    io.stderr(describeError(error));
    if (error instanceof UsageError) {
      io.stderr('Run "translate-cli help" for usage.');
    }
    return EXIT_USAGE;
  }

  try {
    await runCommand(client, command, args, positionals, io);
    return EXIT_OK;
  } catch (error) {
    io.stderr(describeError(error));
    return error instanceof UsageError ? EXIT_USAGE : EXIT_FAILURE;
  } finally {
    client.close();
  }
}
