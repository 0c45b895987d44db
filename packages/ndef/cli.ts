#!/usr/bin/env node
/**
 * tagkit-ndef - inspect and build NDEF messages from the terminal
 *
 * Usage:
 *   tagkit-ndef decode <hex> [--verbose]
 *   tagkit-ndef encode --text <text> [--lang en] [--utf16]
 *   tagkit-ndef encode --uri <uri>
 *   tagkit-ndef encode --config <k=v,...>
 */

import { parseArgs } from 'node:util';
import {
  NdefCodec,
  type NdefHooks,
  type NdefRecord,
  consoleLogger,
  createConfigRecord,
  describeMessage,
  fromHex,
  hasDescription,
  noopLogger,
  parseConfigText,
  readStatus,
  textRecord,
  toHex,
  uriRecord,
} from './src/index.js';

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logSuccess(message: string): void {
  log(`✓ ${message}`, 'green');
}

function logError(message: string): void {
  log(`✗ ${message}`, 'red');
}

function printUsage(): void {
  console.log(`
${colors.bold}tagkit-ndef${colors.reset} - inspect and build NDEF messages

${colors.cyan}Usage:${colors.reset}
  tagkit-ndef decode <hex>
  tagkit-ndef encode --text <text> [--lang <code>] [--utf16]
  tagkit-ndef encode --uri <uri>
  tagkit-ndef encode --config <k1=v1,k2=v2>

${colors.cyan}Options:${colors.reset}
  --help, -h    Show this help message
  --verbose     Log codec debug output (raw fallbacks)

${colors.cyan}Examples:${colors.reset}
  tagkit-ndef decode d1010854026568656c6c6f
  tagkit-ndef encode --uri https://example.com
  tagkit-ndef encode --config minpres=10,maxpres=90
`);
}

function hooksFor(verbose: boolean): NdefHooks {
  return { logger: verbose ? consoleLogger : noopLogger };
}

function reportFailure(error: unknown): never {
  logError(error instanceof Error ? error.message : String(error));
  if (hasDescription(error)) {
    log(error.description, 'dim');
  }
  process.exit(1);
}

function runDecode(hex: string, verbose: boolean): void {
  const bytes = fromHex(hex);
  if (!bytes) {
    reportFailure(new Error(`"${hex}" is not a valid hex string`));
  }

  const result = new NdefCodec({}, hooksFor(verbose)).tryDecode(bytes);
  if (!result.ok) {
    reportFailure(result.error);
  }

  logSuccess(readStatus(result.message.length));
  console.log();
  process.stdout.write(describeMessage(result.message));
}

interface EncodeOptions {
  text: string | undefined;
  lang: string;
  utf16: boolean;
  uri: string | undefined;
  config: string | undefined;
  verbose: boolean;
}

function recordFor(options: EncodeOptions): NdefRecord {
  if (options.text !== undefined) {
    return textRecord(options.text, {
      languageCode: options.lang,
      encoding: options.utf16 ? 'UTF-16' : 'UTF-8',
    });
  }
  if (options.uri !== undefined) {
    return uriRecord(options.uri);
  }
  if (options.config !== undefined) {
    return createConfigRecord(parseConfigText(options.config), {
      languageCode: options.lang,
    });
  }
  throw new Error('encode needs one of --text, --uri or --config');
}

function runEncode(options: EncodeOptions): void {
  try {
    const codec = new NdefCodec({}, hooksFor(options.verbose));
    console.log(toHex(codec.encode([recordFor(options)])));
  } catch (error) {
    reportFailure(error);
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printUsage();
    process.exit(0);
  }

  const command = args[0];

  if (command === 'decode') {
    const { values, positionals } = parseArgs({
      args: args.slice(1),
      options: {
        verbose: { type: 'boolean' },
      },
      allowPositionals: true,
    });

    if (positionals.length < 1) {
      logError('Missing required argument: <hex>');
      process.exit(1);
    }

    runDecode(positionals.join(''), values.verbose ?? false);
  } else if (command === 'encode') {
    const { values } = parseArgs({
      args: args.slice(1),
      options: {
        text: { type: 'string' },
        lang: { type: 'string', default: 'en' },
        utf16: { type: 'boolean' },
        uri: { type: 'string' },
        config: { type: 'string' },
        verbose: { type: 'boolean' },
      },
    });

    runEncode({
      text: values.text,
      lang: values.lang ?? 'en',
      utf16: values.utf16 ?? false,
      uri: values.uri,
      config: values.config,
      verbose: values.verbose ?? false,
    });
  } else {
    logError(`Unknown command: ${command}`);
    log('Available commands: decode, encode', 'dim');
    process.exit(1);
  }
}

main().catch(reportFailure);
