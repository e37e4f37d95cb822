import type { Command } from 'commander';
import { readFile } from 'fs/promises';
import { ConfluenceClient } from '../../../core/index.js';
import { loadConfluenceConfig } from '../config.js';
import type { SpaceOptions } from '../../../types/index.js';

export type GlobalOptions = {
  baseUrl?: string;
  username?: string;
  verbose?: boolean;
  /** The space argument is a key, not a display name. */
  key?: boolean;
  body?: string;
  bodyFile?: string;
  parent?: string;
  comment?: string;
};

export function createClient(options: GlobalOptions): ConfluenceClient {
  const config = loadConfluenceConfig(process.env, options);
  return new ConfluenceClient(config, {
    onRequest: options.verbose
      ? (method, endpoint, context) =>
          console.log(`🔍 ${method} ${endpoint}${context ? ` (${context})` : ''}`)
      : undefined,
  });
}

export function spaceOptions(options: GlobalOptions): SpaceOptions {
  return { spaceNameAsKey: options.key ?? false };
}

export async function readBody(options: GlobalOptions): Promise<string | undefined> {
  if (options.bodyFile) {
    return readFile(options.bodyFile, 'utf-8');
  }
  return options.body;
}

function reportError(error: unknown, verbose: boolean): void {
  if (error instanceof Error) {
    console.error(`❌ Error: ${error.message}`);
    if (verbose && error.stack) {
      console.error(`📋 Stack trace:\n${error.stack}`);
    }
    if (error.cause) {
      console.error(`🔗 Cause: ${error.cause}`);
    }
  } else {
    console.error('❌ Error:', error);
  }
}

/**
 * Runs a command action with the client built from the command's options
 * (global flags included) and turns any failure into a message and exit
 * code 1.
 */
export async function run(
  command: Command,
  handler: (client: ConfluenceClient, options: GlobalOptions) => Promise<void>
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  try {
    const client = createClient(options);
    await handler(client, options);
  } catch (error) {
    reportError(error, options.verbose ?? false);
    process.exit(1);
  }
}
