import { InvalidArgumentError } from '../../core/index.js';
import type { ConfluenceConfig } from '../../types/index.js';

export interface ConnectionFlags {
  baseUrl?: string;
  username?: string;
}

const REQUIRED_VARIABLES = ['CONFLUENCE_BASE_URL', 'CONFLUENCE_USERNAME', 'CONFLUENCE_PASSWORD'] as const;

/**
 * Reads connection settings from the environment. Flags win over
 * variables; the password is only ever taken from the environment.
 */
export function loadConfluenceConfig(
  env: NodeJS.ProcessEnv,
  flags: ConnectionFlags = {}
): ConfluenceConfig {
  const values = {
    CONFLUENCE_BASE_URL: flags.baseUrl ?? env.CONFLUENCE_BASE_URL,
    CONFLUENCE_USERNAME: flags.username ?? env.CONFLUENCE_USERNAME,
    CONFLUENCE_PASSWORD: env.CONFLUENCE_PASSWORD,
  };

  const missing = REQUIRED_VARIABLES.filter((name) => !values[name]);
  if (missing.length > 0) {
    throw new InvalidArgumentError(`Missing Confluence settings: ${missing.join(', ')}`);
  }

  const baseUrl = values.CONFLUENCE_BASE_URL ?? '';
  if (!/^https?:\/\//.test(baseUrl)) {
    throw new InvalidArgumentError(`Invalid Confluence URL: ${baseUrl}`, { argument: 'baseUrl' });
  }

  return {
    baseUrl,
    username: values.CONFLUENCE_USERNAME ?? '',
    password: values.CONFLUENCE_PASSWORD ?? '',
  };
}
