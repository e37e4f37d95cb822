import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { createAttachmentCommand } from './commands/attachment.js';
import { createPageCommand } from './commands/page.js';
import { createSpaceCommand, createVerifyCommand } from './commands/space.js';

loadEnv();

export function createCLI(): Command {
  const program = new Command()
    .name('confluence-pages')
    .description('Manage Confluence pages and attachments by space name and page title')
    .version('0.1.0')
    .option('--base-url <url>', 'Confluence base URL (default: $CONFLUENCE_BASE_URL)')
    .option('-u, --username <name>', 'user name (default: $CONFLUENCE_USERNAME)')
    .option('--verbose', 'log every API request and print stack traces');

  program.addCommand(createVerifyCommand());
  program.addCommand(createSpaceCommand());
  program.addCommand(createPageCommand());
  program.addCommand(createAttachmentCommand());

  return program;
}
