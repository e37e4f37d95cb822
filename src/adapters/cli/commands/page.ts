import { Command } from 'commander';
import { readBody, run, spaceOptions } from './shared.js';

export function createPageCommand(): Command {
  const command = new Command('page').description('Create, read, update and delete pages');

  command
    .command('get')
    .description('Print the storage-format body of a page')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .action((title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        process.stdout.write(await client.getPageContents(title, space, spaceOptions(options)));
      })
    );

  command
    .command('add')
    .description('Create a page')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .option('-b, --body <markup>', 'page body in storage format')
    .option('-f, --body-file <path>', 'read the page body from a file')
    .option('--parent <title>', 'title of the parent page in the same space')
    .action((title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        const pageId = await client.addPage(title, space, {
          ...spaceOptions(options),
          body: await readBody(options),
          parentTitle: options.parent,
        });
        console.log(`📄 Created: ${title} (${pageId})`);
        console.log(`🔗 ${client.getPageUrl(pageId)}`);
      })
    );

  command
    .command('update')
    .description('Replace the body of a page')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .option('-b, --body <markup>', 'page body in storage format')
    .option('-f, --body-file <path>', 'read the page body from a file')
    .action((title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        const body = await readBody(options);
        if (body === undefined) {
          throw new Error('Either --body or --body-file is required');
        }
        const page = await client.updatePage(title, space, body, spaceOptions(options));
        console.log(`🔄 Updated: ${page.title} (${page.id}, version ${page.version})`);
      })
    );

  command
    .command('delete')
    .description('Delete a page')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .action((title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        await client.deletePage(title, space, spaceOptions(options));
        console.log(`🗑️  Deleted: ${title}`);
      })
    );

  return command;
}
