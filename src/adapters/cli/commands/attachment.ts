import { Command } from 'commander';
import { run, spaceOptions } from './shared.js';

export function createAttachmentCommand(): Command {
  const command = new Command('attachment').description('Manage page attachments');

  command
    .command('list')
    .description('List the attachments of a page')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .action((title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        const attachments = await client.getAttachments(title, space, spaceOptions(options));
        for (const attachment of attachments) {
          console.log(`📎 ${attachment.title} (v${attachment.version}, ${attachment.mediaType})`);
        }
      })
    );

  command
    .command('upload')
    .description('Attach a new file to a page')
    .argument('<file>', 'path of the file to upload')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .option('-c, --comment <text>', 'comment stored with the attachment')
    .action((file: string, title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        const attachment = await client.uploadAttachment(file, title, space, {
          ...spaceOptions(options),
          comment: options.comment,
        });
        console.log(`📎 Uploaded: ${attachment.title} (${attachment.id})`);
      })
    );

  command
    .command('update')
    .description('Upload a new version of an existing attachment')
    .argument('<file>', 'path of the file to upload')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .option('-c, --comment <text>', 'comment stored with the new version')
    .action((file: string, title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        const attachment = await client.updateAttachment(file, title, space, {
          ...spaceOptions(options),
          comment: options.comment,
        });
        console.log(`🔄 Updated: ${attachment.title} (version ${attachment.version})`);
      })
    );

  command
    .command('delete')
    .description('Delete an attachment from a page')
    .argument('<name>', 'attachment file name')
    .argument('<title>', 'page title')
    .argument('<space>', 'space name (or key with --key)')
    .option('-k, --key', 'treat <space> as a space key')
    .action((name: string, title: string, space: string, _options: object, sub: Command) =>
      run(sub, async (client, options) => {
        await client.deleteAttachment(name, title, space, spaceOptions(options));
        console.log(`🗑️  Deleted: ${name}`);
      })
    );

  return command;
}
