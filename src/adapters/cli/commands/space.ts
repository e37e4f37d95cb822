import { Command } from 'commander';
import { run } from './shared.js';

export function createVerifyCommand(): Command {
  return new Command('verify')
    .description('Check that the configured credentials are accepted')
    .action((_options: object, command: Command) =>
      run(command, async (client) => {
        const user = await client.verifyUser();
        console.log(`✅ Authenticated as ${user.displayName} (${user.username})`);
      })
    );
}

export function createSpaceCommand(): Command {
  const command = new Command('space').description('Look up spaces');

  command
    .command('key')
    .description('Print the key of the space with this exact name')
    .argument('<name>', 'space name')
    .action((name: string, _options: object, sub: Command) =>
      run(sub, async (client) => {
        console.log(await client.resolveSpaceKey(name));
      })
    );

  command
    .command('list')
    .description('List every visible space')
    .action((_options: object, sub: Command) =>
      run(sub, async (client) => {
        for (const space of await client.getSpaces()) {
          console.log(`${space.key.padEnd(12)} ${space.name}`);
        }
      })
    );

  return command;
}
