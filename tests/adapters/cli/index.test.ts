import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCLI } from '../../../src/adapters/cli/index.js';
import { FakeConfluence } from '../../helpers/fake-confluence.js';

describe('createCLI', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('registers the resource commands', () => {
    const program = createCLI();
    expect(program.commands.map((command) => command.name())).toEqual([
      'verify',
      'space',
      'page',
      'attachment',
    ]);
    const page = program.commands.find((command) => command.name() === 'page');
    expect(page?.commands.map((command) => command.name())).toEqual(['get', 'add', 'update', 'delete']);
  });

  it('prints a page body using env settings and global flags', async () => {
    const fake = new FakeConfluence().addSpace('OPS', 'Operations');
    fake.seedPage('Runbook', 'OPS', '<h1>Steps</h1>');
    vi.stubGlobal('fetch', fake.fetch);
    vi.stubEnv('CONFLUENCE_BASE_URL', 'https://wiki.test');
    vi.stubEnv('CONFLUENCE_USERNAME', 'someone-else');
    vi.stubEnv('CONFLUENCE_PASSWORD', 'test-secret');
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await createCLI().parseAsync([
      'node',
      'confluence-pages',
      '--username',
      'tester',
      'page',
      'get',
      'Runbook',
      'Operations',
    ]);

    expect(write).toHaveBeenCalledWith('<h1>Steps</h1>');
  });
});
