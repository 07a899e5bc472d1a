import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { execaSync } from 'execa';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ExecaGitAdapter } from '../adapters/git/execa.js';
import { RepositoryProvisioner } from '../pipeline/provisioner.js';
import { createNullLogger } from '../logging.js';
import { ProviderError } from '../utils/errors.js';
import { FakeProvider, createVirtualTime } from './fakes.js';

const gitAvailable = execaSync('git', ['--version'], { reject: false }).exitCode === 0;

describe.skipIf(!gitAvailable)('ExecaGitAdapter', () => {
  let root: string;
  let git: ExecaGitAdapter;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'pagesmith-git-'));
    // keep the host's git configuration out of the run
    const globalConfig = path.join(root, 'gitconfig');
    await fs.writeFile(globalConfig, '', 'utf-8');
    vi.stubEnv('GIT_CONFIG_GLOBAL', globalConfig);
    vi.stubEnv('GIT_CONFIG_NOSYSTEM', '1');
    git = new ExecaGitAdapter(30_000);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('returns non-zero exits instead of throwing', async () => {
    const result = await git.run(['rev-parse', 'HEAD'], { cwd: root });

    expect(result.code).not.toBe(0);
    expect(result.stderr).toContain('not a git repository');
  });

  it('disables terminal prompts', async () => {
    const shell = new ExecaGitAdapter(30_000, 'sh');

    const result = await shell.run(['-c', 'printf %s "$GIT_TERMINAL_PROMPT"'], { cwd: root });

    expect(result).toEqual({ code: 0, stdout: '0', stderr: '' });
  });

  it('reports a timed out command as a failure', async () => {
    const slow = new ExecaGitAdapter(50, 'sleep');

    const result = await slow.run(['5'], { cwd: root });

    expect(result.code).toBe(1);
  });

  it('reports a missing binary as a failure', async () => {
    const missing = new ExecaGitAdapter(30_000, 'pagesmith-no-such-binary');

    const result = await missing.run(['status'], { cwd: root });

    expect(result.code).toBe(1);
    expect(result.stderr).not.toBe('');
  });

  describe('with the provisioner', () => {
    let workDir: string;
    let bareDir: string;
    let provider: FakeProvider;
    let provisioner: RepositoryProvisioner;

    beforeEach(async () => {
      workDir = path.join(root, 'work');
      bareDir = path.join(root, 'remote.git');
      await fs.mkdir(workDir);
      expect((await git.run(['init', '--bare', bareDir], { cwd: root })).code).toBe(0);

      provider = new FakeProvider('acct');
      provider.remoteUrlFor = () => bareDir;
      provisioner = new RepositoryProvisioner({
        provider,
        git,
        logger: createNullLogger(),
        settings: {
          defaultBranch: 'main',
          pagesDomain: 'pages-domain',
          descriptionMaxLength: 100,
          deletePropagationMs: 2000,
          commitMessage: 'Initial commit',
          gitTimeoutMs: 30_000,
        },
        sleep: createVirtualTime().sleep,
        now: () => new Date('2024-05-01T12:30:00Z'),
      });
    });

    it('pushes a commit whose id matches the remote branch head', async () => {
      const repo = await provisioner.provision('calc-42', { 'index.html': '<html></html>' }, 'A calculator', workDir);

      expect(repo.commitSha).toMatch(/^[0-9a-f]{40}$/);
      const head = await git.run(['rev-parse', 'refs/heads/main'], { cwd: bareDir });
      expect(head.stdout.trim()).toBe(repo.commitSha);

      const tree = await git.run(['ls-tree', '--name-only', 'main'], { cwd: bareDir });
      expect(tree.stdout.split('\n')).toEqual(['LICENSE', 'README.md', 'index.html']);
      const author = await git.run(['log', '-1', '--format=%an <%ae>|%s', 'main'], { cwd: bareDir });
      expect(author.stdout).toBe('acct <acct@users.noreply.github.com>|Initial commit');
    }, 20_000);

    it('does not let artifact files configure git', async () => {
      const marker = path.join(root, 'marker');
      const artifact = {
        'index.html': '<html></html>',
        '.git/config': `[core]\n\tfsmonitor = "touch ${marker}; false"\n`,
      };

      await provisioner.provision('calc-42', artifact, 'brief', workDir);

      await expect(fs.access(marker)).rejects.toThrow();
      const config = await fs.readFile(path.join(workDir, '.git', 'config'), 'utf-8');
      expect(config).not.toContain('fsmonitor');
    }, 20_000);

    it('raises ProviderError when the push is rejected', async () => {
      provider.remoteUrlFor = () => path.join(root, 'missing.git');

      await expect(
        provisioner.provision('calc-42', { 'index.html': 'x' }, 'brief', workDir)
      ).rejects.toBeInstanceOf(ProviderError);
    }, 20_000);
  });
});
