/**
 * Third-party desktop and container applications
 */

import { basename } from 'path';
import type { DependencyUnitDefinition, UnitDefinition } from '../../../types/index.js';
import { aptInstall, aptUpdate, dpkgInstalled } from '../../../utils/apt.js';
import { runChecked } from '../../../utils/command-runner.js';
import { downloadFile } from '../../../utils/download.js';
import { attempt, commandAvailable, distroCodename, pathPresent } from '../unit-helpers.js';

const DOCKER_KEY_URL = 'https://download.docker.com/linux/ubuntu/gpg';
const DOCKER_KEYRING = '/etc/apt/keyrings/docker.asc';
const DOCKER_SOURCES = '/etc/apt/sources.list.d/docker.list';
const DOCKER_PACKAGES = [
  'docker-ce',
  'docker-ce-cli',
  'containerd.io',
  'docker-buildx-plugin',
  'docker-compose-plugin'
];

const VSCODE_DEB_URL = 'https://update.code.visualstudio.com/latest/linux-deb-x64/stable';
const ZOOM_DEB_URL = 'https://zoom.us/client/latest/zoom_amd64.deb';

/**
 * Docker's apt repository. Installed automatically before `docker`.
 */
export const dockerRepository: DependencyUnitDefinition = {
  name: 'docker-repo',
  description: "Docker's apt repository and signing key",
  category: 'application',
  requires: ['docker'],
  install: ctx => attempt(async () => {
    const key = await downloadFile(ctx.runner, DOCKER_KEY_URL, ctx.config.downloadDir, { fileName: 'docker.asc' });
    await runChecked(ctx.runner, 'install', ['-D', '-m', '0644', key, DOCKER_KEYRING], { sudo: true });

    const arch = (await runChecked(ctx.runner, 'dpkg', ['--print-architecture'])).stdout.trim() || 'amd64';
    const codename = await distroCodename(ctx);
    const line = `deb [arch=${arch} signed-by=${DOCKER_KEYRING}] https://download.docker.com/linux/ubuntu ${codename} stable`;
    await runChecked(ctx.runner, 'sh', ['-c', `echo '${line}' > ${DOCKER_SOURCES}`], { sudo: true });
    await aptUpdate(ctx.runner);
  }),
  check: ctx => pathPresent(ctx, DOCKER_SOURCES)
};

export const docker: UnitDefinition = {
  name: 'docker',
  description: 'Docker Engine with the compose and buildx plugins',
  category: 'application',
  options: [
    { name: 'user', description: 'account added to the docker group (default: owner of the home directory)' }
  ],
  install: (ctx, args) => attempt(async () => {
    await aptInstall(ctx.runner, DOCKER_PACKAGES);
    const user = args.user ?? basename(ctx.config.home);
    await runChecked(ctx.runner, 'usermod', ['-aG', 'docker', user], { sudo: true });
  }),
  check: ctx => dpkgInstalled(ctx.runner, DOCKER_PACKAGES)
};

export const vscode: UnitDefinition = {
  name: 'vscode',
  description: 'Visual Studio Code',
  category: 'application',
  install: ctx => attempt(async () => {
    const deb = await downloadFile(ctx.runner, VSCODE_DEB_URL, ctx.config.downloadDir, { fileName: 'vscode.deb' });
    await aptInstall(ctx.runner, [deb]);
  }),
  check: ctx => commandAvailable(ctx, 'code')
};

export const slack: UnitDefinition = {
  name: 'slack',
  description: 'Slack desktop client (snap)',
  category: 'application',
  install: ctx => attempt(async () => {
    await runChecked(ctx.runner, 'snap', ['install', 'slack'], { sudo: true });
  }),
  check: async ctx => (await ctx.runner.run('snap', ['list', 'slack'], { probe: true })).exitCode
};

export const zoom: UnitDefinition = {
  name: 'zoom',
  description: 'Zoom meetings client',
  category: 'application',
  install: ctx => attempt(async () => {
    const deb = await downloadFile(ctx.runner, ZOOM_DEB_URL, ctx.config.downloadDir);
    await aptInstall(ctx.runner, [deb]);
  }),
  check: ctx => dpkgInstalled(ctx.runner, ['zoom'])
};
