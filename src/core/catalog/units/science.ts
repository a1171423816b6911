/**
 * Neuroimaging and scientific-computing tools
 */

import { join } from 'path';
import { CHECK_SATISFIED, type DependencyUnitDefinition, type UnitDefinition } from '../../../types/index.js';
import { aptInstall, aptUpdate, dpkgInstalled } from '../../../utils/apt.js';
import { runChecked } from '../../../utils/command-runner.js';
import { downloadFile, extractArchive } from '../../../utils/download.js';
import { expandHome } from '../../config.js';
import { attempt, commandAvailable, distroCodename, pathPresent, writeProfileBlock } from '../unit-helpers.js';

const NEURODEBIAN_SOURCES = '/etc/apt/sources.list.d/neurodebian.sources.list';
const NEURODEBIAN_KEY = '/etc/apt/trusted.gpg.d/neurodebian.asc';
const NEURODEBIAN_KEY_URL = 'https://neuro.debian.net/_static/neuro.asc';

const AFNI_INSTALLER_URL = 'https://afni.nimh.nih.gov/pub/dist/bin/misc/@update.afni.binaries';
const AFNI_PACKAGE = 'linux_ubuntu_16_64';

const FREESURFER_DEFAULT_VERSION = '7.4.1';
const MINICONDA_URL = 'https://repo.anaconda.com/miniconda/Miniconda3-latest-Linux-x86_64.sh';
const MRTRIX_REPO = 'https://github.com/MRtrix3/mrtrix3.git';
const MRTRIX_BUILD_PACKAGES = ['git', 'g++', 'python3', 'libeigen3-dev', 'zlib1g-dev', 'libqt5opengl5-dev', 'libqt5svg5-dev', 'libgl1-mesa-dev', 'libfftw3-dev', 'libtiff5-dev', 'libpng-dev'];
const ANTS_DEFAULT_VERSION = '2.5.4';

export function freesurferArchiveUrl(version: string): string {
  return `https://surfer.nmr.mgh.harvard.edu/pub/dist/freesurfer/${version}/freesurfer-linux-ubuntu22_amd64-${version}.tar.gz`;
}

export function antsArchiveUrl(version: string): string {
  return `https://github.com/ANTsX/ANTs/releases/download/v${version}/ants-${version}-ubuntu-22.04-X64-gcc.zip`;
}

export function minicondaPrefix(home: string): string {
  return join(home, 'miniconda3');
}

export const neurodebian: UnitDefinition = {
  name: 'neurodebian',
  description: 'NeuroDebian apt repository',
  category: 'science',
  install: ctx => attempt(async () => {
    const codename = await distroCodename(ctx);
    const list = await downloadFile(
      ctx.runner,
      `https://neuro.debian.net/lists/${codename}.us-nh.full`,
      ctx.config.downloadDir,
      { fileName: 'neurodebian.sources.list' }
    );
    const key = await downloadFile(ctx.runner, NEURODEBIAN_KEY_URL, ctx.config.downloadDir, { fileName: 'neurodebian.asc' });
    await runChecked(ctx.runner, 'install', ['-m', '0644', list, NEURODEBIAN_SOURCES], { sudo: true });
    await runChecked(ctx.runner, 'install', ['-m', '0644', key, NEURODEBIAN_KEY], { sudo: true });
    await aptUpdate(ctx.runner);
  }),
  check: ctx => pathPresent(ctx, NEURODEBIAN_SOURCES)
};

export const neurodebianDependency: DependencyUnitDefinition = {
  ...neurodebian,
  requires: ['afni', 'fsl', 'dcm2niix']
};

export const afni: UnitDefinition = {
  name: 'afni',
  description: 'AFNI binaries, installed under ~/abin',
  category: 'science',
  install: ctx => attempt(async () => {
    const script = await downloadFile(ctx.runner, AFNI_INSTALLER_URL, ctx.config.downloadDir);
    await runChecked(ctx.runner, 'tcsh', [script, '-package', AFNI_PACKAGE, '-do_extras', '-bindir', join(ctx.config.home, 'abin')], {
      cwd: ctx.config.downloadDir,
      env: { HOME: ctx.config.home }
    });
    await writeProfileBlock(ctx, 'afni', ['export PATH="$HOME/abin:$PATH"']);
  }),
  check: ctx => pathPresent(ctx, join(ctx.config.home, 'abin', 'afni'))
};

export const fsl: UnitDefinition = {
  name: 'fsl',
  description: 'FSL from NeuroDebian',
  category: 'science',
  install: ctx => attempt(async () => {
    await aptInstall(ctx.runner, ['fsl-complete']);
    await writeProfileBlock(ctx, 'fsl', ['[ -f /etc/fsl/fsl.sh ] && . /etc/fsl/fsl.sh']);
  }),
  check: ctx => dpkgInstalled(ctx.runner, ['fsl-complete'])
};

export const dcm2niix: UnitDefinition = {
  name: 'dcm2niix',
  description: 'DICOM to NIfTI converter from NeuroDebian',
  category: 'science',
  install: ctx => attempt(() => aptInstall(ctx.runner, ['dcm2niix'])),
  check: ctx => commandAvailable(ctx, 'dcm2niix')
};

export const freesurfer: UnitDefinition = {
  name: 'freesurfer',
  description: 'FreeSurfer, unpacked under the install prefix',
  category: 'science',
  options: [
    { name: 'licenseFile', description: 'path to the FreeSurfer license.txt', required: true },
    { name: 'version', description: `release to install (default ${FREESURFER_DEFAULT_VERSION})` }
  ],
  install: (ctx, args) => attempt(async () => {
    const version = args.version ?? FREESURFER_DEFAULT_VERSION;
    const home = join(ctx.config.installPrefix, 'freesurfer');
    const archive = await downloadFile(ctx.runner, freesurferArchiveUrl(version), ctx.config.downloadDir);
    await extractArchive(ctx.runner, archive, ctx.config.installPrefix, { sudo: true });
    const licenseFile = expandHome(args.licenseFile, ctx.config.home);
    await runChecked(ctx.runner, 'install', ['-m', '0644', licenseFile, join(home, 'license.txt')], { sudo: true });
    await writeProfileBlock(ctx, 'freesurfer', [
      `export FREESURFER_HOME="${home}"`,
      '[ -f "$FREESURFER_HOME/SetUpFreeSurfer.sh" ] && . "$FREESURFER_HOME/SetUpFreeSurfer.sh"'
    ]);
  }),
  check: ctx => pathPresent(ctx, join(ctx.config.installPrefix, 'freesurfer', 'license.txt'))
};

export const miniconda: UnitDefinition = {
  name: 'miniconda',
  description: 'Miniconda Python distribution in ~/miniconda3',
  category: 'science',
  install: ctx => attempt(async () => {
    const installer = await downloadFile(ctx.runner, MINICONDA_URL, ctx.config.downloadDir);
    await runChecked(ctx.runner, 'bash', [installer, '-b', '-u', '-p', minicondaPrefix(ctx.config.home)]);
  }),
  check: ctx => pathPresent(ctx, join(minicondaPrefix(ctx.config.home), 'bin', 'conda'))
};

export const mrtrix3: UnitDefinition = {
  name: 'mrtrix3',
  description: 'MRtrix3, built from source in ~/mrtrix3',
  category: 'science',
  install: ctx => attempt(async () => {
    const source = join(ctx.config.home, 'mrtrix3');
    await aptInstall(ctx.runner, MRTRIX_BUILD_PACKAGES);
    // A checkout left by an earlier failed build is reused
    if ((await pathPresent(ctx, join(source, '.git'))) !== CHECK_SATISFIED) {
      await runChecked(ctx.runner, 'git', ['clone', '--depth', '1', MRTRIX_REPO, source]);
    }
    await runChecked(ctx.runner, './configure', [], { cwd: source });
    await runChecked(ctx.runner, './build', [], { cwd: source });
    await writeProfileBlock(ctx, 'mrtrix3', [`export PATH="${join(source, 'bin')}:$PATH"`]);
  }),
  check: ctx => pathPresent(ctx, join(ctx.config.home, 'mrtrix3', 'bin', 'mrconvert'))
};

export const ants: UnitDefinition = {
  name: 'ants',
  description: 'ANTs prebuilt binaries, unpacked under the install prefix',
  category: 'science',
  options: [
    { name: 'version', description: `release to install (default ${ANTS_DEFAULT_VERSION})` }
  ],
  install: (ctx, args) => attempt(async () => {
    const version = args.version ?? ANTS_DEFAULT_VERSION;
    const archive = await downloadFile(ctx.runner, antsArchiveUrl(version), ctx.config.downloadDir);
    await extractArchive(ctx.runner, archive, ctx.config.installPrefix, { sudo: true });
    const bin = join(ctx.config.installPrefix, `ants-${version}`, 'bin');
    await writeProfileBlock(ctx, 'ants', [`export ANTSPATH="${bin}"`, 'export PATH="$ANTSPATH:$PATH"']);
  }),
  check: ctx => commandAvailable(ctx, 'antsRegistration')
};
