import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { UnitCatalog } from '../../../src/core/catalog/unit-catalog.js';
import { resolveDependencies } from '../../../src/core/install/dependency-resolver.js';
import { createTestContext, fakeDependency, fakeUnit, type FakeUnitOptions } from '../../test-helpers.js';

function neuroCatalog(journal: string[], neurodebian: FakeUnitOptions = { check: 1 }): UnitCatalog {
  return new UnitCatalog({
    units: ['afni', 'fsl', 'docker', 'neurodebian'].map(name => fakeUnit(name, journal)),
    dependencies: [fakeDependency('neurodebian', ['afni', 'fsl'], journal, neurodebian)]
  });
}

describe('resolveDependencies', () => {
  it('installs a triggered dependency once and leaves an untouched request alone', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['afni', 'fsl', 'docker'], neuroCatalog(journal), createTestContext());

    assert.deepEqual(journal, ['check:neurodebian', 'install:neurodebian']);
    assert.deepEqual(result.plan, ['afni', 'fsl', 'docker']);
    assert.deepEqual(result.installed, ['neurodebian']);
    assert.deepEqual(result.satisfied, []);
    assert.equal(result.failure, undefined);
  });

  it('removes a directly requested dependency from the plan', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['afni', 'fsl', 'neurodebian'], neuroCatalog(journal), createTestContext());

    assert.deepEqual(journal, ['check:neurodebian', 'install:neurodebian']);
    assert.deepEqual(result.plan, ['afni', 'fsl']);
  });

  it('skips the install when the check reports the dependency satisfied', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['afni'], neuroCatalog(journal, { check: 0 }), createTestContext());

    assert.deepEqual(journal, ['check:neurodebian']);
    assert.deepEqual(result.plan, ['afni']);
    assert.deepEqual(result.installed, []);
    assert.deepEqual(result.satisfied, ['neurodebian']);
  });

  it('still removes a satisfied dependency that was also requested', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['neurodebian', 'afni'], neuroCatalog(journal, { check: 0 }), createTestContext());

    assert.deepEqual(journal, ['check:neurodebian']);
    assert.deepEqual(result.plan, ['afni']);
  });

  it('neither checks nor installs a dependency whose requires list misses the request', async () => {
    const journal: string[] = [];
    const requested = ['docker'];
    const result = await resolveDependencies(requested, neuroCatalog(journal), createTestContext());

    assert.deepEqual(journal, []);
    assert.deepEqual(result.plan, ['docker']);
    assert.deepEqual(requested, ['docker']);
  });

  it('always installs a dependency that has no check', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['fsl'], neuroCatalog(journal, {}), createTestContext());

    assert.deepEqual(journal, ['install:neurodebian']);
    assert.deepEqual(result.installed, ['neurodebian']);
  });

  it('treats a check that throws as not satisfied', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['afni'], neuroCatalog(journal, { check: 'throw' }), createTestContext());

    assert.deepEqual(journal, ['check:neurodebian', 'install:neurodebian']);
    assert.deepEqual(result.installed, ['neurodebian']);
    assert.equal(result.failure, undefined);
  });

  it('does not mutate the caller array', async () => {
    const journal: string[] = [];
    const requested = ['afni', 'neurodebian'];
    await resolveDependencies(requested, neuroCatalog(journal), createTestContext());

    assert.deepEqual(requested, ['afni', 'neurodebian']);
  });

  it('stops at the first failing dependency install', async () => {
    const journal: string[] = [];
    const catalog = new UnitCatalog({
      units: ['afni', 'mrtrix3'].map(name => fakeUnit(name, journal)),
      dependencies: [
        fakeDependency('neurodebian', ['afni'], journal, { check: 1, fail: true }),
        fakeDependency('build-tools', ['mrtrix3'], journal, { check: 1 })
      ]
    });

    const result = await resolveDependencies(['afni', 'mrtrix3'], catalog, createTestContext());

    assert.deepEqual(journal, ['check:neurodebian', 'install:neurodebian']);
    assert.equal(result.failure?.unit, 'neurodebian');
    assert.equal(result.failure?.duringResolution, true);
    assert.equal(result.failure?.error.message, 'neurodebian exited with status 100');
    assert.deepEqual(result.installed, []);
  });

  it('turns a throwing dependency install into a failure', async () => {
    const journal: string[] = [];
    const result = await resolveDependencies(['afni'], neuroCatalog(journal, { throws: true }), createTestContext());

    assert.equal(result.failure?.unit, 'neurodebian');
    assert.equal(result.failure?.error.message, 'neurodebian blew up');
  });

  it('installs several triggered dependencies in declaration order', async () => {
    const journal: string[] = [];
    const catalog = new UnitCatalog({
      units: ['afni', 'mrtrix3'].map(name => fakeUnit(name, journal)),
      dependencies: [
        fakeDependency('build-tools', ['mrtrix3'], journal),
        fakeDependency('neurodebian', ['afni'], journal)
      ]
    });

    const result = await resolveDependencies(['afni', 'mrtrix3'], catalog, createTestContext());

    assert.deepEqual(journal, ['install:build-tools', 'install:neurodebian']);
    assert.deepEqual(result.plan, ['afni', 'mrtrix3']);
  });

  it('resolves a single level only', async () => {
    const journal: string[] = [];
    const catalog = new UnitCatalog({
      units: [fakeUnit('analysis', journal)],
      dependencies: [
        fakeDependency('conda-base', ['toolbox'], journal),
        fakeDependency('toolbox', ['analysis'], journal)
      ]
    });

    const result = await resolveDependencies(['analysis'], catalog, createTestContext());

    assert.deepEqual(journal, ['install:toolbox']);
    assert.deepEqual(result.plan, ['analysis']);
  });

  it('does not trigger on a dependency name it already removed', async () => {
    const journal: string[] = [];
    const catalog = new UnitCatalog({
      units: [fakeUnit('analysis', journal), fakeUnit('toolbox', journal)],
      dependencies: [
        fakeDependency('toolbox', ['analysis'], journal),
        fakeDependency('conda-base', ['toolbox'], journal)
      ]
    });

    const result = await resolveDependencies(['analysis', 'toolbox'], catalog, createTestContext());

    assert.deepEqual(journal, ['install:toolbox']);
    assert.deepEqual(result.plan, ['analysis']);
  });

  it('passes the configured options to the dependency install', async () => {
    const journal: string[] = [];
    const catalog = neuroCatalog(journal, {
      check: 1,
      options: [{ name: 'mirror', description: 'apt mirror' }]
    });
    const ctx = createTestContext({ config: { unitOptions: { neurodebian: { mirror: 'us-nh' } } } });

    await resolveDependencies(['afni'], catalog, ctx);

    assert.deepEqual(journal, ['check:neurodebian', 'install:neurodebian(mirror=us-nh)']);
  });
});
