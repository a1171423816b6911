import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { UnitCatalog } from '../../../src/core/catalog/unit-catalog.js';
import { runStatusPipeline } from '../../../src/core/status/status-pipeline.js';
import { createTestContext, fakeDependency, fakeUnit } from '../../test-helpers.js';

function statusCatalog(journal: string[]): UnitCatalog {
  return new UnitCatalog({
    units: [
      fakeUnit('afni', journal, { check: 0 }),
      fakeUnit('fsl', journal, { check: 1 }),
      fakeUnit('vscode', journal),
      fakeUnit('broken', journal, { check: 'throw' })
    ],
    dependencies: [fakeDependency('neurodebian', ['afni', 'fsl'], journal, { check: 0 })]
  });
}

describe('runStatusPipeline', () => {
  it('reports every unit when no names are given', async () => {
    const journal: string[] = [];
    const result = await runStatusPipeline([], statusCatalog(journal), createTestContext());

    assert.equal(result.success, true);
    assert.deepEqual(
      result.data?.units.map(unit => [unit.name, unit.state, unit.isDependency]),
      [
        ['afni', 'satisfied', false],
        ['fsl', 'missing', false],
        ['vscode', 'unchecked', false],
        ['broken', 'error', false],
        ['neurodebian', 'satisfied', true]
      ]
    );
  });

  it('keeps the check error as the reason', async () => {
    const result = await runStatusPipeline(['broken'], statusCatalog([]), createTestContext());

    assert.equal(result.data?.units[0].reason, "Check for 'broken' failed: broken probe crashed");
  });

  it('marks names the catalog does not know', async () => {
    const result = await runStatusPipeline(['fsl', 'nope'], statusCatalog([]), createTestContext());

    assert.deepEqual(
      result.data?.units.map(unit => [unit.name, unit.state]),
      [
        ['fsl', 'missing'],
        ['nope', 'unknown']
      ]
    );
  });

  it('only runs checks', async () => {
    const journal: string[] = [];
    await runStatusPipeline([], statusCatalog(journal), createTestContext());

    assert.deepEqual(journal, ['check:afni', 'check:fsl', 'check:broken', 'check:neurodebian']);
  });
});
