import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadRunManifest } from '@/modules/grid-mapping/index.js';

describe('loadRunManifest', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-manifest-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const writeManifest = async (contents: string): Promise<string> => {
    const manifestPath = path.join(tmpDir, 'pipelines.yaml');
    await fs.writeFile(manifestPath, contents);
    return manifestPath;
  };

  it('resolves paths against the manifest directory and fills defaults', async () => {
    const manifestPath = await writeManifest(
      [
        'reference:',
        '  cropMapping: data/crops.csv',
        '  gridShares: data/shares.csv',
        'pipelines:',
        '  - domain: crop',
        '    input: raw/pam.csv',
      ].join('\n')
    );

    const manifest = (await loadRunManifest(manifestPath))._unsafeUnwrap();

    expect(manifest.reference).toEqual({
      cropMappingPath: path.join(tmpDir, 'data/crops.csv'),
      gridSharePath: path.join(tmpDir, 'data/shares.csv'),
      delimiter: ',',
      shareSumTolerance: expect.anything(),
    });
    expect(manifest.reference.shareSumTolerance.toString()).toBe('0.000001');

    const [pipeline] = manifest.pipelines;
    expect(pipeline?.domain.name).toBe('crop');
    expect(pipeline?.inputPath).toBe(path.join(tmpDir, 'raw/pam.csv'));
    expect(pipeline?.outputPath).toBe(path.join(tmpDir, 'output', 'crop_planted_area_1998_2023.csv'));
    expect(pipeline?.factDelimiter).toBe(',');
    expect(pipeline?.quoteStrings).toBe(false);
    expect(pipeline?.options.onUnmapped).toBe('drop');
    expect(pipeline?.options.adjustments).toEqual([]);
  });

  it('reads per-pipeline options', async () => {
    const manifestPath = await writeManifest(
      [
        'reference:',
        '  gridShares: shares.csv',
        '  delimiter: ";"',
        '  shareSumTolerance: 0.01',
        'outputDir: results',
        'pipelines:',
        '  - domain: forestry',
        '    input: pevs.csv',
        '    factDelimiter: ";"',
        '    onUnmapped: fail',
        '    quoteStrings: true',
        '  - domain: livestock',
        '    input: ppm.csv',
        '    output: /tmp/cattle.csv',
        '    adjustments: [fruit-unit-change-2001]',
      ].join('\n')
    );

    const manifest = (await loadRunManifest(manifestPath))._unsafeUnwrap();
    const [forestry, livestock] = manifest.pipelines;

    expect(manifest.reference.cropMappingPath).toBeUndefined();
    expect(manifest.reference.delimiter).toBe(';');
    expect(forestry?.outputPath).toBe(path.join(tmpDir, 'results', 'forestry_products_1998_2023.csv'));
    expect(forestry?.factDelimiter).toBe(';');
    expect(forestry?.quoteStrings).toBe(true);
    expect(forestry?.options.onUnmapped).toBe('fail');
    expect(manifest.reference.shareSumTolerance.toString()).toBe('0.01');
    expect(livestock?.outputPath).toBe('/tmp/cattle.csv');
    expect(livestock?.options.adjustments).toEqual(['fruit-unit-change-2001']);
  });

  it('rejects an unknown domain', async () => {
    const manifestPath = await writeManifest(
      ['reference:', '  gridShares: shares.csv', 'pipelines:', '  - domain: fishery', '    input: x.csv'].join(
        '\n'
      )
    );

    const error = (await loadRunManifest(manifestPath))._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
    if (error.type === 'SchemaValidationError') {
      expect(error.message).toBe(`Schema validation failed for ${manifestPath}`);
      expect(error.details.some((line) => line.startsWith('/pipelines/0/domain'))).toBe(true);
    }
  });

  it('rejects a manifest without pipelines', async () => {
    const manifestPath = await writeManifest(['reference:', '  gridShares: shares.csv', 'pipelines: []'].join('\n'));

    const error = (await loadRunManifest(manifestPath))._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
  });

  it('returns ParseError for malformed YAML', async () => {
    const manifestPath = await writeManifest('pipelines: [crop\n');

    const error = (await loadRunManifest(manifestPath))._unsafeUnwrapErr();

    expect(error.type).toBe('ParseError');
  });

  it('returns NotFound for a missing manifest', async () => {
    const manifestPath = path.join(tmpDir, 'absent.yaml');

    const result = await loadRunManifest(manifestPath);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFound',
      message: `Run manifest not found at ${manifestPath}`,
      path: manifestPath,
    });
  });
});
