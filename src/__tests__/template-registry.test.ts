import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '../shared/errors.js';
import type { TierVersion } from '../shared/schemas.js';
import { TemplateRegistry } from '../scaffolding/template-registry.js';
import { computeVersionHash } from '../scaffolding/version-hash.js';
import { createTempDir, type TempDir } from './test-helpers.js';

const TIERS: TierVersion[] = [
  { template: 'tier0/base_artifact', version: '1.0.0' },
  { template: 'concrete/dto', version: '1.0.0' },
];

describe('computeVersionHash', () => {
  it('hashes the artifact type, tier versions and template file', () => {
    const expected = createHash('sha256')
      .update('dto|tier0/base_artifact@1.0.0|concrete/dto@1.0.0|concrete/dto')
      .digest('hex')
      .slice(0, 8);
    expect(computeVersionHash('dto', 'concrete/dto', TIERS)).toBe(expected);
    expect(expected).toMatch(/^[0-9a-f]{8}$/);
  });

  it('changes when any tier version changes', () => {
    const bumped: TierVersion[] = [
      { template: 'tier0/base_artifact', version: '1.0.0' },
      { template: 'concrete/dto', version: '1.1.0' },
    ];
    expect(computeVersionHash('dto', 'concrete/dto', bumped)).not.toBe(computeVersionHash('dto', 'concrete/dto', TIERS));
  });
});

describe('TemplateRegistry', () => {
  let tmp: TempDir;
  let registry: TemplateRegistry;

  beforeEach(() => {
    tmp = createTempDir();
    registry = new TemplateRegistry(join(tmp.dir, 'nested', 'template_registry.yaml'));
  });

  afterEach(() => tmp.cleanup());

  it('answers lookups before the file exists', () => {
    expect(registry.lookupHash('abcd1234')).toBeNull();
    expect(registry.getCurrentVersion('dto')).toBeNull();
    expect(existsSync(registry.filePath)).toBe(false);
  });

  it('records versions and the current version per artifact type', () => {
    registry.saveVersion('abcd1234', { artifactType: 'dto', tiers: TIERS, created: '2026-01-20T14:00:00Z' });
    expect(registry.lookupHash('abcd1234')).toEqual({
      artifact_type: 'dto',
      created: '2026-01-20T14:00:00Z',
      tiers: TIERS,
    });
    expect(registry.getCurrentVersion('dto')).toBe('abcd1234');

    registry.saveVersion('0000ffff', { artifactType: 'dto', tiers: [], created: '2026-02-01T00:00:00Z' });
    expect(registry.getCurrentVersion('dto')).toBe('0000ffff');
    expect(registry.lookupHash('abcd1234')?.artifact_type).toBe('dto');
  });

  it('accepts the same entry twice', () => {
    const entry = { artifactType: 'dto', tiers: TIERS, created: '2026-01-20T14:00:00Z' };
    registry.saveVersion('abcd1234', entry);
    expect(() => registry.saveVersion('abcd1234', entry)).not.toThrow();
  });

  it('rejects a hash already recorded for different templates', () => {
    registry.saveVersion('abcd1234', { artifactType: 'dto', tiers: TIERS, created: '2026-01-20T14:00:00Z' });
    expect(() =>
      registry.saveVersion('abcd1234', { artifactType: 'worker', tiers: TIERS, created: '2026-01-20T14:00:00Z' }),
    ).toThrow(ConfigError);
  });
});
