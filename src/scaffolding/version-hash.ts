import { createHash } from 'node:crypto';
import type { TierVersion } from '../shared/schemas.js';

/**
 * First 8 hex digits of SHA-256 over
 * `artifactType|tier@version|…|templateFile`. Any template version bump in
 * the chain yields a new hash.
 */
export function computeVersionHash(artifactType: string, templateFile: string, tiers: TierVersion[]): string {
  const parts = [artifactType, ...tiers.map((t) => `${t.template}@${t.version}`), templateFile];
  return createHash('sha256').update(parts.join('|')).digest('hex').slice(0, 8);
}
