/** Variables the pipeline injects into every render context. Never classified. */
export const SYSTEM_FIELDS: ReadonlySet<string> = new Set([
  'artifact_type',
  'version_hash',
  'timestamp',
  'output_path',
  'format',
]);

export function isSystemField(name: string): boolean {
  return SYSTEM_FIELDS.has(name);
}
