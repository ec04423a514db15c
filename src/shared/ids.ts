import { randomBytes } from 'node:crypto';

const WORKSPACE_ID_PREFIX = 'tf_';

/** `tf_` followed by 12 random bytes in base64url, e.g. `tf_Q2h3bXk0c1R5dGVs`. */
export function newWorkspaceId(): string {
  return WORKSPACE_ID_PREFIX + randomBytes(12).toString('base64url');
}

