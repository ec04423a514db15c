import type { ErrorCode, ScaffoldError } from '../shared/errors.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  ERR_TEMPLATE_NOT_FOUND: 404,
  ERR_VALIDATION: 400,
  ERR_METADATA: 400,
  ERR_VALUE: 400,
  ERR_INHERITANCE_CYCLE: 409,
  ERR_CONFIG: 500,
  ERR_TEMPLATE_SYNTAX: 500,
  ERR_RENDER: 500,
};

export function statusForError(err: ScaffoldError): number {
  return STATUS_BY_CODE[err.code];
}

export interface ErrorBody {
  error: string;
  code: ErrorCode;
  hints: string[];
  missing?: string[];
  field?: string;
}
