export type ErrorCode =
  | 'ERR_CONFIG'
  | 'ERR_TEMPLATE_NOT_FOUND'
  | 'ERR_INHERITANCE_CYCLE'
  | 'ERR_TEMPLATE_SYNTAX'
  | 'ERR_RENDER'
  | 'ERR_VALUE'
  | 'ERR_METADATA'
  | 'ERR_VALIDATION';

interface ScaffoldErrorOptions {
  hints?: string[];
  cause?: unknown;
}

/**
 * Base class for every error the scaffolding core raises. `hints` are short,
 * user-facing suggestions the CLI and API print alongside the message.
 */
export class ScaffoldError extends Error {
  readonly code: ErrorCode;
  readonly hints: string[];

  constructor(code: ErrorCode, message: string, opts: ScaffoldErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.hints = opts.hints ?? [];
  }
}

export type ConfigErrorReason =
  | 'file not found'
  | 'invalid syntax'
  | 'validation failed'
  | 'invalid value';

export class ConfigError extends ScaffoldError {
  readonly reason: ConfigErrorReason;
  readonly filePath?: string;

  constructor(
    reason: ConfigErrorReason,
    message: string,
    opts: ScaffoldErrorOptions & { filePath?: string } = {},
  ) {
    super('ERR_CONFIG', `${reason}: ${message}`, opts);
    this.reason = reason;
    this.filePath = opts.filePath;
  }
}

export class TemplateNotFoundError extends ScaffoldError {
  readonly templateName: string;

  constructor(templateName: string, opts: ScaffoldErrorOptions = {}) {
    super('ERR_TEMPLATE_NOT_FOUND', `Template not found: ${templateName}`, opts);
    this.templateName = templateName;
  }
}

export class InheritanceCycleError extends ScaffoldError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('ERR_INHERITANCE_CYCLE', `Inheritance cycle: ${cycle.join(' -> ')}`, {
      hints: ['Remove one of the {{#extends}} declarations so the chain ends at a root template'],
    });
    this.cycle = cycle;
  }
}

export class TemplateSyntaxError extends ScaffoldError {
  readonly templateName: string;

  constructor(templateName: string, message: string, opts: ScaffoldErrorOptions = {}) {
    super('ERR_TEMPLATE_SYNTAX', `${templateName}: ${message}`, opts);
    this.templateName = templateName;
  }
}

export class RenderError extends ScaffoldError {
  readonly templateName: string;

  constructor(templateName: string, message: string, opts: ScaffoldErrorOptions = {}) {
    super('ERR_RENDER', `Failed to render ${templateName}: ${message}`, opts);
    this.templateName = templateName;
  }
}

export class ValueError extends ScaffoldError {
  constructor(message: string) {
    super('ERR_VALUE', message);
  }
}

export class MetadataParseError extends ScaffoldError {
  readonly field?: string;
  readonly expected?: string;

  constructor(message: string, details: { field?: string; expected?: string } = {}) {
    super('ERR_METADATA', message, {
      hints: details.expected ? [`Expected pattern: ${details.expected}`] : [],
    });
    this.field = details.field;
    this.expected = details.expected;
  }
}

export class ValidationError extends ScaffoldError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = [], hints: string[] = []) {
    super('ERR_VALIDATION', message, { hints });
    this.missing = missing;
  }
}

export function isScaffoldError(err: unknown): err is ScaffoldError {
  return err instanceof ScaffoldError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
