export * from './shared/errors.js';
export { logger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './shared/logger.js';
export * from './shared/schemas.js';
export { CASE_FILTERS, pascalCase, snakeCase, kebabCase, validateIdentifier } from './templates/filters.js';
export { RenderingEngine, normalizeTemplateName, type LoadedTemplate } from './templates/engine.js';
export { HandlebarsTemplateAst } from './templates/handlebars-ast.js';
export { parseTemplateHeader } from './templates/header.js';
export { runTemplateDoctor, type DoctorReport, type DoctorCheck } from './templates/doctor.js';
export type {
  TemplateAst,
  ParsedTemplate,
  TemplateSource,
  ResolvedChain,
  TemplateSchema,
  ConflictPolicy,
} from './introspection/types.js';
export { resolveChain } from './introspection/resolver.js';
export { classify, parseConflictPolicy } from './introspection/classifier.js';
export { TemplateIntrospector } from './introspection/introspector.js';
export { SYSTEM_FIELDS, isSystemField } from './introspection/system-fields.js';
export {
  ScaffoldMetadataConfig,
  getScaffoldMetadataConfig,
  resetScaffoldMetadataConfig,
  type CommentPattern,
  type MetadataField,
} from './metadata/config.js';
export { ScaffoldMetadataParser, type ParsedMetadata } from './metadata/parser.js';
export { formatProvenanceHeader, formatTimestamp, prependProvenanceHeader } from './metadata/provenance.js';
export { ArtifactRegistry } from './scaffolding/artifacts.js';
export { computeVersionHash } from './scaffolding/version-hash.js';
export { TemplateRegistry } from './scaffolding/template-registry.js';
export { ScaffoldPipeline, type ScaffoldRequest, type ScaffoldResult, type PipelineState } from './scaffolding/pipeline.js';
export { createScaffolder, type Scaffolder } from './scaffolding/factory.js';
export {
  LayeredValidator,
  mergeTemplateRules,
  checkRule,
  RULE_LAYERS,
  type RuleLayer,
  type LayeredRule,
  type ValidationIssue,
  type ArtifactValidation,
} from './validation/layered-validator.js';
export { initWorkspace } from './workspace/init.js';
export { resolveSettings } from './workspace/settings.js';
export type { LoadResult } from './shared/yaml.js';
