import { TemplateIntrospector } from '../introspection/introspector.js';
import type { ConflictPolicy } from '../introspection/types.js';
import { ScaffoldMetadataConfig } from '../metadata/config.js';
import { ScaffoldMetadataParser } from '../metadata/parser.js';
import { RenderingEngine } from '../templates/engine.js';
import { LayeredValidator } from '../validation/layered-validator.js';
import { resolveSettings, type ResolvedSettings } from '../workspace/settings.js';
import { ArtifactRegistry } from './artifacts.js';
import { ScaffoldPipeline } from './pipeline.js';
import { TemplateRegistry } from './template-registry.js';

/** One fully wired set of collaborators for a workspace. */
export interface Scaffolder {
  settings: ResolvedSettings;
  engine: RenderingEngine;
  artifacts: ArtifactRegistry;
  metadataConfig: ScaffoldMetadataConfig;
  parser: ScaffoldMetadataParser;
  introspector: TemplateIntrospector;
  templateRegistry: TemplateRegistry;
  pipeline: ScaffoldPipeline;
  validator: LayeredValidator;
}

export interface ScaffolderOptions {
  conflictPolicy?: ConflictPolicy;
}

export function createScaffolder(
  settings: ResolvedSettings = resolveSettings(),
  opts: ScaffolderOptions = {},
): Scaffolder {
  const engine = RenderingEngine.initialize(settings.templateRoot);
  const artifacts = ArtifactRegistry.load(settings.artifactsPath);
  const metadataConfig = ScaffoldMetadataConfig.load(settings.metadataConfigPath);
  const introspector = new TemplateIntrospector(engine, opts.conflictPolicy);
  const templateRegistry = new TemplateRegistry(settings.templateRegistryPath);
  const pipeline = new ScaffoldPipeline({
    engine,
    artifacts,
    metadataConfig,
    outputRoot: settings.outputRoot,
    templateRegistry,
    introspector,
  });
  const parser = new ScaffoldMetadataParser(metadataConfig);
  return {
    settings,
    engine,
    artifacts,
    metadataConfig,
    parser,
    introspector,
    templateRegistry,
    pipeline,
    validator: new LayeredValidator({ engine, artifacts, parser, templateRegistry }),
  };
}
