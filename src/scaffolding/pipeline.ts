import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { ValidationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ArtifactDefinition, TierVersion } from '../shared/schemas.js';
import { TemplateIntrospector } from '../introspection/introspector.js';
import type { TemplateSchema } from '../introspection/types.js';
import type { ScaffoldMetadataConfig } from '../metadata/config.js';
import { ScaffoldMetadataParser } from '../metadata/parser.js';
import { formatProvenanceHeader, formatTimestamp, prependProvenanceHeader } from '../metadata/provenance.js';
import type { RenderingEngine } from '../templates/engine.js';
import type { ArtifactRegistry } from './artifacts.js';
import type { TemplateRegistry } from './template-registry.js';
import { computeVersionHash } from './version-hash.js';

export type PipelineState = 'Start' | 'Introspected' | 'ContextBuilt' | 'Validated' | 'Rendered' | 'Written' | 'Failed';

export interface ScaffoldRequest {
  artifactType: string;
  context: Record<string, unknown>;
  /** Relative to the output root; replaces the path the artifact type would derive. */
  outputPath?: string;
  /** Persist the artifact under the output root. */
  write?: boolean;
  overwrite?: boolean;
  /** Clock override for the timestamp system field. */
  now?: Date;
}

export interface ScaffoldResult {
  artifactType: string;
  templateName: string;
  content: string;
  /** Relative to the output root; null for ephemeral artifacts. */
  outputPath: string | null;
  versionHash: string;
  schema: TemplateSchema;
  states: PipelineState[];
  written: boolean;
}

export interface PipelineDeps {
  engine: RenderingEngine;
  artifacts: ArtifactRegistry;
  metadataConfig: ScaffoldMetadataConfig;
  outputRoot: string;
  templateRegistry?: TemplateRegistry;
  introspector?: TemplateIntrospector;
}

interface Plan {
  def: ArtifactDefinition;
  schema: TemplateSchema;
  tiers: TierVersion[];
  versionHash: string;
  outputPath: string | null;
  context: Record<string, unknown>;
  created: string;
  updated: string | undefined;
}

const log = logger.child({ component: 'pipeline' });

/**
 * Introspect, build context, validate, render, stamp and (optionally) write one
 * artifact. Any failure ends the request in `Failed` without output.
 */
export class ScaffoldPipeline {
  readonly introspector: TemplateIntrospector;
  private readonly parser: ScaffoldMetadataParser;

  constructor(private readonly deps: PipelineDeps) {
    this.introspector = deps.introspector ?? new TemplateIntrospector(deps.engine);
    this.parser = new ScaffoldMetadataParser(deps.metadataConfig);
  }

  /** Required and optional inputs for an artifact type. */
  describe(artifactType: string): TemplateSchema {
    return this.introspector.introspect(this.deps.artifacts.get(artifactType).template);
  }

  scaffold(request: ScaffoldRequest): ScaffoldResult {
    const states: PipelineState[] = ['Start'];
    const transition = (state: PipelineState): void => {
      states.push(state);
      log.debug('scaffold state', { artifact_type: request.artifactType, state });
    };

    try {
      const def = this.deps.artifacts.get(request.artifactType);
      const schema = this.introspector.introspect(def.template);
      transition('Introspected');

      const plan = this.buildContext(def, schema, request);
      transition('ContextBuilt');

      this.validate(plan, request);
      transition('Validated');

      const body = this.deps.engine.render(def.template, plan.context);
      const content = this.stamp(plan, body);
      transition('Rendered');

      let written = false;
      if (request.write && plan.outputPath !== null) {
        const target = this.absolute(plan.outputPath);
        // Recorded first: a registry failure must leave nothing on disk.
        this.deps.templateRegistry?.saveVersion(plan.versionHash, {
          artifactType: def.type_id,
          tiers: plan.tiers,
          created: plan.created,
        });
        mkdirSync(dirname(target), { recursive: true });
        writeFileSync(target, content, 'utf8');
        written = true;
        log.info('artifact written', { artifact_type: def.type_id, path: plan.outputPath });
      }
      transition('Written');

      return {
        artifactType: def.type_id,
        templateName: def.template,
        content,
        outputPath: plan.outputPath,
        versionHash: plan.versionHash,
        schema,
        states,
        written,
      };
    } catch (err) {
      transition('Failed');
      log.warn('scaffold failed', {
        artifact_type: request.artifactType,
        after: states[states.length - 2],
        error: errorMessage(err),
      });
      throw err;
    }
  }

  private buildContext(def: ArtifactDefinition, schema: TemplateSchema, request: ScaffoldRequest): Plan {
    const tiers = schema.inheritanceChain.map((template) => ({
      template,
      version: this.deps.engine.templateVersion(template),
    }));
    const versionHash = computeVersionHash(def.type_id, def.template, tiers);
    const outputPath =
      def.output_type === 'ephemeral'
        ? null
        : (request.outputPath?.replace(/\\/g, '/') ?? this.deps.artifacts.resolveOutputPath(def, request.context));

    const timestamp = formatTimestamp(request.now ?? new Date());
    const previous = request.overwrite && outputPath !== null ? this.previousHeader(outputPath) : null;

    return {
      def,
      schema,
      tiers,
      versionHash,
      outputPath,
      created: previous?.['created'] ?? timestamp,
      updated: previous ? timestamp : undefined,
      context: {
        ...request.context,
        artifact_type: def.type_id,
        version_hash: versionHash,
        timestamp,
        output_path: outputPath ?? '',
        format: def.file_extension.slice(1),
      },
    };
  }

  private validate(plan: Plan, request: ScaffoldRequest): void {
    const absent = (name: string): boolean => plan.context[name] === undefined || plan.context[name] === null;
    const missing = plan.schema.required.filter(absent);
    const nameField = plan.def.name_field;
    const unnamed = plan.def.output_type === 'file' && plan.outputPath === null;
    if (unnamed && absent(nameField) && !missing.includes(nameField)) {
      missing.push(nameField);
    }
    if (missing.length > 0) {
      missing.sort();
      throw new ValidationError(
        `Missing required fields for ${plan.def.type_id}: ${missing.join(', ')}`,
        missing,
        [`Supply them with ${missing.map((name) => `--set ${name}=<value>`).join(' ')}`],
      );
    }
    if (unnamed) {
      throw new ValidationError(
        `Field ${nameField} must be a non-empty string or a number to name the ${plan.def.type_id} file`,
        [],
        [`Pass --set ${nameField}=<name> or choose the path with --out`],
      );
    }

    if (plan.outputPath !== null) {
      const target = this.absolute(plan.outputPath);
      if (request.write && !request.overwrite && existsSync(target)) {
        throw new ValidationError(`Output file already exists: ${plan.outputPath}`, [], [
          'Pass --overwrite to regenerate it',
        ]);
      }
    }
  }

  private stamp(plan: Plan, body: string): string {
    const pattern = this.deps.metadataConfig.patternForExtension(plan.def.file_extension);
    if (!pattern) return body;
    const header = formatProvenanceHeader(
      {
        syntax: pattern.syntax,
        templateId: plan.def.type_id,
        versionHash: plan.versionHash,
        created: plan.created,
        updated: plan.updated,
        filePath: plan.outputPath ?? undefined,
      },
      this.deps.metadataConfig,
    );
    return prependProvenanceHeader(body, header);
  }

  private previousHeader(outputPath: string): Record<string, string> | null {
    const target = this.absolute(outputPath);
    if (!existsSync(target)) return null;
    try {
      return this.parser.parseFile(target);
    } catch (err) {
      log.warn('existing provenance header ignored', {
        path: outputPath,
        error: errorMessage(err),
      });
      return null;
    }
  }

  private absolute(outputPath: string): string {
    const root = resolve(this.deps.outputRoot);
    const target = resolve(root, outputPath);
    const rel = relative(root, target);
    if (isAbsolute(outputPath) || rel.startsWith('..' + sep) || rel === '..') {
      throw new ValidationError(`Output path escapes the output root: ${outputPath}`);
    }
    return target;
  }
}
