import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { ValidationError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { TemplateValidates, ValidationRule, VersionEntry } from '../shared/schemas.js';
import { resolveChain } from '../introspection/resolver.js';
import type { ParsedMetadata, ScaffoldMetadataParser } from '../metadata/parser.js';
import type { ArtifactRegistry } from '../scaffolding/artifacts.js';
import type { TemplateRegistry } from '../scaffolding/template-registry.js';
import { computeVersionHash } from '../scaffolding/version-hash.js';
import type { RenderingEngine } from '../templates/engine.js';

/** Checked in this order; a layer that reports an error ends the run. */
export const RULE_LAYERS = ['format', 'architecture', 'guideline'] as const;
export type RuleLayer = (typeof RULE_LAYERS)[number];

export type IssueSeverity = 'error' | 'warning';

export interface LayeredRule {
  id: string;
  description: string;
  pattern: RegExp;
  forbid: boolean;
  layer: RuleLayer;
  /** Template whose header declared the rule. */
  template: string;
}

export interface ValidationIssue {
  rule: string;
  layer: RuleLayer;
  severity: IssueSeverity;
  message: string;
  template: string | null;
  /** 1-based line of a forbidden match. */
  line?: number;
}

export interface ArtifactValidation {
  artifactType: string;
  templateName: string;
  metadata: ParsedMetadata;
  passed: boolean;
  /** 10 when clean, 8 with warnings only, 0 with any error. */
  score: number;
  issues: ValidationIssue[];
  layersChecked: RuleLayer[];
  /** Version hash the artifact type would be stamped with today. */
  currentVersion: string;
  /** Template registry entry for the header's version. */
  recorded: VersionEntry | null;
}

export interface ValidatorDeps {
  engine: RenderingEngine;
  artifacts: ArtifactRegistry;
  parser: ScaffoldMetadataParser;
  templateRegistry?: TemplateRegistry;
}

export interface ChainRules {
  template: string;
  validates?: TemplateValidates;
}

const log = logger.child({ component: 'validator' });

function toLayered(rule: ValidationRule, layer: RuleLayer, template: string): LayeredRule {
  return {
    id: rule.rule,
    description:
      rule.description ??
      (rule.forbid ? `Forbidden pattern found: ${rule.pattern}` : `Required pattern not found: ${rule.pattern}`),
    pattern: new RegExp(rule.pattern, 'm'),
    forbid: rule.forbid,
    layer,
    template,
  };
}

/**
 * Folds the `validates` sections of a root-first chain. A rule id declared
 * again further down replaces the inherited rule. Strict rules declared by the
 * last template are architectural; those it inherits are format rules.
 */
export function mergeTemplateRules(chain: ChainRules[]): LayeredRule[] {
  const leaf = chain[chain.length - 1]?.template;
  const strict = new Map<string, LayeredRule>();
  const guidelines = new Map<string, LayeredRule>();
  for (const { template, validates } of chain) {
    if (!validates) continue;
    for (const rule of validates.strict) {
      strict.set(rule.rule, toLayered(rule, template === leaf ? 'architecture' : 'format', template));
    }
    for (const rule of validates.guidelines) {
      guidelines.set(rule.rule, toLayered(rule, 'guideline', template));
    }
  }
  return [...strict.values(), ...guidelines.values()];
}

function lineAt(content: string, index: number): number {
  return content.slice(0, index).split('\n').length;
}

function severityOf(layer: RuleLayer): IssueSeverity {
  return layer === 'guideline' ? 'warning' : 'error';
}

export function checkRule(rule: LayeredRule, content: string): ValidationIssue | null {
  const match = rule.pattern.exec(content);
  const base = { rule: rule.id, layer: rule.layer, severity: severityOf(rule.layer), template: rule.template };
  if (rule.forbid) {
    return match ? { ...base, message: rule.description, line: lineAt(content, match.index) } : null;
  }
  return match ? null : { ...base, message: rule.description };
}

function scoreFor(issues: ValidationIssue[]): number {
  if (issues.some((i) => i.severity === 'error')) return 0;
  return issues.length > 0 ? 8 : 10;
}

/**
 * Checks generated content against the rules its templates declare. The
 * provenance header names the artifact type; the chain of that type's
 * template supplies the rules.
 */
export class LayeredValidator {
  constructor(private readonly deps: ValidatorDeps) {}

  /** Merged rules of an artifact type's template chain. */
  rulesFor(artifactType: string): LayeredRule[] {
    return this.rulesOfChain(this.chainOf(artifactType));
  }

  private chainOf(artifactType: string): string[] {
    return resolveChain(this.deps.engine, this.deps.artifacts.get(artifactType).template).chain;
  }

  private rulesOfChain(chain: string[]): LayeredRule[] {
    return mergeTemplateRules(
      chain.map((template) => ({ template, validates: this.deps.engine.load(template).header?.validates })),
    );
  }

  validate(content: string, extension: string): ArtifactValidation {
    const metadata = this.deps.parser.parse(content, extension);
    if (metadata === null) {
      throw new ValidationError('No provenance header found; the producing template is unknown', [], [
        'Only files generated by tierforge scaffold can be validated',
      ]);
    }

    const artifactType = metadata['template'] ?? '';
    if (!this.deps.artifacts.has(artifactType)) {
      throw new ValidationError(`Unknown artifact type in provenance header: ${artifactType}`, [], [
        `Available types: ${this.deps.artifacts.list().join(', ')}`,
      ]);
    }
    const def = this.deps.artifacts.get(artifactType);
    const chain = this.chainOf(artifactType);
    const currentVersion = computeVersionHash(
      def.type_id,
      def.template,
      chain.map((template) => ({ template, version: this.deps.engine.templateVersion(template) })),
    );
    const rules = this.rulesOfChain(chain);

    const version = metadata['version'] ?? '';
    const recorded = version === '' ? null : (this.deps.templateRegistry?.lookupHash(version) ?? null);

    const builtin: ValidationIssue[] = [];
    if (recorded && recorded.artifact_type !== artifactType) {
      builtin.push({
        rule: 'provenance_record',
        layer: 'format',
        severity: 'error',
        template: null,
        message: `Version ${version} is recorded for ${recorded.artifact_type}, not ${artifactType}`,
      });
    }
    if (version !== currentVersion) {
      builtin.push({
        rule: 'template_version',
        layer: 'guideline',
        severity: 'warning',
        template: null,
        message: `Generated from template version ${version || '(none)'}; the current version is ${currentVersion}`,
      });
    }

    const issues: ValidationIssue[] = [];
    const layersChecked: RuleLayer[] = [];
    for (const layer of RULE_LAYERS) {
      layersChecked.push(layer);
      const found = builtin.filter((issue) => issue.layer === layer);
      for (const rule of rules) {
        if (rule.layer !== layer) continue;
        const issue = checkRule(rule, content);
        if (issue) found.push(issue);
      }
      issues.push(...found);
      if (found.some((issue) => issue.severity === 'error')) break;
    }

    const score = scoreFor(issues);
    log.debug('artifact validated', { artifact_type: artifactType, score, issues: issues.length });
    return {
      artifactType,
      templateName: def.template,
      metadata,
      passed: score > 0,
      score,
      issues,
      layersChecked,
      currentVersion,
      recorded,
    };
  }

  validateFile(filePath: string): ArtifactValidation {
    return this.validate(readFileSync(filePath, 'utf8'), extname(filePath));
  }
}
