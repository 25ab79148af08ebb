/**
 * Workflow Validator
 *
 * Static checks run before any stage executes. Unlike the schema, which
 * stops at the first structural problem, the validator runs every step
 * and reports all problems together.
 *
 * Steps, in order:
 * 1. References: api and workflow reference names and paths
 * 2. Metadata: identity, inputs, init variables, end-stage output
 * 3. Stages: names, delays, kinds, resilience, jumps, plugin checks
 * 4. Templates: every token names something the workflow declares
 *
 * @module validation
 */

import { ConfigurationError } from '../errors/index.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { WorkflowLoader, type DocumentLoader } from '../loader/WorkflowLoader.js';
import { LogCategory } from '../types/log-types.js';
import { MetadataValidationStep } from './MetadataValidationStep.js';
import { StageValidationStep } from './StageValidationStep.js';
import { TemplateValidationStep } from './TemplateValidationStep.js';
import type { MockPayloadService } from '../services/MockPayloadService.js';
import type { StagePluginRegistry } from '../plugins/StagePluginRegistry.js';
import type { ValidationStep, WorkflowValidationContext } from './ValidationStep.js';
import type { WorkflowDocument } from '../types/definitions.js';

export interface WorkflowValidatorOptions {
  registry: StagePluginRegistry;
  documentLoader: DocumentLoader;
  mockPayloadService: MockPayloadService;
  processEnv?: Readonly<Record<string, string | undefined>>;
  steps?: readonly ValidationStep[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const DEFAULT_VALIDATION_STEPS: readonly ValidationStep[] = [
  new MetadataValidationStep(),
  new StageValidationStep(),
  new TemplateValidationStep(),
];

export class WorkflowValidator {
  private readonly steps: readonly ValidationStep[];

  constructor(private readonly options: WorkflowValidatorOptions) {
    this.steps = options.steps ?? DEFAULT_VALIDATION_STEPS;
  }

  async validate(document: WorkflowDocument): Promise<ValidationResult> {
    const errors: string[] = [];
    const context: WorkflowValidationContext = {
      document,
      registry: this.options.registry,
      documentLoader: this.options.documentLoader,
      mockPayloadService: this.options.mockPayloadService,
      apiReferences: buildApiReferences(document, errors),
      workflowReferences: buildWorkflowReferences(document, errors),
      processEnv: this.options.processEnv ?? process.env,
    };

    for (const step of this.steps) {
      await step.validate(context, errors);
    }

    LoggerManager.getLogger().debug(
      `Validated workflow '${document.definition.name}'`,
      { path: document.filePath, errors: errors.length },
      LogCategory.ANALYSIS,
    );
    return { valid: errors.length === 0, errors };
  }

  /**
   * @throws {ConfigurationError} Listing every problem found
   */
  async assertValid(document: WorkflowDocument): Promise<void> {
    const result = await this.validate(document);
    if (!result.valid) {
      throw ConfigurationError.invalidWorkflow(document.filePath, result.errors);
    }
  }
}

function buildApiReferences(document: WorkflowDocument, errors: string[]): Set<string> {
  const names = new Set<string>();
  for (const reference of document.definition.references?.apis ?? []) {
    const key = reference.name.toLowerCase();
    if (names.has(key)) {
      errors.push(`Duplicate API reference name '${reference.name}'.`);
      continue;
    }
    names.add(key);
  }
  return names;
}

function buildWorkflowReferences(document: WorkflowDocument, errors: string[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const reference of document.definition.references?.workflows ?? []) {
    const key = reference.name.toLowerCase();
    if (lookup.has(key)) {
      errors.push(`Duplicate reference name '${reference.name}'.`);
      continue;
    }
    lookup.set(key, WorkflowLoader.resolveReferencePath(document.filePath, reference.path));
  }
  return lookup;
}
