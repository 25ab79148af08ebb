/**
 * Workflow identity, inputs, init variables and end-stage output checks
 *
 * @module validation
 */

import type { ValidationStep, WorkflowValidationContext } from './ValidationStep.js';
import type { WorkflowDefinition, WorkflowVariableDefinition } from '../types/definitions.js';

const RANGE_FIELDS = [
  'min',
  'max',
  'padding',
  'length',
  'fromDateTime',
  'toDateTime',
  'fromDate',
  'toDate',
  'fromTime',
  'toTime',
  'format',
  'start',
  'step',
] as const satisfies readonly (keyof WorkflowVariableDefinition)[];

const GENERATED_ONLY_TYPES = new Set(['DateTime', 'Date', 'Time']);

export class MetadataValidationStep implements ValidationStep {
  readonly name = 'metadata';

  validate(context: WorkflowValidationContext, errors: string[]): void {
    const definition = context.document.definition;

    if (!definition.version.trim()) {
      errors.push('Workflow version is required.');
    }
    if (!definition.id.trim()) {
      errors.push('Workflow id is required.');
    }
    if (!definition.name.trim()) {
      errors.push('Workflow name is required.');
    }

    const inputNames = this.validateInputs(definition, errors);
    this.validateVariables(definition, inputNames, errors);

    if (definition.output && Object.keys(definition.endStage?.output ?? {}).length === 0) {
      errors.push('End-stage output is required when workflow output is enabled.');
    }
  }

  private validateInputs(definition: WorkflowDefinition, errors: string[]): Set<string> {
    const names = new Set<string>();
    for (const input of definition.input ?? []) {
      const key = input.name.toLowerCase();
      if (names.has(key)) {
        errors.push(`Duplicate input name '${input.name}'.`);
      }
      names.add(key);
    }
    return names;
  }

  private validateVariables(definition: WorkflowDefinition, inputNames: ReadonlySet<string>, errors: string[]): void {
    const names = new Set<string>();

    for (const variable of definition.initStage?.variables ?? []) {
      const key = variable.name.toLowerCase();
      if (names.has(key)) {
        errors.push(`Duplicate init-stage variable name '${variable.name}'.`);
      }
      names.add(key);

      if (inputNames.has(key)) {
        errors.push(`Init-stage variable '${variable.name}' duplicates an input with the same name.`);
      }

      const hasValue = variable.value !== undefined && variable.value.trim() !== '';
      if (hasValue && RANGE_FIELDS.some((field) => variable[field] !== undefined)) {
        errors.push(`Init-stage variable '${variable.name}' cannot define value with range settings.`);
      }
      if (hasValue && GENERATED_ONLY_TYPES.has(variable.type)) {
        errors.push(`Init-stage variable '${variable.name}' must use type 'Fixed' when value is provided.`);
      }
      if (variable.type === 'Fixed' && !hasValue) {
        errors.push(`Init-stage variable '${variable.name}' requires a value for type 'Fixed'.`);
      }
    }
  }
}
