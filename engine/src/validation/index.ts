export * from './ValidationStep.js';
export * from './MetadataValidationStep.js';
export * from './StageValidationStep.js';
export * from './TemplateValidationStep.js';
export * from './WorkflowValidator.js';
