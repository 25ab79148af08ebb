import type { DocumentLoader } from '../loader/WorkflowLoader.js';
import type { MockPayloadService } from '../services/MockPayloadService.js';
import type { StagePluginRegistry } from '../plugins/StagePluginRegistry.js';
import type { WorkflowDocument } from '../types/definitions.js';

/**
 * Everything a validation step may look at. Reference lookups are built
 * once by the validator; their own problems are reported there.
 */
export interface WorkflowValidationContext {
  document: WorkflowDocument;
  registry: StagePluginRegistry;
  documentLoader: DocumentLoader;
  mockPayloadService: MockPayloadService;
  /** Declared api reference names, lower-case */
  apiReferences: ReadonlySet<string>;
  /** Declared workflow reference name (lower-case) → absolute path */
  workflowReferences: ReadonlyMap<string, string>;
  /** Fallback for env tokens */
  processEnv: Readonly<Record<string, string | undefined>>;
}

export interface ValidationStep {
  readonly name: string;
  validate(context: WorkflowValidationContext, errors: string[]): void | Promise<void>;
}
