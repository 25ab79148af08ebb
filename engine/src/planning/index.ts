/**
 * Planning Layer
 *
 * Dry-run view of a workflow tree.
 *
 * @module planning
 */

export * from './PlanTypes.js';
export * from './WorkflowPlanner.js';
export * from './PlanRenderer.js';
