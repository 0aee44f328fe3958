/**
 * workflow/index.ts - Public API for running a launch
 */

export { runWorkflow, describeRequirements } from "./runner";
export { runInteractiveSession } from "./interactive";
export { writeDeploymentFiles } from "./files";
export type {
  RequirementsSource,
  WorkflowDependencies,
  WorkflowPhase,
  WorkflowResult,
} from "./types";
