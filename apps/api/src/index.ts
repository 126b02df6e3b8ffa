export { buildApp } from "./app";
export { LocalWorkflowRunner, type WorkflowDispatcher } from "./modules/runs/localWorkflowRunner";
export { RunStore } from "./modules/runs/runStore";
