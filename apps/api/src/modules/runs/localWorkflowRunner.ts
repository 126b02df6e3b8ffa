import fs from "node:fs";
import path from "node:path";
import { spawn } from "node:child_process";
import type { WorkflowName } from "@adforge/shared";

export type DispatchWorkflowInput = {
  workflowName: WorkflowName;
  runId: string;
};

/** Starts a workflow for a run; resolves once the process is launched. */
export interface WorkflowDispatcher {
  dispatchWorkflow(input: DispatchWorkflowInput): Promise<{ pid?: number }>;
}

const workflowCliMap: Record<WorkflowName, string> = {
  "creative-pipeline": "pipeline",
};

export class LocalWorkflowRunnerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LocalWorkflowRunnerError";
  }
}

function repoRoot() {
  return path.resolve(__dirname, "../../../../../");
}

function resolveCommand(root: string, workflowName: WorkflowName) {
  const cliName = workflowCliMap[workflowName];
  const tsxPath = path.join(root, "node_modules", "tsx", "dist", "cli.mjs");
  const sourceCliPath = path.join(root, "apps", "agents", "src", "cli", `${cliName}.ts`);
  if (fs.existsSync(tsxPath) && fs.existsSync(sourceCliPath)) {
    return {
      command: process.execPath,
      args: [tsxPath, sourceCliPath],
    };
  }

  const builtCliPath = path.join(root, "dist", "apps", "agents", "src", "cli", `${cliName}.js`);
  if (fs.existsSync(builtCliPath)) {
    return {
      command: process.execPath,
      args: [builtCliPath],
    };
  }

  throw new LocalWorkflowRunnerError(
    `Cannot resolve local agent entrypoint for ${workflowName}. Install dependencies or build the project.`
  );
}

/** Spawns the agent CLI detached, logging to runs/<runId>/logs/<workflow>.log. */
export class LocalWorkflowRunner implements WorkflowDispatcher {
  constructor(private readonly opts: { root?: string; runsDir?: string } = {}) {}

  async dispatchWorkflow(input: DispatchWorkflowInput): Promise<{ pid?: number }> {
    const root = this.opts.root ?? repoRoot();
    const { command, args } = resolveCommand(root, input.workflowName);
    const logsDir = path.join(this.opts.runsDir ?? path.join(root, "runs"), input.runId, "logs");
    fs.mkdirSync(logsDir, { recursive: true });
    const logFd = fs.openSync(path.join(logsDir, `${input.workflowName}.log`), "a");

    const child = spawn(command, [...args, `--run-id=${input.runId}`], {
      cwd: root,
      env: {
        ...process.env,
        STUDIO_API_BASE_URL: process.env.STUDIO_API_BASE_URL ?? `http://localhost:${process.env.PORT ?? 3001}`,
      },
      detached: true,
      stdio: ["ignore", logFd, logFd],
      windowsHide: true,
    });
    fs.closeSync(logFd);

    if (!child.pid) {
      throw new LocalWorkflowRunnerError(`Failed to start local workflow runner for ${input.workflowName}.`);
    }

    child.unref();
    return { pid: child.pid };
  }
}
