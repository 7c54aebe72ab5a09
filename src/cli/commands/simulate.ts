import type { Command } from "commander";
import { loadMeshConfig } from "../../config/manager.js";
import { consoleLogger, errorMessage, silentLogger } from "../../events/console.js";
import type { TaskRecord } from "../../schemas/task.js";
import { runSimulation } from "../simulate.js";
import { configPathOf } from "./config-commands.js";

export function formatTaskLine(task: TaskRecord): string {
  const devices = task.subtasks.map((s) => s.deviceId).join(", ");
  if (task.status === "completed") {
    return `✅ ${task.taskType} (${task.subtasks.length} subtask(s) on ${devices}): ${JSON.stringify(task.result)}`;
  }
  const reason = task.error ? `${task.error.reason}: ${task.error.message}` : "unknown";
  return `❌ ${task.taskType} ${task.status}: ${reason}`;
}

export function registerSimulateCommands(program: Command): void {
  program
    .command("simulate")
    .description("Run demo tasks against an in-process device fleet")
    .option("-v, --verbose", "Show bus and distributor logs", false)
    .option("--json", "Print final task records as JSON", false)
    .action(async (opts: { verbose: boolean; json: boolean }) => {
      try {
        const config = await loadMeshConfig(configPathOf(program));
        const tasks = await runSimulation({
          config: { ...config, eventLog: { enabled: false } },
          logger: opts.verbose ? consoleLogger : silentLogger,
        });

        if (opts.json) {
          console.log(JSON.stringify(tasks, null, 2));
        } else {
          for (const task of tasks) console.log(formatTaskLine(task));
        }
        if (tasks.some((t) => t.status !== "completed")) process.exitCode = 1;
      } catch (err) {
        console.error(errorMessage(err));
        process.exitCode = 1;
      }
    });
}
