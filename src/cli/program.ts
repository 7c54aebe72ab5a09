import { Command } from "commander";
import { DAEMON_VERSION } from "../daemon/daemon.js";
import { registerConfigCommands } from "./commands/config-commands.js";
import { registerDaemonCommands } from "./commands/daemon.js";
import { registerSimulateCommands } from "./commands/simulate.js";

export function createProgram(): Command {
  const program = new Command();
  program
    .name("mesh")
    .description("Agent message bus and task distributor for heterogeneous devices")
    .version(DAEMON_VERSION)
    .option("--config <path>", "Mesh config file (YAML)");

  registerSimulateCommands(program);
  registerConfigCommands(program);
  registerDaemonCommands(program);
  return program;
}
