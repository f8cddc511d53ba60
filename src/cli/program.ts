import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();
  program
    .name("ddk-init")
    .description("Prepare a DDK workspace for building kernel modules with Kleaf")
    .version(VERSION);

  registerInitCommand(program);
  return program;
}
