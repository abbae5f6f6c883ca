import { Command } from "commander";

import { registerGatewayCli } from "./gateway-cli.js";

export const VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("sockgate")
    .description("Reverse-proxy gateway in front of a supervised worker pool on a Unix socket")
    .version(VERSION);

  registerGatewayCli(program);
  return program;
}
