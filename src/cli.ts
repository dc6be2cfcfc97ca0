#!/usr/bin/env node

import { Command } from "commander";
import { registerFetchCommand } from "./commands/fetch";

const program = new Command();

program
  .name("trackinfo")
  .description("Download Spotify track information and similar tracks")
  .version("1.0.0");

registerFetchCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
