#!/usr/bin/env node

import { Command } from "commander";
import { createRequire } from "node:module";
import { debug } from "./utils/debug.js";

debug("CLI started, loading commands...");

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

// Re-export engine for library usage
export { Project, generateId, type ProjectFile } from "./engine/index.js";
import { patternCommand } from "./commands/pattern.js";
import { trackCommand } from "./commands/track.js";
import { frameCommand } from "./commands/frame.js";
import { actionCommand } from "./commands/action.js";
import { groupCommand } from "./commands/group.js";
import { renderCommand } from "./commands/render.js";
import { configCommand } from "./commands/config.js";

export { loadConfig, saveConfig, type LoomConfig } from "./config/index.js";

const program = new Command();

program
  .name("loom")
  .description("LEDLoom CLI - layered LED matrix patterns")
  .version(pkg.version);

program.addCommand(patternCommand);
program.addCommand(trackCommand);
program.addCommand(frameCommand);
program.addCommand(actionCommand);
program.addCommand(groupCommand);
program.addCommand(renderCommand);
program.addCommand(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
