import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { Project } from "../engine/index.js";
import { loadConfig } from "../config/index.js";
import { fail, loadProject, parseInteger, saveProject } from "./shared.js";

interface CreateOptions {
  output: string;
  width?: string;
  height?: string;
  frames?: string;
}

interface SetOptions {
  name?: string;
  frames?: string;
}

interface CountOptions {
  count: string;
}

export const patternCommand = new Command("pattern")
  .description("Pattern management commands");

patternCommand
  .command("create")
  .description("Create a new pattern")
  .argument("<name>", "Pattern name")
  .option("-o, --output <path>", "Output file path", "./pattern.loom.json")
  .option("-w, --width <pixels>", "Matrix width (defaults to config)")
  .option("-H, --height <pixels>", "Matrix height (defaults to config)")
  .option("-f, --frames <count>", "Frame count (defaults to config)")
  .action(async (name: string, options: CreateOptions) => {
    const spinner = ora("Creating pattern...").start();

    try {
      const config = await loadConfig();
      const width = options.width ? parseInteger(options.width, "Width") : config.defaults.width;
      const height = options.height ? parseInteger(options.height, "Height") : config.defaults.height;
      const frameCount = options.frames ? parseInteger(options.frames, "Frame count") : config.defaults.frameCount;

      const project = new Project(name, { width, height, frameCount });

      const outputPath = resolve(process.cwd(), options.output);
      const data = JSON.stringify(project.toJSON(), null, 2);
      await writeFile(outputPath, data, "utf-8");

      spinner.succeed(chalk.green(`Pattern created: ${outputPath}`));
      console.log();
      console.log(chalk.dim("  Name:"), name);
      console.log(chalk.dim("  Matrix:"), `${width}x${height}`);
      console.log(chalk.dim("  Frames:"), frameCount);
    } catch (error) {
      fail(spinner, "Failed to create pattern", error);
    }
  });

patternCommand
  .command("info")
  .description("Show pattern information")
  .argument("<file>", "Pattern file path")
  .action(async (file: string) => {
    const spinner = ora("Loading pattern...").start();

    try {
      const project = await loadProject(file);
      spinner.stop();

      const summary = project.getSummary();
      const meta = project.getMeta();

      console.log();
      console.log(chalk.bold.cyan("Pattern Info"));
      console.log(chalk.dim("─".repeat(40)));
      console.log(chalk.dim("  Name:"), summary.name);
      console.log(chalk.dim("  Matrix:"), `${summary.width}x${summary.height}`);
      console.log(chalk.dim("  Frames:"), summary.frameCount);
      console.log();
      console.log(chalk.dim("  Tracks:"), summary.trackCount);
      console.log(chalk.dim("  Stored frames:"), summary.storedFrameCount);
      console.log(chalk.dim("  Actions:"), summary.actionCount);
      console.log(chalk.dim("  Groups:"), summary.groupCount);
      console.log();
      console.log(chalk.dim("  Created:"), meta.createdAt.toLocaleString());
      console.log(chalk.dim("  Updated:"), meta.updatedAt.toLocaleString());
      console.log();
    } catch (error) {
      fail(spinner, "Failed to load pattern", error);
    }
  });

patternCommand
  .command("set")
  .description("Update pattern settings")
  .argument("<file>", "Pattern file path")
  .option("-n, --name <name>", "Pattern name")
  .option("-f, --frames <count>", "Frame count")
  .action(async (file: string, options: SetOptions) => {
    const spinner = ora("Updating pattern...").start();

    try {
      const project = await loadProject(file);

      if (options.name) project.setName(options.name);
      if (options.frames) project.setFrameCount(parseInteger(options.frames, "Frame count"));

      await saveProject(project);
      spinner.succeed(chalk.green("Pattern updated"));
    } catch (error) {
      fail(spinner, "Failed to update pattern", error);
    }
  });

patternCommand
  .command("resize")
  .description("Resize the matrix; pixels keep their coordinates")
  .argument("<file>", "Pattern file path")
  .argument("<width>", "New width")
  .argument("<height>", "New height")
  .action(async (file: string, width: string, height: string) => {
    const spinner = ora("Resizing pattern...").start();

    try {
      const project = await loadProject(file);
      const w = parseInteger(width, "Width");
      const h = parseInteger(height, "Height");
      project.resize(w, h);
      await saveProject(project);
      spinner.succeed(chalk.green(`Pattern resized to ${w}x${h}`));
    } catch (error) {
      fail(spinner, "Failed to resize pattern", error);
    }
  });

patternCommand
  .command("insert-frames")
  .description("Insert empty frames, shifting later content")
  .argument("<file>", "Pattern file path")
  .argument("<index>", "Frame index to insert at")
  .option("-c, --count <count>", "Number of frames", "1")
  .action(async (file: string, index: string, options: CountOptions) => {
    const spinner = ora("Inserting frames...").start();

    try {
      const project = await loadProject(file);
      const count = parseInteger(options.count, "Count");
      project.insertFrames(parseInteger(index, "Index"), count);
      await saveProject(project);
      spinner.succeed(chalk.green(`Inserted ${count} frame(s); pattern now has ${project.getMeta().frameCount}`));
    } catch (error) {
      fail(spinner, "Failed to insert frames", error);
    }
  });

patternCommand
  .command("delete-frames")
  .description("Delete frames, shifting later content back")
  .argument("<file>", "Pattern file path")
  .argument("<index>", "First frame to delete")
  .option("-c, --count <count>", "Number of frames", "1")
  .action(async (file: string, index: string, options: CountOptions) => {
    const spinner = ora("Deleting frames...").start();

    try {
      const project = await loadProject(file);
      project.deleteFrames(parseInteger(index, "Index"), parseInteger(options.count, "Count"));
      await saveProject(project);
      spinner.succeed(chalk.green(`Frames deleted; pattern now has ${project.getMeta().frameCount}`));
    } catch (error) {
      fail(spinner, "Failed to delete frames", error);
    }
  });

patternCommand
  .command("duplicate-frame")
  .description("Duplicate a frame across all tracks")
  .argument("<file>", "Pattern file path")
  .argument("<src>", "Frame to copy")
  .argument("[dest]", "Where to insert the copy (defaults to src + 1)")
  .action(async (file: string, src: string, dest: string | undefined) => {
    const spinner = ora("Duplicating frame...").start();

    try {
      const project = await loadProject(file);
      const from = parseInteger(src, "Source frame");
      const to = dest === undefined ? from + 1 : parseInteger(dest, "Destination frame");
      project.duplicateFrame(from, to);
      await saveProject(project);
      spinner.succeed(chalk.green(`Frame ${from} duplicated to ${to}`));
    } catch (error) {
      fail(spinner, "Failed to duplicate frame", error);
    }
  });

patternCommand
  .command("move-frame")
  .description("Move a frame to another position across all tracks")
  .argument("<file>", "Pattern file path")
  .argument("<src>", "Frame to move")
  .argument("<dest>", "New position")
  .action(async (file: string, src: string, dest: string) => {
    const spinner = ora("Moving frame...").start();

    try {
      const project = await loadProject(file);
      const from = parseInteger(src, "Source frame");
      const to = parseInteger(dest, "Destination frame");
      project.moveFrame(from, to);
      await saveProject(project);
      spinner.succeed(chalk.green(`Frame ${from} moved to ${to}`));
    } catch (error) {
      fail(spinner, "Failed to move frame", error);
    }
  });
