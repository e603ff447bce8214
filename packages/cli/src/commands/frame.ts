import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { solidBuffer } from "@ledloom/core";
import { parseColor, parsePoint } from "../utils/color.js";
import { formatAnsi, formatHex } from "../utils/output.js";
import { fail, loadProject, parseBoolean, parseInteger, parseOpacity, saveProject } from "./shared.js";

interface CreateOptions {
  color?: string;
}

interface PaintOptions {
  color: string;
}

interface OverrideOptions {
  visible?: string;
  opacity?: string;
}

interface ShowOptions {
  format: string;
}

/** `inherit` clears an override */
function parseOverride<T>(value: string, parse: (value: string) => T): T | null {
  return value === "inherit" ? null : parse(value);
}

export const frameCommand = new Command("frame")
  .description("Per-track frame content commands");

frameCommand
  .command("create")
  .description("Create a frame on a track (black unless --color is given)")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Frame index")
  .option("-c, --color <color>", "Fill colour")
  .action(async (projectPath: string, ref: string, frame: string, options: CreateOptions) => {
    const spinner = ora("Creating frame...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      const { width, height } = project.getMeta();
      const pixels = options.color ? solidBuffer(width, height, parseColor(options.color)) : undefined;
      project.createFrame(track.id, index, pixels);
      await saveProject(project);
      spinner.succeed(chalk.green(`Frame ${index} created on ${track.name}`));
    } catch (error) {
      fail(spinner, "Failed to create frame", error);
    }
  });

frameCommand
  .command("delete")
  .description("Delete a track's frame")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Frame index")
  .action(async (projectPath: string, ref: string, frame: string) => {
    const spinner = ora("Deleting frame...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      project.deleteFrame(track.id, index);
      await saveProject(project);
      spinner.succeed(chalk.green(`Frame ${index} deleted from ${track.name}`));
    } catch (error) {
      fail(spinner, "Failed to delete frame", error);
    }
  });

frameCommand
  .command("paint")
  .description("Set pixels of an existing frame")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Frame index")
  .argument("<points...>", "Pixels as x,y")
  .requiredOption("-c, --color <color>", "Pixel colour (#rrggbb, r,g,b or a name)")
  .action(async (projectPath: string, ref: string, frame: string, points: string[], options: PaintOptions) => {
    const spinner = ora("Painting...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      const color = parseColor(options.color);
      project.paint(
        track.id,
        index,
        points.map((point) => ({ ...parsePoint(point), color }))
      );
      await saveProject(project);
      spinner.succeed(chalk.green(`Painted ${points.length} pixel(s) on ${track.name} frame ${index}`));
    } catch (error) {
      fail(spinner, "Failed to paint", error);
    }
  });

frameCommand
  .command("fill")
  .description("Fill an existing frame with one colour")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Frame index")
  .requiredOption("-c, --color <color>", "Fill colour")
  .action(async (projectPath: string, ref: string, frame: string, options: PaintOptions) => {
    const spinner = ora("Filling frame...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      project.fill(track.id, index, parseColor(options.color));
      await saveProject(project);
      spinner.succeed(chalk.green(`Filled ${track.name} frame ${index}`));
    } catch (error) {
      fail(spinner, "Failed to fill frame", error);
    }
  });

frameCommand
  .command("copy")
  .description("Copy a frame's content onto other frames of the same track")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Source frame index")
  .argument("<targets...>", "Frames to overwrite")
  .action(async (projectPath: string, ref: string, frame: string, targets: string[]) => {
    const spinner = ora("Copying frame...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      const written = project.copyFrame(
        track.id,
        index,
        targets.map((t) => parseInteger(t, "Target frame"))
      );
      await saveProject(project);
      spinner.succeed(chalk.green(`Copied ${track.name} frame ${index} to ${written.length} frame(s)`));
    } catch (error) {
      fail(spinner, "Failed to copy frame", error);
    }
  });

frameCommand
  .command("set")
  .description("Override visibility or opacity for one frame")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Frame index")
  .option("--visible <bool>", "Visibility, or 'inherit'")
  .option("-o, --opacity <value>", "Opacity (0-1), or 'inherit'")
  .action(async (projectPath: string, ref: string, frame: string, options: OverrideOptions) => {
    const spinner = ora("Updating frame...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      project.setFrameOverrides(track.id, index, {
        visibleOverride:
          options.visible === undefined
            ? undefined
            : parseOverride(options.visible, (v) => parseBoolean(v, "Visible")),
        opacityOverride: options.opacity === undefined ? undefined : parseOverride(options.opacity, parseOpacity),
      });
      await saveProject(project);
      spinner.succeed(chalk.green(`Frame ${index} of ${track.name} updated`));
    } catch (error) {
      fail(spinner, "Failed to update frame", error);
    }
  });

frameCommand
  .command("show")
  .description("Print a track's stored pixels for one frame (before automation)")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<frame>", "Frame index")
  .option("--format <format>", "ansi or hex", "ansi")
  .action(async (projectPath: string, ref: string, frame: string, options: ShowOptions) => {
    const spinner = ora("Loading pattern...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const index = parseInteger(frame, "Frame");
      const stored = project.getFrame(track.id, index);
      spinner.stop();

      if (!stored) {
        console.log(chalk.dim(`${track.name} has no frame ${index}`));
        return;
      }
      const { width } = project.getMeta();
      console.log(options.format === "hex" ? formatHex(stored.pixels, width) : formatAnsi(stored.pixels, width));
    } catch (error) {
      fail(spinner, "Failed to show frame", error);
    }
  });
