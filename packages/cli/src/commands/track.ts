import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import type { TrackPatch } from "@ledloom/core";
import { fail, loadProject, parseBoolean, parseInteger, parseOpacity, saveProject } from "./shared.js";

interface AddOptions {
  name?: string;
  opacity?: string;
  zIndex?: string;
  group?: string;
}

interface SetOptions {
  name?: string;
  visible?: string;
  opacity?: string;
  locked?: string;
  group?: string;
  start?: string;
  end?: string;
}

interface ListOptions {
  json?: boolean;
}

/** `--end open` clears the end bound */
function parseEnd(value: string): number | null {
  return value === "open" ? null : parseInteger(value, "End frame");
}

export const trackCommand = new Command("track")
  .description("Layer track commands");

trackCommand
  .command("add")
  .description("Add a layer track")
  .argument("<project>", "Pattern file path")
  .option("-n, --name <name>", "Track name")
  .option("-o, --opacity <value>", "Default opacity (0-1)")
  .option("-z, --z-index <n>", "Compositing order (defaults to the top)")
  .option("-g, --group <id>", "Group id")
  .action(async (projectPath: string, options: AddOptions) => {
    const spinner = ora("Adding track...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.addTrack({
        name: options.name,
        opacity: options.opacity === undefined ? undefined : parseOpacity(options.opacity),
        zIndex: options.zIndex === undefined ? undefined : parseInteger(options.zIndex, "z-index"),
        groupId: options.group,
      });
      await saveProject(project);

      spinner.succeed(chalk.green(`Track added: ${track.id}`));
      console.log();
      console.log(chalk.dim("  Name:"), track.name);
      console.log(chalk.dim("  z-index:"), track.zIndex);
      console.log(chalk.dim("  Opacity:"), track.opacity);
    } catch (error) {
      fail(spinner, "Failed to add track", error);
    }
  });

trackCommand
  .command("list")
  .description("List layer tracks, bottom to top")
  .argument("<project>", "Pattern file path")
  .option("--json", "Print JSON")
  .action(async (projectPath: string, options: ListOptions) => {
    const spinner = ora("Loading pattern...").start();

    try {
      const project = await loadProject(projectPath);
      spinner.stop();

      const tracks = [...project.getTracks()].sort((a, b) => a.zIndex - b.zIndex);
      if (options.json) {
        console.log(
          JSON.stringify(
            tracks.map((t) => ({
              id: t.id,
              name: t.name,
              zIndex: t.zIndex,
              visible: t.visible,
              opacity: t.opacity,
              locked: t.locked,
              groupId: t.groupId,
              window: t.window,
              frames: Object.keys(t.frames).map(Number),
              actions: t.automation.length,
            }))
          )
        );
        return;
      }

      if (tracks.length === 0) {
        console.log(chalk.dim("No tracks"));
        return;
      }
      console.log();
      for (const track of tracks) {
        const flags = [track.visible ? "" : "hidden", track.locked ? "locked" : ""].filter(Boolean).join(", ");
        const end = track.window.endFrame === null ? "end" : track.window.endFrame;
        console.log(
          chalk.bold(`  [${track.zIndex}] ${track.name}`),
          chalk.dim(track.id),
          flags ? chalk.yellow(`(${flags})`) : ""
        );
        console.log(
          chalk.dim("      opacity"),
          track.opacity,
          chalk.dim("window"),
          `${track.window.startFrame}-${end}`,
          chalk.dim("frames"),
          Object.keys(track.frames).length,
          chalk.dim("actions"),
          track.automation.length
        );
      }
      console.log();
    } catch (error) {
      fail(spinner, "Failed to list tracks", error);
    }
  });

trackCommand
  .command("remove")
  .description("Remove a layer track")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .action(async (projectPath: string, ref: string) => {
    const spinner = ora("Removing track...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      project.removeTrack(track.id);
      await saveProject(project);
      spinner.succeed(chalk.green(`Track removed: ${track.name}`));
    } catch (error) {
      fail(spinner, "Failed to remove track", error);
    }
  });

trackCommand
  .command("set")
  .description("Update track properties")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .option("-n, --name <name>", "Track name")
  .option("--visible <bool>", "Default visibility")
  .option("-o, --opacity <value>", "Default opacity (0-1)")
  .option("--locked <bool>", "Lock frame content")
  .option("-g, --group <id>", "Group id, or 'none'")
  .option("--start <frame>", "Window start frame")
  .option("--end <frame>", "Window end frame, or 'open'")
  .action(async (projectPath: string, ref: string, options: SetOptions) => {
    const spinner = ora("Updating track...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);

      const patch: TrackPatch = {};
      if (options.name !== undefined) patch.name = options.name;
      if (options.visible !== undefined) patch.visible = parseBoolean(options.visible, "Visible");
      if (options.opacity !== undefined) patch.opacity = parseOpacity(options.opacity);
      if (options.locked !== undefined) patch.locked = parseBoolean(options.locked, "Locked");
      if (options.group !== undefined) patch.groupId = options.group === "none" ? null : options.group;
      if (options.start !== undefined || options.end !== undefined) {
        patch.window = {
          startFrame: options.start === undefined ? track.window.startFrame : parseInteger(options.start, "Start frame"),
          endFrame: options.end === undefined ? track.window.endFrame : parseEnd(options.end),
        };
      }

      const updated = project.updateTrack(track.id, patch);
      await saveProject(project);
      spinner.succeed(chalk.green(`Track updated: ${updated.name}`));
    } catch (error) {
      fail(spinner, "Failed to update track", error);
    }
  });

trackCommand
  .command("reorder")
  .description("Set a track's compositing order")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<z-index>", "New z-index (higher draws on top)")
  .action(async (projectPath: string, ref: string, zIndex: string) => {
    const spinner = ora("Reordering track...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const z = parseInteger(zIndex, "z-index");
      project.reorderTrack(track.id, z);
      await saveProject(project);
      spinner.succeed(chalk.green(`Track ${track.name} moved to z-index ${z}`));
    } catch (error) {
      fail(spinner, "Failed to reorder track", error);
    }
  });
