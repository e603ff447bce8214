import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import {
  ACTION_DEFINITIONS,
  ACTION_KINDS,
  AXES,
  COLOUR_CYCLE_MODES,
  RADIAL_MODES,
  REVEAL_DIRECTIONS,
  ROTATE_MODES,
  SCROLL_DIRECTIONS,
  WIPE_MODES,
  isActionKind,
  InvalidActionError,
  type ActionKind,
  type ActionParams,
  type LayerAction,
} from "@ledloom/core";
import { fail, loadProject, parseInteger, saveProject } from "./shared.js";

interface AddOptions {
  start: string;
  end?: string;
  name?: string;
  direction?: string;
  mode?: string;
  axis?: string;
  offset?: string;
}

interface ListOptions {
  json?: boolean;
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T, field: string): T {
  if (value === undefined) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidActionError(`${field} must be one of ${allowed.join(", ")} (got "${value}")`);
  }
  return match;
}

function offsetOf(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : parseInteger(value, "Offset");
}

/** Kind-specific params from command-line options, defaults filling the gaps */
export function buildParams(kind: ActionKind, options: Omit<AddOptions, "start" | "end" | "name">): ActionParams {
  switch (kind) {
    case "scroll": {
      const defaults = ACTION_DEFINITIONS.scroll.defaultParams;
      return {
        kind,
        direction: oneOf(options.direction, SCROLL_DIRECTIONS, defaults.direction, "direction"),
        offset: offsetOf(options.offset, defaults.offset),
      };
    }
    case "rotate":
      return {
        kind,
        mode: oneOf(options.mode, ROTATE_MODES, ACTION_DEFINITIONS.rotate.defaultParams.mode, "mode"),
      };
    case "mirror":
    case "bounce":
      return {
        kind,
        axis: oneOf(options.axis, AXES, ACTION_DEFINITIONS[kind].defaultParams.axis, "axis"),
      };
    case "wipe": {
      const defaults = ACTION_DEFINITIONS.wipe.defaultParams;
      return {
        kind,
        mode: oneOf(options.mode, WIPE_MODES, defaults.mode, "mode"),
        offset: offsetOf(options.offset, defaults.offset),
      };
    }
    case "reveal": {
      const defaults = ACTION_DEFINITIONS.reveal.defaultParams;
      return {
        kind,
        direction: oneOf(options.direction, REVEAL_DIRECTIONS, defaults.direction, "direction"),
        offset: offsetOf(options.offset, defaults.offset),
      };
    }
    case "radial":
      return {
        kind,
        mode: oneOf(options.mode, RADIAL_MODES, ACTION_DEFINITIONS.radial.defaultParams.mode, "mode"),
      };
    case "colourCycle":
      return {
        kind,
        mode: oneOf(options.mode, COLOUR_CYCLE_MODES, ACTION_DEFINITIONS.colourCycle.defaultParams.mode, "mode"),
      };
    case "invert":
      return { kind };
  }
}

export function describeParams(params: ActionParams): string {
  switch (params.kind) {
    case "scroll":
      return `${params.direction}, ${params.offset}px/frame`;
    case "rotate":
      return params.mode;
    case "mirror":
    case "bounce":
      return params.axis;
    case "wipe":
      return `${params.mode}, ${params.offset}px/frame`;
    case "reveal":
      return `from ${params.direction}, ${params.offset}px/frame`;
    case "radial":
    case "colourCycle":
      return params.mode;
    case "invert":
      return "";
  }
}

function formatWindow(action: LayerAction): string {
  return `${action.startFrame}-${action.endFrame === null ? "end" : action.endFrame}`;
}

export const actionCommand = new Command("action")
  .description("Track automation commands");

actionCommand
  .command("add")
  .description(`Add an automation action (${ACTION_KINDS.join(", ")})`)
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<kind>", "Action kind")
  .option("-s, --start <frame>", "First active frame", "0")
  .option("-e, --end <frame>", "Last active frame (open-ended if omitted)")
  .option("-n, --name <name>", "Action name")
  .option("-d, --direction <direction>", "scroll: up/down/left/right; reveal: left/right/top/bottom")
  .option("-m, --mode <mode>", "rotate: clockwise/counterclockwise; wipe: left-to-right/...; radial: spiral/pulse; colourCycle: rgb/ryb")
  .option("-a, --axis <axis>", "mirror/bounce: horizontal/vertical")
  .option("--offset <pixels>", "scroll/wipe/reveal: pixels per frame")
  .action(async (projectPath: string, ref: string, kind: string, options: AddOptions) => {
    const spinner = ora("Adding action...").start();

    try {
      if (!isActionKind(kind)) {
        throw new InvalidActionError(`Unknown action kind "${kind}" (expected one of ${ACTION_KINDS.join(", ")})`);
      }
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      const action = project.addAction(track.id, {
        ...(options.name !== undefined ? { name: options.name } : {}),
        startFrame: parseInteger(options.start, "Start frame"),
        endFrame: options.end === undefined ? null : parseInteger(options.end, "End frame"),
        params: buildParams(kind, options),
      });
      await saveProject(project);

      spinner.succeed(chalk.green(`Action added: ${action.id}`));
      console.log();
      console.log(chalk.dim("  Kind:"), ACTION_DEFINITIONS[kind].name);
      console.log(chalk.dim("  Frames:"), formatWindow(action));
      const detail = describeParams(action.params);
      if (detail) console.log(chalk.dim("  Params:"), detail);
    } catch (error) {
      fail(spinner, "Failed to add action", error);
    }
  });

actionCommand
  .command("list")
  .description("List a track's actions in evaluation order")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .option("--json", "Print JSON")
  .action(async (projectPath: string, ref: string, options: ListOptions) => {
    const spinner = ora("Loading pattern...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      spinner.stop();

      const actions = project
        .getActions(track.id)
        .map((action, position) => ({ action, position }))
        .sort(
          (a, b) =>
            ACTION_DEFINITIONS[a.action.params.kind].priority - ACTION_DEFINITIONS[b.action.params.kind].priority ||
            a.position - b.position
        )
        .map(({ action }) => action);

      if (options.json) {
        console.log(JSON.stringify(actions));
        return;
      }
      if (actions.length === 0) {
        console.log(chalk.dim(`${track.name} has no actions`));
        return;
      }
      console.log();
      for (const action of actions) {
        const definition = ACTION_DEFINITIONS[action.params.kind];
        console.log(
          chalk.bold(`  ${definition.name}`),
          chalk.dim(action.id),
          chalk.dim("frames"),
          formatWindow(action),
          describeParams(action.params)
        );
      }
      console.log();
    } catch (error) {
      fail(spinner, "Failed to list actions", error);
    }
  });

actionCommand
  .command("remove")
  .description("Remove an action")
  .argument("<project>", "Pattern file path")
  .argument("<track>", "Track id or name")
  .argument("<action-id>", "Action id")
  .action(async (projectPath: string, ref: string, actionId: string) => {
    const spinner = ora("Removing action...").start();

    try {
      const project = await loadProject(projectPath);
      const track = project.resolveTrack(ref);
      if (!project.removeAction(track.id, actionId)) {
        throw new InvalidActionError(`Action not found on ${track.name}: ${actionId}`);
      }
      await saveProject(project);
      spinner.succeed(chalk.green(`Action removed: ${actionId}`));
    } catch (error) {
      fail(spinner, "Failed to remove action", error);
    }
  });
