import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import type { GroupPatch } from "@ledloom/core";
import { fail, loadProject, parseBoolean, parseOpacity, saveProject } from "./shared.js";

interface AddOptions {
  opacity?: string;
  visible?: string;
}

interface SetOptions extends AddOptions {
  name?: string;
}

export const groupCommand = new Command("group")
  .description("Track group commands");

groupCommand
  .command("add")
  .description("Create a group")
  .argument("<project>", "Pattern file path")
  .argument("<name>", "Group name")
  .option("-o, --opacity <value>", "Group opacity (0-1)")
  .option("--visible <bool>", "Group visibility")
  .action(async (projectPath: string, name: string, options: AddOptions) => {
    const spinner = ora("Creating group...").start();

    try {
      const project = await loadProject(projectPath);
      const group = project.createGroup(name, {
        opacity: options.opacity === undefined ? undefined : parseOpacity(options.opacity),
        visible: options.visible === undefined ? undefined : parseBoolean(options.visible, "Visible"),
      });
      await saveProject(project);
      spinner.succeed(chalk.green(`Group created: ${group.id}`));
    } catch (error) {
      fail(spinner, "Failed to create group", error);
    }
  });

groupCommand
  .command("list")
  .description("List groups")
  .argument("<project>", "Pattern file path")
  .action(async (projectPath: string) => {
    const spinner = ora("Loading pattern...").start();

    try {
      const project = await loadProject(projectPath);
      spinner.stop();

      const groups = project.getGroups();
      if (groups.length === 0) {
        console.log(chalk.dim("No groups"));
        return;
      }
      for (const group of groups) {
        const members = project.getTracks().filter((t) => t.groupId === group.id).length;
        console.log(
          chalk.bold(`  ${group.name}`),
          chalk.dim(group.id),
          group.visible ? "" : chalk.yellow("(hidden)"),
          chalk.dim("opacity"),
          group.opacity,
          chalk.dim("tracks"),
          members
        );
      }
    } catch (error) {
      fail(spinner, "Failed to list groups", error);
    }
  });

groupCommand
  .command("set")
  .description("Update a group")
  .argument("<project>", "Pattern file path")
  .argument("<group-id>", "Group id")
  .option("-n, --name <name>", "Group name")
  .option("-o, --opacity <value>", "Group opacity (0-1)")
  .option("--visible <bool>", "Group visibility")
  .action(async (projectPath: string, groupId: string, options: SetOptions) => {
    const spinner = ora("Updating group...").start();

    try {
      const project = await loadProject(projectPath);
      const patch: GroupPatch = {};
      if (options.name !== undefined) patch.name = options.name;
      if (options.opacity !== undefined) patch.opacity = parseOpacity(options.opacity);
      if (options.visible !== undefined) patch.visible = parseBoolean(options.visible, "Visible");
      const group = project.updateGroup(groupId, patch);
      await saveProject(project);
      spinner.succeed(chalk.green(`Group updated: ${group.name}`));
    } catch (error) {
      fail(spinner, "Failed to update group", error);
    }
  });

groupCommand
  .command("remove")
  .description("Remove a group; its tracks become ungrouped")
  .argument("<project>", "Pattern file path")
  .argument("<group-id>", "Group id")
  .action(async (projectPath: string, groupId: string) => {
    const spinner = ora("Removing group...").start();

    try {
      const project = await loadProject(projectPath);
      if (!project.removeGroup(groupId)) {
        spinner.fail(chalk.red(`Group not found: ${groupId}`));
        process.exit(1);
      }
      await saveProject(project);
      spinner.succeed(chalk.green(`Group removed: ${groupId}`));
    } catch (error) {
      fail(spinner, "Failed to remove group", error);
    }
  });
