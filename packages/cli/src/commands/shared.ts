import { readFile, writeFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import type { Ora } from "ora";
import { isLoomError } from "@ledloom/core";
import { Project, type ProjectFile } from "../engine/index.js";
import { debug, isDebug } from "../utils/debug.js";

/** File name looked up when a directory is given */
export const DEFAULT_PROJECT_FILE = "pattern.loom.json";

/**
 * Resolve project file path - handles both file paths and directory paths
 * If path is a directory, looks for pattern.loom.json inside
 */
export async function resolveProjectPath(inputPath: string): Promise<string> {
  const filePath = resolve(process.cwd(), inputPath);

  try {
    const stats = await stat(filePath);
    if (stats.isDirectory()) {
      return resolve(filePath, DEFAULT_PROJECT_FILE);
    }
  } catch {
    // Path doesn't exist yet - let readFile report it
  }

  return filePath;
}

export async function loadProject(inputPath: string): Promise<Project> {
  const filePath = await resolveProjectPath(inputPath);
  debug(`loading ${filePath}`);
  const content = await readFile(filePath, "utf-8");
  const data: ProjectFile = JSON.parse(content);
  const project = Project.fromJSON(data);
  project.setFilePath(filePath);
  return project;
}

export async function saveProject(project: Project, outputPath?: string): Promise<string> {
  const filePath = outputPath ? resolve(process.cwd(), outputPath) : project.getFilePath();
  if (!filePath) throw new Error("Project has no file path");
  await writeFile(filePath, JSON.stringify(project.toJSON(), null, 2), "utf-8");
  debug(`saved ${filePath}`);
  return filePath;
}

/** Parse an integer option, rejecting anything else */
export function parseInteger(value: string, name: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new Error(`${name} must be an integer (got "${value}")`);
  }
  return Number(value);
}

export function parseOpacity(value: string): number {
  const opacity = Number(value);
  if (!Number.isFinite(opacity) || opacity < 0 || opacity > 1) {
    throw new Error(`Opacity must be between 0 and 1 (got "${value}")`);
  }
  return opacity;
}

export function parseBoolean(value: string, name: string): boolean {
  if (value === "true" || value === "on" || value === "yes") return true;
  if (value === "false" || value === "off" || value === "no") return false;
  throw new Error(`${name} must be true or false (got "${value}")`);
}

export function describeError(error: unknown): string {
  if (isLoomError(error)) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Fail the spinner, print the error and exit with status 1 */
export function fail(spinner: Ora, label: string, error: unknown): never {
  spinner.fail(chalk.red(label));
  console.error(chalk.red(describeError(error)));
  if (isDebug() && error instanceof Error && error.stack) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}
