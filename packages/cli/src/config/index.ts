/**
 * Configuration loader/saver for the LEDLoom CLI
 * Config stored at ~/.ledloom/config.yaml
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { type LoomConfig, type ConfigKey, createDefaultConfig, isRenderFormat } from "./schema.js";

/** Config directory path */
export const CONFIG_DIR = resolve(homedir(), ".ledloom");

/** Config file path */
export const CONFIG_PATH = resolve(CONFIG_DIR, "config.yaml");

/** A config file that exists but cannot be used */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`${CONFIG_PATH}: ${message}`);
    this.name = "ConfigError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`"${key}" must be a mapping`);
  return value;
}

function positiveInt(value: unknown, key: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`"${key}" must be a positive integer`);
  }
  return value;
}

/** Merge a parsed YAML document over the defaults, checking each known key */
export function normalizeConfig(raw: unknown): LoomConfig {
  const defaults = createDefaultConfig();
  if (raw === null || raw === undefined) return defaults;
  if (!isRecord(raw)) throw new ConfigError("top level must be a mapping");

  const rawDefaults = section(raw, "defaults");
  const rawRender = section(raw, "render");
  const format = rawRender.format ?? defaults.render.format;
  if (typeof format !== "string" || !isRenderFormat(format)) {
    throw new ConfigError(`"render.format" must be one of ansi, hex, json`);
  }

  return {
    version: typeof raw.version === "string" ? raw.version : defaults.version,
    defaults: {
      width: positiveInt(rawDefaults.width, "defaults.width", defaults.defaults.width),
      height: positiveInt(rawDefaults.height, "defaults.height", defaults.defaults.height),
      frameCount: positiveInt(rawDefaults.frameCount, "defaults.frameCount", defaults.defaults.frameCount),
    },
    render: { format },
  };
}

/**
 * Load configuration from ~/.ledloom/config.yaml
 * Returns the defaults if the file doesn't exist
 */
export async function loadConfig(): Promise<LoomConfig> {
  let content: string;
  try {
    content = await readFile(CONFIG_PATH, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return createDefaultConfig();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    throw new ConfigError(`invalid YAML (${error instanceof Error ? error.message : String(error)})`);
  }
  return normalizeConfig(parsed);
}

/**
 * Save configuration to ~/.ledloom/config.yaml
 */
export async function saveConfig(config: LoomConfig): Promise<void> {
  // Ensure config directory exists
  await mkdir(CONFIG_DIR, { recursive: true });

  const content = stringify(config, {
    indent: 2,
    lineWidth: 0, // Don't wrap lines
  });

  await writeFile(CONFIG_PATH, content, "utf-8");
}

export function getConfigValue(config: LoomConfig, key: ConfigKey): string | number {
  switch (key) {
    case "defaults.width":
      return config.defaults.width;
    case "defaults.height":
      return config.defaults.height;
    case "defaults.frameCount":
      return config.defaults.frameCount;
    case "render.format":
      return config.render.format;
  }
}

/** Return a copy of `config` with one key set from its string form */
export function setConfigValue(config: LoomConfig, key: ConfigKey, value: string): LoomConfig {
  const next: LoomConfig = {
    ...config,
    defaults: { ...config.defaults },
    render: { ...config.render },
  };
  if (key === "render.format") {
    if (!isRenderFormat(value)) throw new ConfigError(`"render.format" must be one of ansi, hex, json`);
    next.render.format = value;
    return next;
  }

  const number = Number(value);
  if (!Number.isInteger(number) || number < 1) {
    throw new ConfigError(`"${key}" must be a positive integer`);
  }
  switch (key) {
    case "defaults.width":
      next.defaults.width = number;
      break;
    case "defaults.height":
      next.defaults.height = number;
      break;
    case "defaults.frameCount":
      next.defaults.frameCount = number;
      break;
  }
  return next;
}

// Re-export types
export type { LoomConfig, ConfigKey, RenderFormat } from "./schema.js";
export { createDefaultConfig, CONFIG_KEYS, RENDER_FORMATS, isConfigKey, isRenderFormat } from "./schema.js";
