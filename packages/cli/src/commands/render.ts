import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import type { PixelBuffer } from "@ledloom/core";
import { isRenderFormat, loadConfig, RENDER_FORMATS, type RenderFormat } from "../config/index.js";
import { formatAnsi, formatHex, formatJson, toBytes } from "../utils/output.js";
import { debug } from "../utils/debug.js";
import { fail, loadProject, parseInteger } from "./shared.js";

interface FrameOptions {
  frame: string;
  format?: string;
}

interface AllOptions {
  format?: string;
}

interface DumpOptions {
  output: string;
}

async function resolveFormat(value: string | undefined): Promise<RenderFormat> {
  if (value === undefined) return (await loadConfig()).render.format;
  if (!isRenderFormat(value)) {
    throw new Error(`Unknown format "${value}" (expected one of ${RENDER_FORMATS.join(", ")})`);
  }
  return value;
}

function formatFrame(pixels: PixelBuffer, format: RenderFormat, width: number, height: number, frame: number): string {
  switch (format) {
    case "ansi":
      return formatAnsi(pixels, width);
    case "hex":
      return formatHex(pixels, width);
    case "json":
      return formatJson(pixels, width, height, frame);
  }
}

export const renderCommand = new Command("render")
  .description("Render composited frames");

renderCommand
  .command("frame")
  .description("Render one frame")
  .argument("<project>", "Pattern file path")
  .requiredOption("-f, --frame <index>", "Frame index")
  .option("--format <format>", "ansi, hex or json (defaults to config)")
  .action(async (projectPath: string, options: FrameOptions) => {
    const spinner = ora("Rendering...").start();

    try {
      const format = await resolveFormat(options.format);
      const project = await loadProject(projectPath);
      const index = parseInteger(options.frame, "Frame");
      const { width, height } = project.getMeta();
      const pixels = project.render(index);
      spinner.stop();

      console.log(formatFrame(pixels, format, width, height, index));
    } catch (error) {
      fail(spinner, "Failed to render frame", error);
    }
  });

renderCommand
  .command("all")
  .description("Render every frame in order")
  .argument("<project>", "Pattern file path")
  .option("--format <format>", "ansi, hex or json (defaults to config)")
  .action(async (projectPath: string, options: AllOptions) => {
    const spinner = ora("Rendering...").start();

    try {
      const format = await resolveFormat(options.format);
      const project = await loadProject(projectPath);
      const { width, height } = project.getMeta();
      const frames = project.renderAll();
      spinner.stop();

      frames.forEach((pixels, index) => {
        if (format !== "json") console.log(chalk.dim(`# frame ${index}`));
        console.log(formatFrame(pixels, format, width, height, index));
      });
    } catch (error) {
      fail(spinner, "Failed to render pattern", error);
    }
  });

renderCommand
  .command("dump")
  .description("Write raw RGB bytes of every frame, in order")
  .argument("<project>", "Pattern file path")
  .requiredOption("-o, --output <path>", "Output file")
  .action(async (projectPath: string, options: DumpOptions) => {
    const spinner = ora("Rendering frames...").start();

    try {
      const project = await loadProject(projectPath);
      const frames = project.renderAll();
      const bytes = toBytes(frames);
      const outputPath = resolve(process.cwd(), options.output);
      await writeFile(outputPath, bytes);
      debug(`${frames.length} frames, ${bytes.length} bytes`);

      spinner.succeed(chalk.green(`Rendered ${frames.length} frame(s) to ${outputPath}`));
    } catch (error) {
      fail(spinner, "Failed to render pattern", error);
    }
  });
