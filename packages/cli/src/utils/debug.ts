import chalk from "chalk";

export function isDebug(): boolean {
  return process.env.LOOM_DEBUG === "1";
}

/** Print a dim diagnostic line when LOOM_DEBUG=1 */
export function debug(message: string): void {
  if (isDebug()) {
    console.error(chalk.dim(`[loom] ${message}`));
  }
}
