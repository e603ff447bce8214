/**
 * Configuration schema for the LEDLoom CLI
 * Stored at ~/.ledloom/config.yaml
 */

export type RenderFormat = "ansi" | "hex" | "json";

export const RENDER_FORMATS: readonly RenderFormat[] = ["ansi", "hex", "json"];

export interface LoomConfig {
  /** Config file version */
  version: string;

  /** Default settings for new patterns */
  defaults: {
    width: number;
    height: number;
    frameCount: number;
  };

  /** Rendering settings */
  render: {
    /** Output format of `render frame` when `--format` is not given */
    format: RenderFormat;
  };
}

/** Dotted keys accepted by `config get` / `config set` */
export type ConfigKey = "defaults.width" | "defaults.height" | "defaults.frameCount" | "render.format";

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "defaults.width",
  "defaults.height",
  "defaults.frameCount",
  "render.format",
];

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

export function isRenderFormat(value: string): value is RenderFormat {
  return RENDER_FORMATS.some((format) => format === value);
}

/** Default configuration */
export function createDefaultConfig(): LoomConfig {
  return {
    version: "1.0.0",
    defaults: {
      width: 16,
      height: 16,
      frameCount: 1,
    },
    render: {
      format: "ansi",
    },
  };
}
