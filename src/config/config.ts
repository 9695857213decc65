import fs from "fs";
import path from "path";
import os from "os";
import { parse } from "smol-toml";
import { z } from "zod";
import { Color } from "../color/color.js";
import { Style } from "../style/style.js";
import { formatZodError, styleEntrySchema, styleNameSchema } from "../validation.js";

export interface Config {
  /** Named styles in file order, defaults first. */
  styles: Map<string, Style>;
}

export class UnknownStyleError extends Error {
  readonly styleName: string;
  readonly available: string[];

  constructor(styleName: string, available: string[]) {
    super(`Unknown style '${styleName}'. Available: ${available.join(", ") || "(none)"}`);
    this.name = "UnknownStyleError";
    this.styleName = styleName;
    this.available = available;
  }
}

const DEFAULT_STYLES: ReadonlyArray<readonly [string, Style]> = [
  ["error", Style.EMPTY.bold().fg(Color.RED)],
  ["warning", Style.EMPTY.fg(Color.YELLOW)],
  ["success", Style.EMPTY.fg(Color.GREEN)],
  ["info", Style.EMPTY.fg(Color.CYAN)],
  ["muted", Style.EMPTY.dim()],
  ["link", Style.EMPTY.underline().fg(Color.BLUE)],
];

export function defaultConfig(): Config {
  return { styles: new Map(DEFAULT_STYLES) };
}

export function getConfigPath(): string {
  if (process.env.PAINT_CONFIG_DIR) {
    return path.join(process.env.PAINT_CONFIG_DIR, "config.toml");
  }
  return path.join(os.homedir(), ".paint", "config.toml");
}

export const DEFAULT_CONFIG_TOML = `# paint configuration
#
# Named styles usable with \`paint text --style <name>\`.
# Entries here override the built-in ones with the same name.
#
#   fg, bg     color: red, bright-red, 0-255, #rrggbb, #rgb, rgb(r,g,b)
#   effects    any of: bold, dim, italic, blink, reverse, hidden,
#              strikethrough, overline
#   underline  one of: single, double, curly, dotted, dashed

[styles.error]
fg = "red"
effects = ["bold"]

[styles.warning]
fg = "yellow"

[styles.success]
fg = "green"

[styles.info]
fg = "cyan"

[styles.muted]
effects = ["dim"]

[styles.link]
fg = "blue"
underline = "single"
`;

const stylesTableSchema = z.record(z.string(), z.unknown());

function warn(message: string): void {
  process.stderr.write(`Warning: ${message}\n`);
}

export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? getConfigPath();
  const config = defaultConfig();

  if (!fs.existsSync(resolved)) {
    return config;
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    warn(
      `Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    );
    return config;
  }

  if (parsed.styles === undefined) {
    return config;
  }

  const table = stylesTableSchema.safeParse(parsed.styles);
  if (!table.success) {
    warn(`Ignoring "styles" in ${resolved}: expected a table.`);
    return config;
  }

  for (const [name, value] of Object.entries(table.data)) {
    const validName = styleNameSchema.safeParse(name);
    if (!validName.success) {
      warn(`Ignoring style "${name}" in ${resolved}: ${formatZodError(validName.error)}`);
      continue;
    }
    const entry = styleEntrySchema.safeParse(value);
    if (!entry.success) {
      warn(`Ignoring style "${name}" in ${resolved}: ${formatZodError(entry.error)}`);
      continue;
    }
    config.styles.set(name, entry.data);
  }

  return config;
}

export function resolveStyle(config: Config, name: string): Style {
  const style = config.styles.get(name);
  if (!style) {
    throw new UnknownStyleError(name, [...config.styles.keys()]);
  }
  return style;
}

/** Writes DEFAULT_CONFIG_TOML; returns false when a file exists and `force` is off. */
export function writeDefaultConfig(configPath: string, force = false): boolean {
  if (fs.existsSync(configPath) && !force) {
    return false;
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
  return true;
}
