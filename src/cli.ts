import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import type { Color } from "./color/color.js";
import { ColorSpecError, formatColor, parseColor } from "./color/parse.js";
import { EFFECTS, type Effect } from "./effects/effect.js";
import { UNDERLINE_STYLES, type UnderlineStyle } from "./effects/underline.js";
import { Style } from "./style/style.js";
import { visibleEscapes } from "./style/sgr.js";
import { isColorEnabled } from "./format/colors.js";
import {
  loadConfig,
  getConfigPath,
  resolveStyle,
  writeDefaultConfig,
  UnknownStyleError,
  type Config,
} from "./config/config.js";
import { VERSION } from "./version.js";

type StyleOptions = Partial<Record<Effect, boolean>> & {
  fg?: Color;
  bg?: Color;
  underline?: UnderlineStyle;
  style?: string;
};

function parseColorOption(value: string): Color {
  try {
    return parseColor(value);
  } catch (err) {
    if (err instanceof ColorSpecError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

function formatOptionalColor(color: Color | null): string | null {
  return color ? formatColor(color) : null;
}

function addStyleOptions(cmd: Command): Command {
  cmd
    .addOption(new Option("--fg <color>", "Foreground color").argParser(parseColorOption))
    .addOption(new Option("--bg <color>", "Background color").argParser(parseColorOption))
    .addOption(
      new Option("-u, --underline <variant>", "Underline variant").choices(UNDERLINE_STYLES),
    )
    .option("-s, --style <name>", "Start from a named style in the config");
  for (const effect of EFFECTS) {
    cmd.option(`--${effect}`, `Enable ${effect}`);
  }
  return cmd;
}

// Named style first, then flags merged over it in a fixed order.
function buildStyle(opts: StyleOptions, config: Config): Style {
  let style = opts.style ? resolveStyle(config, opts.style) : Style.EMPTY;
  for (const effect of EFFECTS) {
    if (opts[effect]) {
      style = style.effect(effect);
    }
  }
  if (opts.underline) {
    style = style.underlineStyle(opts.underline);
  }
  if (opts.fg) {
    style = style.fg(opts.fg);
  }
  if (opts.bg) {
    style = style.bg(opts.bg);
  }
  return style;
}

export function createProgram(
  write: (text: string) => void = (t) => process.stdout.write(t + "\n"),
  config?: Config,
): Command {
  const resolvedConfig = config ?? loadConfig();
  const program = new Command("paint")
    .description(
      "paint — style text with ANSI escape sequences\n\nRun 'paint config init' to create a config file with named styles.",
    )
    .version(VERSION);

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  function withStyle(opts: StyleOptions, fn: (style: Style) => void): void {
    let style: Style;
    try {
      style = buildStyle(opts, resolvedConfig);
    } catch (err) {
      if (err instanceof UnknownStyleError) {
        write(err.message);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
    fn(style);
  }

  // text
  addStyleOptions(
    program
      .command("text <words...>")
      .description("Print the words joined by spaces, styled")
      .option("--plain", "Print without escape sequences"),
  ).action((words: string[], opts: StyleOptions & { plain?: boolean }) => {
    withStyle(opts, (style) => {
      const content = words.join(" ");
      if (opts.plain || !isColorEnabled()) {
        write(content);
        return;
      }
      write(style.appliedTo(content).toString());
    });
  });

  // codes
  addStyleOptions(
    program
      .command("codes")
      .description("Show the escape sequence for a style")
      .option("--json", "Output as JSON"),
  ).action((opts: StyleOptions & { json?: boolean }) => {
    withStyle(opts, (style) => {
      if (opts.json) {
        write(JSON.stringify({ params: style.params(), sequence: style.toString() }, null, 2));
        return;
      }
      write(visibleEscapes(style.toString()));
    });
  });

  // styles
  program
    .command("styles")
    .description("List the named styles")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      const entries = [...resolvedConfig.styles.entries()];
      if (opts.json) {
        write(
          JSON.stringify(
            entries.map(([name, style]) => ({
              name,
              fg: formatOptionalColor(style.getColor("foreground")),
              bg: formatOptionalColor(style.getColor("background")),
              params: style.params(),
            })),
            null,
            2,
          ),
        );
        return;
      }
      const color = isColorEnabled();
      const width = Math.max(0, ...entries.map(([name]) => name.length));
      for (const [name, style] of entries) {
        const label = name.padEnd(width);
        const shown = color ? style.appliedTo(label).toString() : label;
        write(`${shown}  ${visibleEscapes(style.toString())}`);
      }
    });

  // config
  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .option("--force", "Overwrite an existing config file")
    .action((opts: { force?: boolean }) => {
      const configPath = getConfigPath();
      if (!writeDefaultConfig(configPath, opts.force)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath());
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version, invalid arguments, etc.
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    throw err;
  }
}
