import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { Color, rgb } from "../../src/color/color.js";
import { Style } from "../../src/style/style.js";
import { defaultConfig, DEFAULT_CONFIG_TOML, type Config } from "../../src/config/config.js";
import { createProgram } from "../../src/cli.js";

describe("CLI", () => {
  let output: string;
  let savedForceColor: string | undefined;
  let savedNoColor: string | undefined;
  let savedConfigDir: string | undefined;

  function capture(): (text: string) => void {
    output = "";
    return (text: string) => {
      output += text + "\n";
    };
  }

  async function run(args: string[], config: Config = defaultConfig()): Promise<void> {
    const program = createProgram(capture(), config);
    await program.parseAsync(["node", "paint", ...args]);
  }

  beforeEach(() => {
    output = "";
    savedForceColor = process.env.FORCE_COLOR;
    savedNoColor = process.env.NO_COLOR;
    savedConfigDir = process.env.PAINT_CONFIG_DIR;
    process.env.FORCE_COLOR = "1";
    delete process.env.NO_COLOR;
  });

  afterEach(() => {
    for (const [key, value] of [
      ["FORCE_COLOR", savedForceColor],
      ["NO_COLOR", savedNoColor],
      ["PAINT_CONFIG_DIR", savedConfigDir],
    ] as const) {
      if (value !== undefined) {
        process.env[key] = value;
      } else {
        delete process.env[key];
      }
    }
    process.exitCode = undefined;
  });

  describe("text", () => {
    it("styles the joined words", async () => {
      await run(["text", "Some", "content", "--bold", "--fg", "red"]);
      expect(output).toBe("\x1b[1;31mSome content\x1b[0m\n");
    });

    it("prints plain text without flags", async () => {
      await run(["text", "hello"]);
      expect(output).toBe("hello\n");
    });

    it("--plain drops escape sequences", async () => {
      await run(["text", "hello", "--bold", "--plain"]);
      expect(output).toBe("hello\n");
    });

    it("NO_COLOR drops escape sequences", async () => {
      process.env.NO_COLOR = "";
      await run(["text", "hello", "--bold"]);
      expect(output).toBe("hello\n");
    });

    it("merges flags over a named style", async () => {
      await run(["text", "hi", "--style", "error", "--underline", "curly"]);
      expect(output).toBe("\x1b[1;4:3;31mhi\x1b[0m\n");
    });

    it("a flag color overrides the named style's color", async () => {
      await run(["text", "hi", "-s", "error", "--fg", "bright-yellow"]);
      expect(output).toBe("\x1b[1;93mhi\x1b[0m\n");
    });

    it("reports unknown named styles", async () => {
      const config = { styles: new Map([["only", Style.EMPTY.bold()]]) };
      await run(["text", "hi", "--style", "nope"], config);
      expect(output).toBe("Unknown style 'nope'. Available: only\n");
      expect(process.exitCode).toBe(1);
    });

    it("rejects invalid colors", async () => {
      await expect(run(["text", "hi", "--fg", "purple"])).rejects.toThrow();
      expect(output).toContain('Could not parse color: "purple"');
    });

    it("rejects unknown underline variants", async () => {
      await expect(run(["text", "hi", "-u", "wavy"])).rejects.toThrow();
      expect(output).toContain("Allowed choices are single, double, curly, dotted, dashed");
    });
  });

  describe("codes", () => {
    it("shows the sequence with ESC spelled out", async () => {
      await run(["codes", "--italic", "--bg", "#000080"]);
      expect(output).toBe("\\x1b[3;48;2;0;0;128m\n");
    });

    it("prints an empty line for an empty style", async () => {
      await run(["codes"]);
      expect(output).toBe("\n");
    });

    it("--json outputs params and sequence", async () => {
      await run(["codes", "--json", "--fg", "208", "-u", "dashed"]);
      expect(JSON.parse(output)).toEqual({
        params: ["4:5", "38", "5", "208"],
        sequence: "\x1b[4:5;38;5;208m",
      });
    });
  });

  describe("styles", () => {
    it("lists styles rendered in themselves", async () => {
      const config = {
        styles: new Map([
          ["a", Style.EMPTY.bold()],
          ["long", Style.EMPTY],
        ]),
      };
      await run(["styles"], config);
      expect(output).toBe("\x1b[1ma   \x1b[0m  \\x1b[1m\nlong  \n");
    });

    it("--json lists names, readable colors and params", async () => {
      const config = {
        styles: new Map([
          ["alert", Style.EMPTY.reverse().fg(Color.YELLOW)],
          ["badge", Style.EMPTY.fg(Color.BRIGHT_WHITE).bg(rgb(255, 136, 0))],
        ]),
      };
      await run(["styles", "--json"], config);
      expect(JSON.parse(output)).toEqual([
        { name: "alert", fg: "yellow", bg: null, params: ["7", "33"] },
        {
          name: "badge",
          fg: "bright-white",
          bg: "#ff8800",
          params: ["97", "48", "2", "255", "136", "0"],
        },
      ]);
    });
  });

  describe("config", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "paint-cli-test-"));
      process.env.PAINT_CONFIG_DIR = tmpDir;
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true });
    });

    it("path prints the config path", async () => {
      await run(["config", "path"]);
      expect(output).toBe(`${path.join(tmpDir, "config.toml")}\n`);
    });

    it("init creates the file once", async () => {
      const configPath = path.join(tmpDir, "config.toml");
      await run(["config", "init"]);
      expect(output).toBe(`Created ${configPath}\n`);
      expect(fs.readFileSync(configPath, "utf-8")).toBe(DEFAULT_CONFIG_TOML);

      await run(["config", "init"]);
      expect(output).toBe(`Config file already exists at ${configPath}\n`);

      await run(["config", "init", "--force"]);
      expect(output).toBe(`Created ${configPath}\n`);
    });
  });
});
