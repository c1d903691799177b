import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig, parseConfig, plotConfigFiles } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

let tmp: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "halo-config-"));
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe("configuration", () => {
  it("uses defaults when config.yml is absent", async () => {
    const config = await loadConfig(tmp);
    expect(config).toEqual({
      configDirectory: tmp,
      stylesheetPath: null,
      plotDirectory: path.join(tmp, "plots"),
      registrationFile: null,
      observationalDataDirectory: path.join(tmp, "observational_data"),
      titlePrefix: "",
      scripts: []
    });
  });

  it("resolves paths against the config directory and normalizes scripts", async () => {
    await fs.writeFile(
      path.join(tmp, "config.yml"),
      [
        "stylesheet: style.css",
        "plot_directory: figures",
        "registration_file: registration.yml",
        "title_prefix: Comparison of",
        "scripts:",
        "  - filename: scripts/mass_function.py",
        "    arguments: [--bins, 30]",
        "    title: Mass function",
        "    output_file: mass_function.png",
        "  - filename: scripts/extra.sh",
        ""
      ].join("\n"),
      "utf8"
    );

    const config = await loadConfig(tmp);
    expect(config.stylesheetPath).toBe(path.join(tmp, "style.css"));
    expect(config.plotDirectory).toBe(path.join(tmp, "figures"));
    expect(config.registrationFile).toBe(path.join(tmp, "registration.yml"));
    expect(config.titlePrefix).toBe("Comparison of");
    expect(config.scripts).toEqual([
      {
        filename: "scripts/mass_function.py",
        interpreter: null,
        arguments: ["--bins", "30"],
        title: "Mass function",
        caption: "",
        section: "Auxiliary figures",
        outputFile: "mass_function.png"
      },
      {
        filename: "scripts/extra.sh",
        interpreter: null,
        arguments: [],
        title: "extra.sh",
        caption: "",
        section: "Auxiliary figures",
        outputFile: null
      }
    ]);
  });

  it("returns a frozen value", () => {
    const config = parseConfig(tmp, { scripts: [{ filename: "a.py" }] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.scripts)).toBe(true);
    expect(Object.isFrozen(config.scripts[0])).toBe(true);
  });

  it("rejects unknown keys and bad types", () => {
    expect(() => parseConfig(tmp, { plot_dir: "x" })).toThrow(ConfigError);
    expect(() => parseConfig(tmp, { scripts: [{ arguments: [] }] })).toThrow(ConfigError);
  });

  it("reports unparseable YAML as a configuration error", async () => {
    await fs.writeFile(path.join(tmp, "config.yml"), "scripts: [unclosed\n", "utf8");
    await expect(loadConfig(tmp)).rejects.toBeInstanceOf(ConfigError);
  });

  it("lists plot configuration files newest first", async () => {
    const config = parseConfig(tmp, {});
    await fs.mkdir(config.plotDirectory);
    const older = path.join(config.plotDirectory, "masses.yml");
    const newer = path.join(config.plotDirectory, "sizes.yaml");
    await fs.writeFile(older, "{}\n", "utf8");
    await fs.writeFile(newer, "{}\n", "utf8");
    await fs.utimes(older, new Date("2024-01-01T00:00:00Z"), new Date("2024-01-01T00:00:00Z"));
    await fs.utimes(newer, new Date("2025-01-01T00:00:00Z"), new Date("2025-01-01T00:00:00Z"));

    await expect(plotConfigFiles(config)).resolves.toEqual([newer, older]);
  });

  it("rejects a plot directory that does not exist", async () => {
    const config = parseConfig(tmp, { plot_directory: "plotz" });
    const attempt = plotConfigFiles(config);
    await expect(attempt).rejects.toBeInstanceOf(ConfigError);
    await expect(attempt).rejects.toThrow(`Plot directory ${path.join(tmp, "plotz")} does not exist.`);
  });
});
