import { describe, it, expect } from "vitest";
import { CliUsageError, parseCliArgs } from "../src";

describe("parseCliArgs", () => {
  it("should show help without a command", () => {
    expect(parseCliArgs([])).toEqual({ name: "help" });
  });

  it("should show help or version before anything else", () => {
    expect(parseCliArgs(["build", "--help"])).toEqual({ name: "help" });
    expect(parseCliArgs(["-v"])).toEqual({ name: "version" });
  });

  it("should parse build with defaults", () => {
    expect(parseCliArgs(["build"])).toEqual({
      name: "build",
      options: {
        drafts: false,
        future: false,
        strict: false,
        verbose: false,
        quiet: false,
        watch: false,
      },
    });
  });

  it("should parse short and long value options", () => {
    const command = parseCliArgs([
      "build",
      "-s",
      "site",
      "--destination=public",
      "--config",
      "_config.yml, _config.dev.yml",
      "-D",
      "--future",
    ]);

    expect(command).toMatchObject({
      name: "build",
      options: {
        source: "site",
        destination: "public",
        config: ["_config.yml", "_config.dev.yml"],
        drafts: true,
        future: true,
      },
    });
  });

  it("should parse serve options", () => {
    expect(parseCliArgs(["serve", "-P", "4100", "-w"])).toMatchObject({
      name: "serve",
      options: { port: 4100, watch: true },
    });
  });

  it.each([
    [["deploy"], 'Unknown command "deploy"'],
    [["build", "--fast"], 'Unknown option "--fast"'],
    [["build", "extra"], 'Unexpected argument "extra"'],
    [["build", "--source"], "Option --source needs a value"],
    [["build", "--drafts=yes"], "Option --drafts takes no value"],
    [["build", "--port", "4000"], "Option --port only applies to serve"],
    [["build", "-w"], "Option --watch only applies to serve"],
    [["serve", "--port", "web"], "Option --port must be a number"],
    [["serve", "--port", "70000"], "Option --port must be between 0 and 65535"],
    [["build", "-V", "-q"], "--verbose and --quiet cannot be combined"],
  ])("should reject %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(CliUsageError);
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});
