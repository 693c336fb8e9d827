import { describe, it, expect, afterEach } from "vitest";
import { ConfigError } from "@folio/utils";
import { createTempSite, type TempSite } from "@folio/test-utils";
import {
  parseConfig,
  loadConfig,
  mergeConfig,
  resolveConfigOverrides,
  expandPermalinkStyle,
} from "../src";

describe("parseConfig", () => {
  it("should apply defaults for a minimal configuration", () => {
    const config = parseConfig("title: My Site\n");

    expect(config.title).toBe("My Site");
    expect(config.description).toBe("");
    expect(config.url).toBe("");
    expect(config.baseurl).toBe("");
    expect(config.plugins).toEqual([]);
    expect(config.nav_exclude).toEqual([]);
    expect(config.collections).toEqual({});
    expect(config.permalink).toBe(
      "/:categories/:year/:month/:day/:title:output_ext",
    );
    expect(config.liquid.strict_variables).toBe(false);
    expect(config.liquid.strict_filters).toBe(false);
    expect(config.unknown_collections).toBe("warn");
    expect(config.environment).toBe("development");
    expect(config.analytics.enabled).toBe(false);
  });

  it("should keep a custom posts permalink and expand style names", () => {
    expect(parseConfig("title: T\npermalink: /blog/:title\n").permalink).toBe(
      "/blog/:title",
    );
    expect(parseConfig("title: T\npermalink: pretty\n").permalink).toBe(
      "/:categories/:year/:month/:day/:title/",
    );
  });

  it("should not treat inherited object keys as style names", () => {
    expect(expandPermalinkStyle("constructor")).toBe("constructor");
    expect(parseConfig("title: T\npermalink: toString\n").permalink).toBe(
      "toString",
    );
  });

  it("should normalise baseurl and url", () => {
    const config = parseConfig(
      "title: T\nbaseurl: blog/\nurl: https://example.com/\n",
    );

    expect(config.baseurl).toBe("/blog");
    expect(config.url).toBe("https://example.com");
    expect(parseConfig('title: T\nbaseurl: "/"\n').baseurl).toBe("");
  });

  it("should read collection definitions", () => {
    const config = parseConfig(
      [
        "title: T",
        "collections:",
        "  projects:",
        "    output: true",
        "    permalink: /projects/:name",
        "  notes:",
        "",
      ].join("\n"),
    );

    expect(config.collections["projects"]).toEqual({
      output: true,
      permalink: "/projects/:name",
    });
    expect(config.collections["notes"]).toEqual({ output: true });
  });

  it("should accept the list shorthand for collections", () => {
    const config = parseConfig("title: T\ncollections:\n  - projects\n");

    expect(config.collections).toEqual({ projects: { output: true } });
  });

  it("should coerce numeric author fields and keep social handles", () => {
    const config = parseConfig(
      "title: T\nauthor:\n  name: Sam\n  mobile: 447700900000\n  github: sam\n",
    );

    expect(config.author.mobile).toBe("447700900000");
    expect(config.author["github"]).toBe("sam");
  });

  it("should keep unknown keys for templates", () => {
    const config = parseConfig("title: T\nfooter_note: Made by hand\n");

    expect(config["footer_note"]).toBe("Made by hand");
  });

  it("should return a frozen configuration", () => {
    const config = parseConfig("title: T\nauthor:\n  name: Sam\n");

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.author)).toBe(true);
    expect(() => {
      config.title = "Changed";
    }).toThrow(TypeError);
  });

  it("should apply overrides after the document", () => {
    const config = parseConfig("title: T\nliquid:\n  strict_filters: true\n", {
      overrides: { liquid: { strict_variables: true } },
    });

    expect(config.liquid.strict_variables).toBe(true);
    expect(config.liquid.strict_filters).toBe(true);
  });

  describe("errors", () => {
    it("should fail when the title is missing", () => {
      expect(() => parseConfig("description: no title\n")).toThrow(ConfigError);
      expect(() => parseConfig("description: no title\n")).toThrow(
        "Validation failed for _config.yml: title: Required",
      );
    });

    it("should fail when the title is empty", () => {
      expect(() => parseConfig('title: "  "\n')).toThrow(
        "title: must not be empty",
      );
    });

    it("should fail on an empty document", () => {
      expect(() => parseConfig("")).toThrow("title: Required");
    });

    it("should report malformed YAML with the file name", () => {
      expect(() =>
        parseConfig("title: [unclosed\n", { filename: "site.yml" }),
      ).toThrow("Failed to parse YAML in site.yml");
    });

    it("should reject documents that are not mappings", () => {
      expect(() => parseConfig("- a\n- b\n")).toThrow(
        "Configuration in _config.yml must be a mapping",
      );
    });

    it("should list every wrongly typed field", () => {
      const yaml = [
        "title: T",
        "plugins: jekyll-feed",
        "collections:",
        "  projects:",
        "    permalink: 42",
        "",
      ].join("\n");

      expect(() => parseConfig(yaml)).toThrow(
        "plugins: Expected array, received string; collections.projects.permalink: Expected string, received number",
      );
    });

    it("should reject an unknown collection policy", () => {
      expect(() => parseConfig("title: T\nunknown_collections: maybe\n")).toThrow(
        /unknown_collections/,
      );
    });
  });
});

describe("loadConfig", () => {
  let site: TempSite | undefined;

  afterEach(async () => {
    await site?.cleanup();
    site = undefined;
  });

  it("should merge several files, later ones winning", async () => {
    site = await createTempSite({
      "_config.yml":
        "title: Base\nauthor:\n  name: A\n  email: a@example.com\n",
      "_config.dev.yml": "url: http://localhost:4000\nauthor:\n  name: B\n",
    });

    const config = await loadConfig([
      site.path("_config.yml"),
      site.path("_config.dev.yml"),
    ]);

    expect(config.title).toBe("Base");
    expect(config.url).toBe("http://localhost:4000");
    expect(config.author.name).toBe("B");
    expect(config.author.email).toBe("a@example.com");
  });

  it("should apply overrides after all files", async () => {
    site = await createTempSite({ "_config.yml": "title: Base\n" });

    const config = await loadConfig(site.path("_config.yml"), {
      overrides: [{ environment: "staging" }, { environment: "production" }],
    });

    expect(config.environment).toBe("production");
  });

  it("should fail with ConfigError when a file is missing", async () => {
    site = await createTempSite();
    const missing = site.path("_config.yml");

    await expect(loadConfig(missing)).rejects.toThrow(ConfigError);
    await expect(loadConfig(missing)).rejects.toThrow(
      `Configuration file "${missing}" not found`,
    );
  });

  it("should fail when no file is given", async () => {
    await expect(loadConfig([])).rejects.toThrow("No configuration file given");
  });
});

describe("mergeConfig", () => {
  it("should merge nested mappings and replace arrays", () => {
    expect(
      mergeConfig(
        { a: { b: 1, c: 2 }, list: [1, 2] },
        { a: { c: 3 }, list: [3] },
      ),
    ).toEqual({ a: { b: 1, c: 3 }, list: [3] });
  });
});

describe("resolveConfigOverrides", () => {
  it("should map environment variables to settings", () => {
    expect(
      resolveConfigOverrides({
        FOLIO_ENV: "production",
        SITE_URL: "https://example.com",
      }),
    ).toEqual({ environment: "production", url: "https://example.com" });
  });

  it("should allow clearing the baseurl", () => {
    expect(resolveConfigOverrides({ SITE_BASEURL: "" })).toEqual({
      baseurl: "",
    });
  });

  it("should return nothing for an empty environment", () => {
    expect(resolveConfigOverrides({})).toEqual({});
  });
});
