import { describe, it, expect, afterEach } from "vitest";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { parseConfig } from "@folio/config";
import { TemplateResolutionError } from "@folio/utils";
import {
  createMockLogger,
  createSilentLogger,
  createTempSite,
  type TempSite,
} from "@folio/test-utils";
import { PageRenderer, layoutNameFor, writeRenderedPage } from "../src";
import { createContext, createSite, layout, resolvedItem } from "./fixtures";

const STRICT_CONFIG = "title: Test Site\nliquid:\n  strict_variables: true\n";

function createRenderer(configYaml = "title: Test Site\n"): PageRenderer {
  return new PageRenderer({
    config: parseConfig(configYaml),
    logger: createSilentLogger(),
  });
}

describe("PageRenderer", () => {
  it("should reproduce a body without template syntax unchanged", () => {
    const body = "<p>Exact   body</p>\n\n<div>kept</div>\n";
    const item = resolvedItem("raw.html", {
      body,
      frontMatter: { layout: "none" },
    });

    const page = createRenderer().render(item, createContext(createSite()));

    expect(page.html).toBe(body);
    expect(page.outputPath).toBe("raw/index.html");
    expect(page.url).toBe("/raw/");
  });

  it("should substitute before converting Markdown", () => {
    const item = resolvedItem("post.md", {
      body: "# Hi {{ page.title }}\n",
      frontMatter: { title: "There", layout: null },
    });

    const page = createRenderer().render(item, createContext(createSite()));

    expect(page.html).toBe("<h1>Hi There</h1>\n");
  });

  it("should fail on an undefined variable in strict mode", () => {
    const item = resolvedItem("about.html", {
      body: "{{ page.missing }}",
      frontMatter: { layout: "none" },
    });

    expect(() =>
      createRenderer(STRICT_CONFIG).render(
        item,
        createContext(createSite(STRICT_CONFIG)),
      ),
    ).toThrow(TemplateResolutionError);
  });

  it("should render undefined variables empty and warn once per item", () => {
    const logger = createMockLogger();
    const renderer = new PageRenderer({
      config: parseConfig("title: Test Site\n"),
      logger,
    });
    const item = resolvedItem("x.html", {
      body: "[{{ a }}{{ b }}{{ a }}]",
      frontMatter: { layout: "none" },
    });

    const page = renderer.render(item, createContext(createSite()));

    expect(page.html).toBe("[]");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'x.html: undefined variable "a"; undefined variable "b"',
    );
  });

  it("should expose site and page values", () => {
    const site = createSite("title: Test Site\nauthor:\n  name: Ada\n", {
      data: { timeline: [{ title: "Engineer" }] },
    });
    const item = resolvedItem("about.html", {
      body: "{{ site.title }}/{{ site.author.name }}/{{ site.data.timeline[0].title }}/{{ page.url }}/{{ page.slug }}",
      frontMatter: { layout: "none" },
    });

    const page = createRenderer().render(item, createContext(site));

    expect(page.html).toBe("Test Site/Ada/Engineer//about//about");
  });

  it("should wrap content in a chain of user layouts", () => {
    const context = createContext(createSite(), [
      layout("base", "<html>{{ content }}</html>"),
      layout("wrap", "<main>{{ layout.kind }}:{{ content }}</main>", {
        layout: "base",
        kind: "w",
      }),
    ]);
    const item = resolvedItem("a.html", {
      body: "Hi",
      frontMatter: { layout: "wrap" },
    });

    const page = createRenderer().render(item, context);

    expect(page.html).toBe("<html><main>w:Hi</main></html>");
    expect(page.content).toBe("Hi");
  });

  it("should leave content unwrapped when a layout is missing", () => {
    const logger = createMockLogger();
    const renderer = new PageRenderer({
      config: parseConfig("title: Test Site\n"),
      logger,
    });
    const item = resolvedItem("a.html", {
      body: "Hi",
      frontMatter: { layout: "ghost" },
    });

    expect(renderer.render(item, createContext(createSite())).html).toBe("Hi");
    expect(logger.warn).toHaveBeenCalledWith('a.html: layout "ghost" not found');
  });

  it("should fail on a missing layout in strict mode", () => {
    const item = resolvedItem("a.html", {
      body: "Hi",
      frontMatter: { layout: "ghost" },
    });

    expect(() =>
      createRenderer(STRICT_CONFIG).render(
        item,
        createContext(createSite(STRICT_CONFIG)),
      ),
    ).toThrow('Layout "ghost" not found (used by a.html)');
  });

  it("should reject layout cycles", () => {
    const context = createContext(createSite(), [
      layout("a", "{{ content }}", { layout: "b" }),
      layout("b", "{{ content }}", { layout: "a" }),
    ]);
    const item = resolvedItem("x.html", {
      body: "Hi",
      frontMatter: { layout: "a" },
    });

    expect(() => createRenderer().render(item, context)).toThrow(
      "Layout cycle a -> b -> a in x.html",
    );
  });

  it("should render an item with empty front matter in the default layout", () => {
    const item = resolvedItem("about.html", { body: "<p>About</p>" });

    const html = createRenderer().render(item, createContext(createSite())).html;

    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(html).toContain("<title>Test Site</title>");
    expect(html).toContain('<main class="page-content"><p>About</p></main>');
  });

  it("should link the stylesheet the example site ships", () => {
    const item = resolvedItem("about.html", { body: "<p>About</p>" });

    const html = createRenderer().render(item, createContext(createSite())).html;

    expect(html).toContain('<link rel="stylesheet" href="/assets/css/style.css">');
    expect(
      existsSync(
        new URL("../../../examples/portfolio/assets/css/style.css", import.meta.url),
      ),
    ).toBe(true);
  });

  it("should chain the built-in page layout into the default layout", () => {
    const item = resolvedItem("about.html", {
      body: "<p>x</p>",
      frontMatter: { layout: "page", title: "About" },
    });

    const html = createRenderer().render(item, createContext(createSite())).html;

    expect(html).toContain("<title>About | Test Site</title>");
    expect(html).toContain(
      '<article class="page"><h1 class="page-title">About</h1><div class="page-body"><p>x</p></div></article>',
    );
  });

  it("should only emit analytics for production builds", () => {
    const config = [
      "title: Test Site",
      "analytics:",
      "  enabled: true",
      "  google:",
      "    tracking_id: G-TEST",
      "",
    ].join("\n");
    const item = resolvedItem("about.html", { body: "x" });

    const development = createRenderer(config).render(
      item,
      createContext(createSite(config)),
    );
    const productionConfig = `${config}environment: production\n`;
    const production = createRenderer(productionConfig).render(
      item,
      createContext(createSite(productionConfig)),
    );

    expect(development.html).not.toContain("googletagmanager");
    expect(production.html).toContain(
      '<script async src="https://www.googletagmanager.com/gtag/js?id=G-TEST"></script>',
    );
  });

  it("should render built-in includes unless _includes overrides them", () => {
    const site = createSite("title: Test Site\n", {
      data: { timeline: [{ title: "Engineer", from: 2020, to: 2022 }] },
    });
    const item = resolvedItem("about.html", {
      body: "{% include timeline.html %}",
      frontMatter: { layout: "none" },
    });

    expect(createRenderer().render(item, createContext(site)).html).toBe(
      '<ul class="timeline"><li class="timeline-entry"><h3 class="timeline-title">Engineer</h3><span class="timeline-period">2020 – 2022</span></li></ul>',
    );
    expect(
      createRenderer().render(
        item,
        createContext(site, [], { "timeline.html": "custom" }),
      ).html,
    ).toBe("custom");
  });

  it("should reject malformed timeline data", () => {
    const site = createSite("title: Test Site\n", {
      data: { timeline: [{ from: 2020 }] },
    });
    const item = resolvedItem("about.html", {
      body: "{% include timeline.html %}",
      frontMatter: { layout: "none" },
    });

    expect(() => createRenderer().render(item, createContext(site))).toThrow(
      "Validation failed for site.data.timeline: 0.title: Required",
    );
  });
});

describe("PageRenderer.renderExcerpts", () => {
  const CONFIG = "title: Test Site\nauthor:\n  name: Alex\n";

  function post(body: string, frontMatter: Record<string, unknown> = {}) {
    return resolvedItem("_posts/2024-01-15-hello.md", {
      body,
      frontMatter: { title: "Hello", ...frontMatter },
      collection: "posts",
    });
  }

  it("should substitute variables in the first paragraph", () => {
    const item = post("Written by {{ site.author.name }}.\n\nMore text");

    const excerpts = createRenderer(CONFIG).renderExcerpts(
      [item],
      createContext(createSite(CONFIG)),
    );

    expect(excerpts).toEqual(
      new Map([["_posts/2024-01-15-hello.md", "<p>Written by Alex.</p>"]]),
    );
  });

  it("should leave plain and explicit excerpts to the item", () => {
    const excerpts = createRenderer(CONFIG).renderExcerpts(
      [
        post("Plain text\n\nThen {{ page.title }}"),
        post("{{ page.title }}", { excerpt: "Given" }),
      ],
      createContext(createSite(CONFIG)),
    );

    expect(excerpts.size).toBe(0);
  });

  it("should show substituted excerpts in post lists and page data", () => {
    const item = post("Written by {{ site.author.name }}.");
    const plain = createSite(CONFIG, {
      collections: new Map([
        ["posts", { name: "posts", output: true, permalink: "/:title/", items: [item] }],
      ]),
    });
    const renderer = createRenderer(CONFIG);
    const excerpts = renderer.renderExcerpts([item], createContext(plain));
    const site = { ...plain, excerpts };
    const list = resolvedItem("blog.html", {
      body: "{% include posts %}|{{ site.posts[0].excerpt }}",
      frontMatter: { layout: "none" },
    });

    const html = renderer.render(list, createContext(site)).html;

    expect(html).toContain(
      '<div class="post-excerpt"><p>Written by Alex.</p></div>',
    );
    expect(html.endsWith("|<p>Written by Alex.</p>")).toBe(true);
  });
});

describe("layoutNameFor", () => {
  it("should default HTML output to the default layout", () => {
    expect(layoutNameFor(resolvedItem("a.md"))).toBe("default");
    expect(layoutNameFor(resolvedItem("feed.xml"))).toBeNull();
    expect(
      layoutNameFor(resolvedItem("a.md", { frontMatter: { layout: null } })),
    ).toBeNull();
    expect(
      layoutNameFor(resolvedItem("a.md", { frontMatter: { layout: "none" } })),
    ).toBeNull();
    expect(
      layoutNameFor(resolvedItem("a.md", { frontMatter: { layout: "post.html" } })),
    ).toBe("post");
  });
});

describe("writeRenderedPage", () => {
  let site: TempSite | undefined;

  afterEach(async () => {
    await site?.cleanup();
    site = undefined;
  });

  it("should write the page below the destination", async () => {
    site = await createTempSite();

    const target = await writeRenderedPage(site.path("_site"), {
      relativePath: "_projects/demo.md",
      url: "/projects/demo",
      outputPath: "projects/demo/index.html",
      content: "<p>demo</p>",
      html: "<p>demo</p>",
    });

    expect(target).toBe(site.path("_site/projects/demo/index.html"));
    expect(await readFile(target, "utf-8")).toBe("<p>demo</p>");
  });
});
