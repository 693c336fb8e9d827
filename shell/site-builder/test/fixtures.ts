import type { SiteFiles } from "@folio/test-utils";
import type { SitePlugin } from "../src";

export const BUILD_TIME = new Date("2024-06-01T00:00:00Z");

export const CONFIG = [
  "title: Test Site",
  "url: https://example.com",
  "collections:",
  "  projects:",
  "    output: true",
  "    permalink: /projects/:name/",
  "",
].join("\n");

export function siteFiles(config = CONFIG): SiteFiles {
  return {
    "_config.yml": config,
    "_layouts/default.html": "<main>{{ content }}</main>",
    "index.html": "---\ntitle: Home\n---\n<h1>{{ site.title }}</h1>",
    "about.md": "---\ntitle: About\nweight: 2\n---\nAbout me",
    "_posts/2024-01-15-hello.md":
      "---\ntitle: Hello\ntags: [intro]\n---\nFirst post",
    "_projects/demo.md": "---\ntitle: Demo\n---\nA demo",
    "assets/app.js": "console.log(1);\n",
  };
}

/**
 * Plugin writing the URL of every rendered page to one file
 */
export function urlListPlugin(path = "urls.txt"): SitePlugin {
  return {
    name: "url-list",
    aliases: ["jekyll-url-list"],
    generate: (context) => [
      { path, content: context.pages.map((page) => page.url).join("\n") },
    ],
  };
}
