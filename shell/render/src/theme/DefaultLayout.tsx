import type { JSX } from "preact";
import { render } from "preact-render-to-string";
import { getString } from "@folio/content";
import { escapeHtml } from "@folio/utils";
import { HeadCollector } from "../head-collector";
import { createHTMLShell } from "../html-shell";
import { absoluteUrl } from "../template/filters";
import { SiteFooter } from "./SiteFooter";
import { SiteHeader } from "./SiteHeader";
import { authorLinks, siteHref } from "./links";
import { pageTitle, type LayoutProps } from "./layout-props";

const FEED_PLUGINS = ["feed", "jekyll-feed"];

function DefaultLayoutBody({ site, page, content }: LayoutProps): JSX.Element {
  const { config } = site;
  return (
    <div className="wrapper">
      <SiteHeader
        title={config.title}
        homeHref={siteHref(config, "/")}
        navigation={site.navigation}
        currentUrl={siteHref(config, page.url)}
      />
      <main
        className="page-content"
        dangerouslySetInnerHTML={{ __html: content }}
      />
      <SiteFooter
        authorName={config.author.name}
        year={site.time.getUTCFullYear()}
        links={authorLinks(config)}
        openNewTab={config.open_new_tab}
      />
    </div>
  );
}

function analyticsScript(trackingId: string): string {
  const id = escapeHtml(trackingId);
  return [
    `<script async src="https://www.googletagmanager.com/gtag/js?id=${id}"></script>`,
    "<script>",
    "      window.dataLayer = window.dataLayer || [];",
    "      function gtag(){dataLayer.push(arguments);}",
    "      gtag('js', new Date());",
    `      gtag('config', '${id}');`,
    "    </script>",
  ].join("\n    ");
}

function buyMeACoffeeWidget(site: LayoutProps["site"]): string | undefined {
  const widget = site.config.buymeacoffee;
  if (!widget.enabled || !widget.username) {
    return undefined;
  }
  const attributes = [
    'data-name="BMC-Widget"',
    'data-cfasync="false"',
    'src="https://cdnjs.buymeacoffee.com/1.0.0/widget.prod.min.js"',
    `data-id="${escapeHtml(widget.username)}"`,
    `data-description="${escapeHtml(widget.description)}"`,
    `data-message="${escapeHtml(widget.message)}"`,
    `data-color="${escapeHtml(widget.color)}"`,
    'data-position="Right"',
    'data-x_margin="18"',
    'data-y_margin="18"',
  ];
  return `<script ${attributes.join(" ")}></script>`;
}

/**
 * Complete HTML document around the page content
 *
 * The analytics tag is only emitted for production builds.
 */
export function renderDefaultLayout(props: LayoutProps): string {
  const { site, page } = props;
  const { config } = site;
  const title = pageTitle(page);
  const head = new HeadCollector();

  const image = getString(page.frontMatter, "image");
  const filterContext = { url: config.url, baseurl: config.baseurl };
  head.setHeadProps({
    title: title && title !== config.title ? `${title} | ${config.title}` : config.title,
    description: getString(page.frontMatter, "description") ?? config.description,
    canonicalUrl: config.url ? absoluteUrl(page.url, filterContext) : undefined,
    ogType: page.collection === "posts" ? "article" : "website",
    ogImage: image ? absoluteUrl(image, filterContext) : undefined,
    feedUrl: config.plugins.some((name) => FEED_PLUGINS.includes(name))
      ? siteHref(config, "/feed.xml")
      : undefined,
    stylesheet: siteHref(config, "/assets/css/style.css"),
  });

  const trackingId = config.analytics.google?.tracking_id;
  if (config.analytics.enabled && config.environment === "production" && trackingId) {
    head.addScript(analyticsScript(trackingId));
  }

  return createHTMLShell(
    render(<DefaultLayoutBody {...props} />),
    head.generateHeadHTML(),
    { bodyEnd: buyMeACoffeeWidget(site) },
  );
}
