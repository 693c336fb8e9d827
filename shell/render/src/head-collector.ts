import { escapeHtml } from "@folio/utils";

/**
 * Props for head metadata
 */
export interface HeadProps {
  title: string;
  description?: string | undefined;
  canonicalUrl?: string | undefined;
  ogType?: string | undefined;
  ogImage?: string | undefined;
  /** RSS feed advertised with a link tag */
  feedUrl?: string | undefined;
  stylesheet?: string | undefined;
}

/**
 * Collects head metadata while a page is rendered
 * The first props set win; scripts accumulate in order.
 */
export class HeadCollector {
  private headProps: HeadProps | null = null;
  private readonly scripts: string[] = [];

  setHeadProps(props: HeadProps): void {
    this.headProps ??= props;
  }

  addScript(html: string): void {
    this.scripts.push(html);
  }

  generateHeadHTML(): string {
    const tags: string[] = [
      '<meta charset="UTF-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    ];

    const props = this.headProps;
    if (!props) {
      tags.push("<title>Site</title>", ...this.scripts);
      return tags.join("\n    ");
    }

    tags.push(`<title>${escapeHtml(props.title)}</title>`);
    tags.push(`<meta property="og:title" content="${escapeHtml(props.title)}">`);

    if (props.description) {
      const description = escapeHtml(props.description);
      tags.push(`<meta name="description" content="${description}">`);
      tags.push(`<meta property="og:description" content="${description}">`);
    }
    tags.push(`<meta property="og:type" content="${escapeHtml(props.ogType ?? "website")}">`);
    if (props.canonicalUrl) {
      tags.push(`<link rel="canonical" href="${escapeHtml(props.canonicalUrl)}">`);
      tags.push(`<meta property="og:url" content="${escapeHtml(props.canonicalUrl)}">`);
    }
    if (props.ogImage) {
      tags.push(`<meta property="og:image" content="${escapeHtml(props.ogImage)}">`);
    }
    if (props.feedUrl) {
      tags.push(
        `<link rel="alternate" type="application/rss+xml" title="${escapeHtml(props.title)}" href="${escapeHtml(props.feedUrl)}">`,
      );
    }
    if (props.stylesheet) {
      tags.push(`<link rel="stylesheet" href="${escapeHtml(props.stylesheet)}">`);
    }

    tags.push(...this.scripts);
    return tags.join("\n    ");
  }
}
